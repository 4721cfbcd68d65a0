import * as ts from 'typescript';
import type { ParameterSpec, Signature } from '@initrack/common';
import { ReflectionError } from '../errors';
import { adaptations, resolveTracked } from './links';
import { evaluateLiteral } from './literal';

const NATIVE = /\{\s*\[native code\]\s*\}\s*$/;

export const EMPTY_SIGNATURE: Signature = Object.freeze({
	positional: [],
	keywords: [],
	variadic: false,
	variadicKeywords: false,
});

type Parsed =
	| { kind: 'function'; parameters: ts.NodeArray<ts.ParameterDeclaration>; sourceFile: ts.SourceFile }
	| { kind: 'class'; node: ts.ClassExpression; sourceFile: ts.SourceFile };

function sourceOf(fn: Function): string {
	const src = Function.prototype.toString.call(fn);
	if (NATIVE.test(src)) throw new ReflectionError(fn.name, 'native code has no readable parameter list');
	return src;
}

// The single expression `text` parses to, or undefined.
function parseExpression(text: string): { expression: ts.Expression; sourceFile: ts.SourceFile } | undefined {
	const sourceFile = ts.createSourceFile('reflect.js', text, ts.ScriptTarget.Latest, false, ts.ScriptKind.JS);
	const [statement] = sourceFile.statements;
	if (sourceFile.statements.length !== 1 || !ts.isExpressionStatement(statement)) return undefined;
	if (!ts.isParenthesizedExpression(statement.expression)) return undefined;
	return { expression: statement.expression.expression, sourceFile };
}

// Functions, arrows and classes parse as an expression; method shorthands and
// accessors only as a member of an object literal.
function parseCallable(fn: Function): Parsed {
	const src = sourceOf(fn);
	const asExpression = parseExpression(`(${src}\n)`);
	if (asExpression) {
		const { expression, sourceFile } = asExpression;
		if (ts.isFunctionExpression(expression) || ts.isArrowFunction(expression)) {
			return { kind: 'function', parameters: expression.parameters, sourceFile };
		}
		if (ts.isClassExpression(expression)) return { kind: 'class', node: expression, sourceFile };
	}
	const asMember = parseExpression(`({${src}\n})`);
	if (asMember && ts.isObjectLiteralExpression(asMember.expression) && asMember.expression.properties.length === 1) {
		const [member] = asMember.expression.properties;
		if (ts.isMethodDeclaration(member) || ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) {
			return { kind: 'function', parameters: member.parameters, sourceFile: asMember.sourceFile };
		}
	}
	throw new ReflectionError(fn.name, 'no parameter list found');
}

function ownConstructor(node: ts.ClassExpression): ts.ConstructorDeclaration | undefined {
	return node.members.find((member): member is ts.ConstructorDeclaration => ts.isConstructorDeclaration(member));
}

function toParameter(name: string, initializer: ts.Expression | undefined, sourceFile: ts.SourceFile): ParameterSpec {
	if (!initializer) return { name, optional: false };
	const spec: ParameterSpec = { name, optional: true, defaultSource: initializer.getText(sourceFile) };
	const literal = evaluateLiteral(initializer, sourceFile);
	if (literal) spec.defaultValue = literal;
	return spec;
}

function bindingKey(element: ts.BindingElement): string | undefined {
	const key = element.propertyName ?? element.name;
	if (ts.isIdentifier(key) || ts.isStringLiteral(key) || ts.isNumericLiteral(key)) return key.text;
	// computed key
	return undefined;
}

function toSignature(parameters: ts.NodeArray<ts.ParameterDeclaration>, sourceFile: ts.SourceFile): Signature {
	const signature: Signature = { positional: [], keywords: [], variadic: false, variadicKeywords: false };
	parameters.forEach((param, index) => {
		if (param.dotDotDotToken) {
			signature.variadic = true;
			return;
		}
		if (ts.isObjectBindingPattern(param.name) && index === parameters.length - 1) {
			for (const element of param.name.elements) {
				if (element.dotDotDotToken) {
					signature.variadicKeywords = true;
					continue;
				}
				const name = bindingKey(element);
				if (name !== undefined) signature.keywords.push(toParameter(name, element.initializer, sourceFile));
			}
			signature.keywordIndex = index;
			return;
		}
		const name = ts.isIdentifier(param.name) ? param.name.text : `arg${index}`;
		signature.positional.push(toParameter(name, param.initializer, sourceFile));
	});
	return signature;
}

/**
 * Reflects the declared parameters of a callable from its source text.
 *
 * Classes report their own constructor, or the nearest ancestor's when they
 * declare none. Tracked classes reflect as their target and adapted patches
 * as the canonical signature they accept. Throws ReflectionError for native
 * or otherwise unreadable callables.
 */
export function reflectSignature(fn: unknown): Signature {
	if (typeof fn !== 'function') throw new ReflectionError(String(fn), 'not a callable');
	const adaptation = adaptations.get(fn);
	if (adaptation) return adaptation.signature;
	const target = resolveTracked(fn);
	const parsed = parseCallable(target);
	if (parsed.kind === 'function') return toSignature(parsed.parameters, parsed.sourceFile);
	const own = ownConstructor(parsed.node);
	if (own) return toSignature(own.parameters, parsed.sourceFile);
	const parent: unknown = Object.getPrototypeOf(target);
	if (typeof parent !== 'function' || parent === Function.prototype) return EMPTY_SIGNATURE;
	return reflectSignature(parent);
}

// True when the class body declares its own constructor.
export function declaresConstructor(cls: Function): boolean {
	const parsed = parseCallable(resolveTracked(cls));
	return parsed.kind === 'class' && ownConstructor(parsed.node) !== undefined;
}

// Declared, non-variadic parameter names in order: positional then keyword.
export function parameterNames(signature: Signature): string[] {
	return [...signature.positional, ...signature.keywords].map((p) => p.name);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== 'object' || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

export interface SplitCall {
	positional: unknown[];
	keywords: Record<string, unknown>;
}

// Separates the keyword bag (a plain object at the keyword index) from the
// positional arguments of one call. Trailing undefined positionals in front
// of the bag only pad it into place and are dropped.
export function splitCallArguments(signature: Signature, args: readonly unknown[]): SplitCall {
	const index = signature.keywordIndex;
	const bag = index === undefined ? undefined : args[index];
	if (index === undefined || !isPlainObject(bag)) return { positional: args.slice(), keywords: {} };
	const head = args.slice(0, index);
	while (head.length && head[head.length - 1] === undefined) head.pop();
	return { positional: [...head, ...args.slice(index + 1)], keywords: { ...bag } };
}
