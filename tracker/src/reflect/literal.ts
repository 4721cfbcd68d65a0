import * as ts from 'typescript';

// Default initializers evaluated without running code: numbers, strings and
// templates without substitutions, booleans, null, undefined, Infinity, NaN,
// `void <literal>`, and arrays/objects built from those.

const NOT_LITERAL = Symbol('not-literal');

function isPropertyKey(name: ts.PropertyName): name is ts.Identifier | ts.StringLiteral | ts.NumericLiteral {
	return ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name);
}

function read(node: ts.Expression, sourceFile: ts.SourceFile): unknown {
	if (ts.isParenthesizedExpression(node)) return read(node.expression, sourceFile);
	if (ts.isNumericLiteral(node)) return Number(node.getText(sourceFile).replace(/_/g, ''));
	if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) return node.text;
	switch (node.kind) {
		case ts.SyntaxKind.TrueKeyword:
			return true;
		case ts.SyntaxKind.FalseKeyword:
			return false;
		case ts.SyntaxKind.NullKeyword:
			return null;
	}
	if (ts.isIdentifier(node)) {
		if (node.text === 'undefined') return undefined;
		if (node.text === 'Infinity') return Infinity;
		if (node.text === 'NaN') return NaN;
		return NOT_LITERAL;
	}
	if (ts.isVoidExpression(node)) return read(node.expression, sourceFile) === NOT_LITERAL ? NOT_LITERAL : undefined;
	if (ts.isPrefixUnaryExpression(node)) {
		const operand = read(node.operand, sourceFile);
		if (typeof operand !== 'number') return NOT_LITERAL;
		if (node.operator === ts.SyntaxKind.MinusToken) return -operand;
		if (node.operator === ts.SyntaxKind.PlusToken) return operand;
		return NOT_LITERAL;
	}
	if (ts.isArrayLiteralExpression(node)) {
		const items: unknown[] = [];
		for (const element of node.elements) {
			if (ts.isSpreadElement(element) || ts.isOmittedExpression(element)) return NOT_LITERAL;
			const value = read(element, sourceFile);
			if (value === NOT_LITERAL) return NOT_LITERAL;
			items.push(value);
		}
		return items;
	}
	if (ts.isObjectLiteralExpression(node)) {
		const object: Record<string, unknown> = {};
		for (const property of node.properties) {
			if (!ts.isPropertyAssignment(property) || !isPropertyKey(property.name)) return NOT_LITERAL;
			const value = read(property.initializer, sourceFile);
			if (value === NOT_LITERAL) return NOT_LITERAL;
			// defineProperty keeps a `__proto__` key as data
			Object.defineProperty(object, property.name.text, { value, enumerable: true, writable: true, configurable: true });
		}
		return object;
	}
	return NOT_LITERAL;
}

export function evaluateLiteral(node: ts.Expression, sourceFile: ts.SourceFile): { value: unknown } | undefined {
	const value = read(node, sourceFile);
	return value === NOT_LITERAL ? undefined : { value };
}
