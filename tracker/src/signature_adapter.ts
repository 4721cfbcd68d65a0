import type { Signature } from '@initrack/common';
import { ReflectionError } from './errors';
import { getDefaultLoggers } from './log';
import type { Logger } from './log';
import { adaptations, declaredExtensions, isTrackedInstance } from './reflect/links';
import { EMPTY_SIGNATURE, isPlainObject, parameterNames, reflectSignature } from './reflect/signature';

// Name of the canonical dispatch method whose signature patches are checked against.
export const DISPATCH_METHOD = 'forward';

// Optional output-control flags a patch may lack without being otherwise incompatible.
export const EXTENSION_PARAMETERS: readonly string[] = Object.freeze(['outputHiddenStates', 'outputAttentions', 'returnDict']);

// Compiled/traced dispatch objects are recognized by this type-name suffix and never wrapped.
export const OPAQUE_DISPATCH_SUFFIX = 'StaticFunction';

export const LIBRARY_NAME = 'initrack';

export interface AdaptOptions {
	logger?: Logger;
	// Library the patch comes from. Only changes the diagnostic wording.
	origin?: string;
	// Library the owner belongs to; defaults to LIBRARY_NAME.
	library?: string;
}

export function isOpaqueDispatch(value: unknown): boolean {
	if ((typeof value !== 'object' && typeof value !== 'function') || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	if ((typeof proto !== 'object' && typeof proto !== 'function') || proto === null) return false;
	const ctor: unknown = Reflect.get(proto, 'constructor');
	return typeof ctor === 'function' && ctor.name.endsWith(OPAQUE_DISPATCH_SUFFIX);
}

/**
 * Declares which extension parameters `fn` understands. Adaptation trusts the
 * declaration instead of reading the parameter list.
 */
export function declareExtensions<T extends Function>(fn: T, names: readonly string[]): T {
	declaredExtensions.set(fn, Object.freeze(names.slice()));
	return fn;
}

// Innermost replacement behind any number of adaptation wrappers.
export function unwrapPatch(fn: Function): Function {
	let current = fn;
	for (let link = adaptations.get(current); link; link = adaptations.get(current)) current = link.wrapped;
	return current;
}

interface Capabilities {
	has(name: string): boolean;
	takesKeywords: boolean;
}

// A declaration is taken at its word; otherwise the parameter list is read.
function capabilitiesOf(fn: Function, signature?: Signature): Capabilities {
	const declared = declaredExtensions.get(fn);
	if (declared) return { has: (name) => declared.includes(name), takesKeywords: true };
	const sig = signature ?? reflectSignature(fn);
	const names = parameterNames(sig);
	return {
		has: (name) => sig.variadicKeywords || names.includes(name),
		takesKeywords: sig.keywordIndex !== undefined,
	};
}

function isBoundFunction(fn: Function) {
	return fn.name.startsWith('bound ');
}

function describeOwner(owner: object): string {
	if (typeof owner === 'function') return owner.name;
	const ctor: unknown = Reflect.get(owner, 'constructor');
	return typeof ctor === 'function' ? ctor.name : String(owner);
}

function staleMessage(owner: string, missing: readonly string[], sameLibrary: boolean, library: string) {
	const names = JSON.stringify(missing);
	const head = sameLibrary
		? `The \`${DISPATCH_METHOD}\` method of ${owner} is patched and the patch might be based on an old version which misses some arguments compared with the latest, such as ${names}.`
		: `The \`${DISPATCH_METHOD}\` method of ${owner} is patched and the patch might conflict with patches made by ${library} which seem to have more arguments such as ${names}.`;
	return `${head} Compatibility for these arguments is added automatically; the patch may need to be updated.`;
}

// Drops `missing` keys from the keyword bag at `index`. An emptied trailing
// bag is dropped too when the replacement takes no keyword bag.
function stripKeywords(args: unknown[], index: number, missing: readonly string[], keepEmptyBag: boolean): unknown[] {
	const bag = args[index];
	if (!isPlainObject(bag) || !missing.some((name) => Object.hasOwn(bag, name))) return args;
	const kept = Object.fromEntries(Object.entries(bag).filter(([key]) => !missing.includes(key)));
	const forwarded = args.slice();
	if (!keepEmptyBag && Object.keys(kept).length === 0 && index === args.length - 1) forwarded.pop();
	else forwarded[index] = kept;
	return forwarded;
}

function wrapStalePatch(replacement: Function, missing: readonly string[], canonical: Signature, keepEmptyBag: boolean, owner: object): Function {
	const receiver = isTrackedInstance(owner) && !isBoundFunction(replacement) ? owner : undefined;
	const bagIndex = canonical.keywordIndex;
	const adapted = function (this: unknown, ...args: unknown[]): unknown {
		const forwarded = bagIndex === undefined ? args : stripKeywords(args, bagIndex, missing, keepEmptyBag);
		return Reflect.apply(replacement, receiver ?? this, forwarded);
	};
	Object.assign(adapted, replacement);
	Object.defineProperty(adapted, 'name', { value: replacement.name, configurable: true });
	Object.defineProperty(adapted, 'length', { value: replacement.length, configurable: true });
	adaptations.set(adapted, { wrapped: replacement, signature: canonical });
	return adapted;
}

/**
 * Makes a patch of the dispatch method compatible with the canonical one.
 *
 * Extension parameters the canonical method declares but the patch does not
 * are stripped from incoming keyword bags by a wrapper, and a diagnostic is
 * logged. Compatible patches and opaque compiled dispatch objects come back
 * unchanged. `owner` is the class or instance the patch is assigned on; a
 * tracked instance becomes `this` for unbound patches.
 */
export function adaptStalePatch(canonical: unknown, replacement: unknown, owner: object, options: AdaptOptions = {}): unknown {
	if (isOpaqueDispatch(replacement)) return replacement;
	if (typeof replacement !== 'function') throw new ReflectionError(String(replacement), 'patch is not callable');
	const canonicalSignature = canonical === undefined ? EMPTY_SIGNATURE : reflectSignature(canonical);
	const canonicalHas = typeof canonical === 'function' ? capabilitiesOf(canonical, canonicalSignature) : undefined;
	const patch = capabilitiesOf(replacement);
	const missing = EXTENSION_PARAMETERS.filter((name) => canonicalHas?.has(name) && !patch.has(name));
	if (!missing.length) return replacement;

	const library = options.library ?? LIBRARY_NAME;
	const message = staleMessage(describeOwner(owner), missing, options.origin === library, library);
	const warn = options.logger ?? getDefaultLoggers().warn;
	warn(`[initrack][stale-patch] ${message}`, { owner: describeOwner(owner), missing });
	return wrapStalePatch(replacement, missing, canonicalSignature, patch.takesKeywords, owner);
}
