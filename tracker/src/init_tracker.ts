import type { ConfigurationRecord, RecordUnit } from '@initrack/common';
import { buildConfig, recordKeywords } from './config_capture';
import { getDefaultLoggers } from './log';
import type { Logger } from './log';
import { linkTracked, resolveTracked, trackedTargets } from './reflect/links';
import { EMPTY_SIGNATURE, declaresConstructor, reflectSignature, splitCallArguments } from './reflect/signature';
import { DISPATCH_METHOD, adaptStalePatch } from './signature_adapter';

export type Constructor<T extends object = object> = new (...args: never[]) => T;

// Hooks are looked up by these names on a class that declares its own constructor:
// `static preInit(originalCtor, ...args)` runs with `this` set to the concrete class,
// `postInit(originalCtor, ...args)` runs with `this` set to the new instance.
export const PRE_INIT_HOOK = 'preInit';
export const POST_INIT_HOOK = 'postInit';

export interface TrackInitOptions {
	// Receives stale-patch diagnostics for patches applied to this class
	logger?: Logger;
	// Library the class belongs to; patches from the same origin get the softer diagnostic
	library?: string;
	// Overrides the model type derived from the class name
	modelType?: string;
	// Project reported to the record sink
	project?: string;
	sink?: (unit: RecordUnit) => void;
}

export interface PatchOptions {
	logger?: Logger;
	// Library the patch comes from
	origin?: string;
}

const initConfigs = new WeakMap<object, ConfigurationRecord>();
const trackOptions = new WeakMap<Function, TrackInitOptions>();

function findHook(holder: unknown, name: string): Function | undefined {
	if ((typeof holder !== 'object' && typeof holder !== 'function') || holder === null) return undefined;
	const value: unknown = Reflect.get(holder, name);
	return typeof value === 'function' ? value : undefined;
}

const warnedSubclasses = new WeakSet<Function>();

type Construction = 'own' | 'tracked-subclass' | 'untracked-subclass';

// Who owns the record of one construction reaching the trap of `target`.
// The arguments the trap sees are the caller's only when every class between
// `newTarget` and `target` inherits its constructor. A tracked class in
// between records the construction itself.
function classifyConstruction(newTarget: Function, target: Function): Construction {
	const base = resolveTracked(target);
	let current: unknown = newTarget;
	while (typeof current === 'function' && current !== Function.prototype) {
		const cls = resolveTracked(current);
		if (cls === base) return 'own';
		if (trackOptions.has(cls)) return 'tracked-subclass';
		if (declaresConstructor(cls)) return 'untracked-subclass';
		current = Object.getPrototypeOf(cls);
	}
	return 'own';
}

function warnUntrackedSubclass(options: TrackInitOptions, subclass: Function, target: Function) {
	const cls = resolveTracked(subclass);
	if (warnedSubclasses.has(cls)) return;
	warnedSubclasses.add(cls);
	const warn = options.logger ?? getDefaultLoggers().warn;
	warn('[initrack][untracked-subclass]', { initClass: subclass.name, trackedClass: target.name });
}

function emitRecord(options: TrackInitOptions, record: ConfigurationRecord) {
	if (!options.sink) return;
	const unit: RecordUnit = { project: options.project ?? 'default', initClass: record.initClass, timestamp: Date.now(), record };
	try {
		options.sink(unit);
	} catch (err) {
		const warn = options.logger ?? getDefaultLoggers().warn;
		warn('[initrack][sink-error]', { initClass: record.initClass, error: err instanceof Error ? err.message : String(err) });
	}
}

/**
 * Wraps construction of `cls` so every instance records the arguments it was
 * built with (see getInitConfig) and the class's `preInit`/`postInit` hooks run
 * around the original constructor.
 *
 * Hooks are only picked up when `cls` declares its own constructor; a class
 * inheriting a constructor already gets them from its tracked ancestor.
 * A subclass that declares its own constructor must be tracked as well:
 * otherwise its instances get no record and `[initrack][untracked-subclass]`
 * is logged once per subclass.
 * The record names keyword-bag values only and keeps the positional arguments
 * verbatim under `initArgs`.
 */
export function trackInit<T extends Constructor>(cls: T, options: TrackInitOptions = {}): T {
	const signature = reflectSignature(cls);
	const ownConstructor = declaresConstructor(cls);
	const preInit = ownConstructor ? findHook(cls, PRE_INIT_HOOK) : undefined;
	const postInit = ownConstructor ? findHook(cls.prototype, POST_INIT_HOOK) : undefined;

	const tracked = new Proxy(cls, {
		construct(target, args: unknown[], newTarget: Function): object {
			if (preInit) Reflect.apply(preInit, newTarget, [target, ...args]);
			const instance: object = Reflect.construct(target, args, newTarget);
			if (postInit) Reflect.apply(postInit, instance, [target, ...args]);
			const construction = classifyConstruction(newTarget, target);
			if (construction === 'untracked-subclass') warnUntrackedSubclass(options, newTarget, target);
			if (construction !== 'own') return instance;
			const { positional, keywords } = splitCallArguments(signature, args);
			const record = buildConfig(EMPTY_SIGNATURE, positional, keywords, newTarget.name);
			initConfigs.set(instance, record);
			emitRecord(options, record);
			return instance;
		},
	});
	linkTracked(tracked, cls);
	// tracking a tracked class again layers its options over the earlier ones
	const base = resolveTracked(cls);
	trackOptions.set(base, { ...trackOptions.get(base), ...options });
	return tracked;
}

// Class decorator form of trackInit.
export function TrackInit(options: TrackInitOptions = {}) {
	return function <T extends Constructor>(constructor: T): T {
		return trackInit(constructor, options);
	};
}

export function isTracked(cls: unknown): boolean {
	return typeof cls === 'function' && trackedTargets.has(cls);
}

// Options of the nearest tracked class in `cls`'s inheritance chain.
export function trackedOptions(cls: unknown): TrackInitOptions | undefined {
	let current: unknown = cls;
	while (typeof current === 'function' && current !== Function.prototype) {
		const target = resolveTracked(current);
		const options = trackOptions.get(target);
		if (options) return options;
		current = Object.getPrototypeOf(target);
	}
	return undefined;
}

export function getInitConfig(instance: object): ConfigurationRecord | undefined {
	return initConfigs.get(instance);
}

/**
 * Fully resolved configuration of a tracked instance: the stored record's raw
 * positionals are mapped to the constructor's parameter names and literal
 * defaults are filled in.
 */
export function effectiveConfig(instance: object): ConfigurationRecord | undefined {
	const record = initConfigs.get(instance);
	if (!record) return undefined;
	const signature = reflectSignature(Reflect.get(instance, 'constructor'));
	return buildConfig(signature, record.initArgs ?? [], recordKeywords(record), record.initClass);
}

// Builds a new instance of `cls` from a stored record.
export function fromConfig<T extends object>(cls: Constructor<T>, record: ConfigurationRecord): T {
	const positional = record.initArgs ?? [];
	const keywords = recordKeywords(record);
	const index = reflectSignature(cls).keywordIndex;
	let args: unknown[] = positional;
	if (Object.keys(keywords).length) {
		if (index === undefined) throw new TypeError(`${cls.name} takes no keyword arguments, got ${Object.keys(keywords).join(', ')}`);
		const head = positional.slice(0, index);
		while (head.length < index) head.push(undefined);
		args = [...head, keywords, ...positional.slice(index)];
	}
	const instance: T = Reflect.construct(cls, args);
	return instance;
}

/**
 * Assigns `value` as method `name` of a tracked class (on its prototype) or of
 * a single instance (as an own property) and returns what was stored.
 *
 * Assignments of the dispatch method go through adaptStalePatch against the
 * method currently in place; every other name, and any target outside a
 * tracked hierarchy, is stored unchanged.
 */
export function setPatchedMethod(target: object, name: string, value: unknown, options: PatchOptions = {}): unknown {
	const isClass = typeof target === 'function';
	const holder: unknown = isClass ? Reflect.get(target, 'prototype') : target;
	if (typeof holder !== 'object' || holder === null) throw new TypeError(`Cannot set ${name}: target has no prototype`);
	const tracked = trackedOptions(isClass ? target : Reflect.get(target, 'constructor'));
	let stored = value;
	if (name === DISPATCH_METHOD && tracked) {
		stored = adaptStalePatch(Reflect.get(holder, name), value, target, {
			logger: options.logger ?? tracked.logger,
			origin: options.origin,
			library: tracked.library,
		});
	}
	Object.defineProperty(holder, name, { value: stored, writable: true, configurable: true, enumerable: !isClass });
	return stored;
}
