import type { Signature } from '@initrack/common';

// Process-wide weak links between wrappers and what they wrap. Reflection
// consults them so that a tracked class reads as its target class and an
// adapted patch reads as the signature it adapts to.

// tracked proxy -> original class
export const trackedTargets = new WeakMap<Function, Function>();
const trackedClasses = new WeakSet<Function>();

// Original class behind any number of tracking proxies.
export function resolveTracked(fn: Function): Function {
	let current = fn;
	for (let target = trackedTargets.get(current); target; target = trackedTargets.get(current)) current = target;
	return current;
}

export function linkTracked(proxy: Function, target: Function) {
	trackedTargets.set(proxy, target);
	trackedClasses.add(resolveTracked(target));
}

// True for objects constructed from a tracked class or a subclass of one.
export function isTrackedInstance(value: unknown): value is object {
	if (typeof value !== 'object' || value === null) return false;
	let proto: unknown = Object.getPrototypeOf(value);
	while (typeof proto === 'object' && proto !== null) {
		const ctor: unknown = Reflect.get(proto, 'constructor');
		if (typeof ctor === 'function' && trackedClasses.has(ctor)) return true;
		proto = Object.getPrototypeOf(proto);
	}
	return false;
}

// adapted wrapper -> replacement it delegates to and the canonical signature it accepts
export interface Adaptation {
	wrapped: Function;
	signature: Signature;
}
export const adaptations = new WeakMap<Function, Adaptation>();

// callable -> extension names it declared support for
export const declaredExtensions = new WeakMap<Function, readonly string[]>();
