import type { ConfigurationRecord, Signature } from '@initrack/common';
import { RESERVED_RECORD_KEYS } from '@initrack/common';

/**
 * Merges one call's arguments into a configuration record.
 *
 * Layers, low to high: positional values zipped against positional parameter
 * names, literal defaults of parameters the positional layer did not cover,
 * then every keyword argument. A keyword overwrites a positional value of the
 * same name. `initArgs` keeps the positional arguments as received.
 */
export function buildConfig(
	signature: Signature,
	positionalArgs: readonly unknown[],
	keywordArgs: Readonly<Record<string, unknown>>,
	className: string
): ConfigurationRecord {
	const config: Record<string, unknown> = {};
	const assign = (key: string, value: unknown) =>
		Object.defineProperty(config, key, { value, enumerable: true, writable: true, configurable: true });

	signature.positional.slice(0, positionalArgs.length).forEach((param, i) => assign(param.name, positionalArgs[i]));
	const uncovered = [...signature.positional.slice(positionalArgs.length), ...signature.keywords];
	for (const param of uncovered) {
		if (param.defaultValue && !Object.hasOwn(config, param.name)) assign(param.name, param.defaultValue.value);
	}
	for (const [key, value] of Object.entries(keywordArgs)) assign(key, value);

	if (positionalArgs.length) return { ...config, initArgs: positionalArgs.slice(), initClass: className };
	return { ...config, initClass: className };
}

// Named entries of a record, reserved keys removed.
export function recordKeywords(record: ConfigurationRecord): Record<string, unknown> {
	const reserved: readonly string[] = RESERVED_RECORD_KEYS;
	return Object.fromEntries(Object.entries(record).filter(([key]) => !reserved.includes(key)));
}
