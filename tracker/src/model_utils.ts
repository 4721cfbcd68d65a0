import fs from 'fs';
import path from 'path';
import { modelHome, hubCacheHome } from './env';
import { trackedOptions } from './init_tracker';
import { getDefaultLoggers } from './log';
import type { Logger } from './log';

/**
 * Finds an exported class by its own `name` in a namespace object, e.g. the
 * result of `import * as models from './models'`. Keys starting with `_` are
 * skipped. Case-sensitive, exact match; undefined when nothing matches.
 */
export function findClassByName(modelName: string, namespace: object, logger?: Logger): Function | undefined {
	for (const key of Object.keys(namespace)) {
		if (key.startsWith('_')) continue;
		const value: unknown = Reflect.get(namespace, key);
		if (typeof value !== 'function') continue;
		if (value.name === modelName) return value;
	}
	(logger ?? getDefaultLoggers().debug)(`[initrack][registry-miss] can not find model class <${modelName}>`);
	return undefined;
}

/**
 * Model type of a tracked class, e.g. BertModel -> bert,
 * RobertaForTokenClassification -> roberta. The `modelType` option wins over
 * the name; untracked classes have no model type ('').
 */
export function findModelType(modelClass: Function): string {
	const options = trackedOptions(modelClass);
	if (!options) return '';
	if (options.modelType !== undefined) return options.modelType;
	const m = modelClass.name.match(/^(.*?)(?:Model|For[A-Z]|Pretrained)/);
	return m ? m[1].toLowerCase() : '';
}

function isDirectory(p: string) {
	try {
		return fs.statSync(p).isDirectory();
	} catch {
		return false;
	}
}

/**
 * Resolves where a model's files live.
 *
 * A local directory wins. Hub downloads use `cacheDir` or the hub cache home as
 * is, since the hub client appends the model name itself. Otherwise the model
 * name is joined onto `cacheDir` (unless it already ends with it) or onto the
 * model home.
 */
export function resolveCacheDir(pretrainedModelNameOrPath: string, fromHub: boolean, cacheDir?: string): string {
	if (isDirectory(pretrainedModelNameOrPath)) return pretrainedModelNameOrPath;
	if (fromHub) return cacheDir ?? hubCacheHome();
	if (cacheDir !== undefined) {
		// a config lookup may already have appended the name
		if (cacheDir.endsWith(pretrainedModelNameOrPath)) return cacheDir;
		return path.join(cacheDir, pretrainedModelNameOrPath);
	}
	return path.join(modelHome(), pretrainedModelNameOrPath);
}
