import os from 'os';
import path from 'path';

// Environment is read at point of use so that overrides made after import apply.

export function modelHome(): string {
	return process.env.INITRACK_MODEL_HOME || path.join(os.homedir(), '.initrack', 'models');
}

export function hubCacheHome(): string {
	return process.env.INITRACK_HUB_CACHE || path.join(os.homedir(), '.cache', 'huggingface', 'hub');
}
