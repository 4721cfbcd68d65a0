import { parameterNames, reflectSignature } from './reflect/signature';

/**
 * Checks whether `paramField` is a declared parameter of `func`, e.g. whether
 * a model constructor takes `vocabSize`. Reflects afresh on every call.
 */
export function paramInFunc(func: Function, paramField: string): boolean {
	return parameterNames(reflectSignature(func)).includes(paramField);
}
