// Public API of the construction tracker

export type { Logger, Loggers } from './log';
export { getDefaultLoggers, setDefaultLoggers } from './log';
export { ReflectionError } from './errors';

export {
	reflectSignature,
	parameterNames,
	splitCallArguments,
	declaresConstructor,
	EMPTY_SIGNATURE,
} from './reflect/signature';
export type { SplitCall } from './reflect/signature';
export { isTrackedInstance } from './reflect/links';

export { paramInFunc } from './param_probe';
export { buildConfig, recordKeywords } from './config_capture';
export {
	adaptStalePatch,
	declareExtensions,
	unwrapPatch,
	isOpaqueDispatch,
	DISPATCH_METHOD,
	EXTENSION_PARAMETERS,
	OPAQUE_DISPATCH_SUFFIX,
	LIBRARY_NAME,
} from './signature_adapter';
export type { AdaptOptions } from './signature_adapter';
export {
	TrackInit,
	trackInit,
	isTracked,
	trackedOptions,
	getInitConfig,
	effectiveConfig,
	fromConfig,
	setPatchedMethod,
	PRE_INIT_HOOK,
	POST_INIT_HOOK,
} from './init_tracker';
export type { Constructor, TrackInitOptions, PatchOptions } from './init_tracker';
export { findClassByName, findModelType, resolveCacheDir } from './model_utils';
export { modelHome, hubCacheHome } from './env';
export { endpointSink, postRecord, normalizeEndpoint } from './record_sink';
export * from '@initrack/common';

