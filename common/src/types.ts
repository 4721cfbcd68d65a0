// Shared types for signature reflection and construction tracking.

// One declared parameter of a callable, as reflected from its source text.
export interface ParameterSpec {
  name: string;
  // Declared with a default initializer
  optional: boolean;
  defaultSource?: string;
  // Present only when the initializer is a literal that could be evaluated
  defaultValue?: { value: unknown };
}

// Reflected parameter list. Keyword parameters are the keys of a trailing
// destructured options object; `keywordIndex` is that object's position.
export interface Signature {
  positional: ParameterSpec[];
  keywords: ParameterSpec[];
  keywordIndex?: number;
  // `...rest` parameter
  variadic: boolean;
  // `{ ...rest }` inside the keyword object
  variadicKeywords: boolean;
}

// Captured effective arguments of one construction call.
export interface ConfigurationRecord {
  [param: string]: unknown;
  // Positional arguments as supplied (only present when there were any)
  initArgs?: unknown[];
  // Name of the concrete class constructed
  initClass: string;
}

export const RESERVED_RECORD_KEYS = ['initArgs', 'initClass'] as const;

// Unit handed to record sinks and persisted by the store service.
export interface RecordUnit {
  project: string;
  initClass: string;
  timestamp: number;
  record: ConfigurationRecord;
}
