// Raised when a callable's parameter list cannot be read from its source text.
export class ReflectionError extends Error {
	readonly callableName: string;

	constructor(callableName: string, reason: string) {
		super(`Cannot introspect ${callableName || 'anonymous'}: ${reason}`);
		this.name = 'ReflectionError';
		this.callableName = callableName;
	}
}
