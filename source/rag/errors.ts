// ============================================================================
// Error Classes
// ============================================================================

/**
 * Invalid configuration file or environment value. Fatal at startup.
 */
export class ConfigError extends Error {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

/**
 * A store method was called before connect().
 */
export class StoreNotConnectedError extends Error {
	constructor(backend: string) {
		super(`${backend} store not connected. Call connect() first.`);
		this.name = 'StoreNotConnectedError';
	}
}

/**
 * Every dense query path the backend offers failed for one call.
 */
export class DenseSearchUnavailableError extends Error {
	readonly attempts: Array<{path: string; message: string}>;

	constructor(
		collection: string,
		attempts: Array<{path: string; message: string}>,
	) {
		const detail = attempts.map(a => `${a.path}: ${a.message}`).join('; ');
		super(
			attempts.length > 0
				? `Dense search on "${collection}" failed on every query path (${detail})`
				: `Dense search on "${collection}" has no usable query path`,
		);
		this.name = 'DenseSearchUnavailableError';
		this.attempts = attempts;
	}
}

/**
 * A retrieval leg did not finish within its time budget.
 */
export class LegTimeoutError extends Error {
	readonly leg: string;
	readonly timeoutMs: number;

	constructor(leg: string, timeoutMs: number) {
		super(`${leg} leg timed out after ${timeoutMs}ms`);
		this.name = 'LegTimeoutError';
		this.leg = leg;
		this.timeoutMs = timeoutMs;
	}
}

/**
 * Extraction artifact on disk does not match the expected shape.
 */
export class ArtifactFormatError extends Error {
	readonly artifactPath: string;

	constructor(artifactPath: string, message: string) {
		super(`Invalid extraction artifact ${artifactPath}: ${message}`);
		this.name = 'ArtifactFormatError';
		this.artifactPath = artifactPath;
	}
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) return value;
	return new Error(typeof value === 'string' ? value : String(value));
}
