/**
 * Error types raised by the availability engine and its collaborators.
 */

/**
 * Raised by an AvailabilityProvider when a query cannot be answered
 * (network failure, timeout, non-2xx status or an unexpected payload).
 */
export class ProviderError extends Error {
	/** HTTP status when the service answered, undefined for network failures */
	readonly status?: number;
	readonly url?: string;

	constructor(message: string, options: { status?: number; url?: string; cause?: unknown } = {}) {
		super(message, { cause: options.cause });
		this.name = 'ProviderError';
		this.status = options.status;
		this.url = options.url;
	}
}

/**
 * Raised when a record or generator input is invalid.
 */
export class ValidationError extends Error {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
		this.name = 'ValidationError';
		this.issues = issues;
	}
}

export function isProviderError(error: unknown): error is ProviderError {
	return error instanceof ProviderError;
}
