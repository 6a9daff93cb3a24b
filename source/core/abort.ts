/**
 * Abort utilities for discarding stale searches.
 */

function normalizeReason(reason: unknown): string {
	if (reason instanceof Error) {
		return reason.message || 'Cancelled';
	}
	if (typeof reason === 'string' && reason.trim().length > 0) {
		return reason;
	}
	return 'Cancelled';
}

export function createAbortError(reason?: unknown): Error {
	const error = new Error(normalizeReason(reason));
	error.name = 'AbortError';
	return error;
}

export function throwIfAborted(signal?: AbortSignal, context?: string): void {
	if (!signal?.aborted) {
		return;
	}
	const reason = normalizeReason(signal.reason);
	throw createAbortError(context ? `${context}: ${reason}` : reason);
}

export function isAbortError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	const code = 'code' in error ? error.code : undefined;
	return error.name === 'AbortError' || code === 'ABORT_ERR';
}
