/**
 * Exponential backoff delay for a 0-indexed attempt, capped at maxDelayMs
 */
export function getBackoffDelay(
	attempt: number,
	baseDelayMs: number = 1000,
	maxDelayMs: number = 30000,
): number {
	const delay = baseDelayMs * Math.pow(2, attempt);
	return Math.min(delay, maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
