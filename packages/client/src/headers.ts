/**
 * Request header strategies.
 */

/**
 * Produces the headers for one request.
 */
export type HeaderStrategy = () => Record<string, string>;

export const DEFAULT_USER_AGENTS: readonly string[] = [
	'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_5) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/13.1.1 Safari/605.1.15',
	'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:77.0) Gecko/20100101 Firefox/77.0',
	'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_5) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/83.0.4103.97 Safari/537.36',
	'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:77.0) Gecko/20100101 Firefox/77.0',
	'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/83.0.4103.97 Safari/537.36',
];

/**
 * Picks a random User-Agent for every request.
 *
 * @param agents - Candidate user agents; must not be empty
 * @param random - Source of numbers in [0, 1)
 */
export function createUserAgentRotation(
	agents: readonly string[] = DEFAULT_USER_AGENTS,
	random: () => number = Math.random,
): HeaderStrategy {
	if (agents.length === 0) {
		throw new RangeError('At least one user agent is required');
	}

	return () => {
		const index = Math.min(Math.floor(random() * agents.length), agents.length - 1);
		return { 'User-Agent': agents[index] };
	};
}
