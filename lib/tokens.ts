/**
 * Coarse output-size metric reported as `output_tokens`.
 *
 * Characters of the result's textual form divided by a fixed constant. This is
 * an approximation for dashboards, not a tokenizer; servers fronting a specific
 * model can plug their own estimator.
 */

/** Roughly 4 characters per token for English text on current LLM tokenizers. */
export const DEFAULT_CHARS_PER_TOKEN = 4;

export type TokenEstimator = (output: unknown) => number;

/**
 * Textual form of a tool result: strings as-is, objects as JSON,
 * anything JSON cannot express (bigint, cycles, functions) through String().
 */
export function toOutputText(value: unknown): string {
	if (typeof value === 'string') return value;
	if (typeof value === 'object' && value !== null) {
		try {
			const json = JSON.stringify(value);
			if (typeof json === 'string') return json;
		} catch {
			return String(value);
		}
	}
	return String(value);
}

export function estimateOutputTokens(value: unknown, charsPerToken: number = DEFAULT_CHARS_PER_TOKEN): number {
	if (value == null) return 0;
	return Math.floor(toOutputText(value).length / charsPerToken);
}

export function createTokenEstimator(charsPerToken: number = DEFAULT_CHARS_PER_TOKEN): TokenEstimator {
	if (!Number.isFinite(charsPerToken) || charsPerToken <= 0) {
		throw new RangeError(`charsPerToken must be a positive number, got ${charsPerToken}`);
	}
	return (output) => estimateOutputTokens(output, charsPerToken);
}
