/**
 * Prompt construction and verdict parsing for necessity evaluation
 */

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 200;

const LEADING_NOISE = /^[\s*_`"'“”‘’「」『』.,:;!?()[\]-]+/u;
const AFFIRMATIVE = /^(yes|y|true|是|需要)(?![a-z])/;

export function buildNecessityPrompt(template: string, context: string): string {
  return `${template.trimEnd()}\n\nConversation:\n${context}`;
}

/**
 * A reply counts as positive only when it opens with an affirmative word,
 * so "no, not needed" and "不需要" stay negative.
 */
export function parseVerdict(response: string): boolean {
  const cleaned = response.replace(LEADING_NOISE, '').toLowerCase();
  return AFFIRMATIVE.test(cleaned);
}
