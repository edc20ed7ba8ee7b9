export const LONG_CONTEXT_THRESHOLD = 1000;

/** Longer briefs leave less room in the context window, so they get a smaller completion budget. */
export function maxTokensForContextLength(length: number): number {
  return length > LONG_CONTEXT_THRESHOLD ? 1400 : 1600;
}

/** Length in code points, so astral characters count once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

export function calculateMaxTokens(description: string, personas: string, themes: string): number {
  return maxTokensForContextLength(charLength(description) + charLength(personas) + charLength(themes));
}

/** Token figure quoted to the model: 90% of the configured budget. */
export function safeTokenBudget(maxTokens: number): number {
  return Math.floor(maxTokens * 0.9);
}
