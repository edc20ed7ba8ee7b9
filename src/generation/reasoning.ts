export const REASONING_START = "<think>";
export const REASONING_END = "</think>";

export type SplitResponse = {
  content: string;
  reasoning?: string;
};

const REASONING_BLOCK = /<think>([\s\S]*?)<\/think>/;

/**
 * Separates the first <think>...</think> block from the deliverable. Text
 * without a complete block is returned as content unchanged (trimmed).
 */
export function splitReasoning(text: string): SplitResponse {
  const match = REASONING_BLOCK.exec(text);
  if (!match) return { content: text.trim() };

  const reasoning = match[1].trim();
  const content = (text.slice(0, match.index) + text.slice(match.index + match[0].length)).trim();
  return reasoning ? { content, reasoning } : { content };
}

/**
 * Rewrites marker lines into a `think-block` div so stored markdown can hide
 * or show the reasoning with CSS.
 */
export function renderReasoningMarkup(text: string): string {
  return text
    .split("\n")
    .map((line) => {
      if (line.includes(REASONING_START)) return '<div class="think-block">';
      if (line.includes(REASONING_END)) return "</div>";
      return line;
    })
    .join("\n");
}
