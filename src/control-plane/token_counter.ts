import { getEncoding, type Tiktoken } from "js-tiktoken";

export type TokenCounter = (text: string) => number;

export type TokenizerKind = "cl100k" | "estimate";

let cl100k: Tiktoken | null = null;

function cl100kEncoder(): Tiktoken {
  if (!cl100k) {
    cl100k = getEncoding("cl100k_base");
  }
  return cl100k;
}

// Special-token markers in user text are counted as plain text, never rejected.
export const countCl100kTokens: TokenCounter = (text) =>
  cl100kEncoder().encode(text, [], []).length;

// ~4 chars per token. Cheap and deterministic; used by tests and the `estimate` tokenizer setting.
export const estimateTokens: TokenCounter = (text) => Math.ceil(text.length / 4);

export function selectTokenCounter(kind: TokenizerKind): TokenCounter {
  return kind === "estimate" ? estimateTokens : countCl100kTokens;
}
