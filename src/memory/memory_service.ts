import { randomUUID } from "node:crypto";

import type { BudgetView } from "../control-plane/token_budget";
import type { TokenCounter } from "../control-plane/token_counter";
import { computeQueryEmbedding, cosineSimilarity } from "./query_embedding";

export type MemoryRetrievalRequest = {
  userId: string;
  sessionId: string;
  requestText: string;
  queryEmbedding: readonly number[];
  /** Live turn budget. Read-only: retrieval sizes its answer, the assembler commits. */
  budget: BudgetView;
  expertiseDomains: readonly string[];
  signal: AbortSignal;
};

export interface MemoryService {
  retrieve(req: MemoryRetrievalRequest): Promise<string>;
}

export type MemoryRecord = {
  id: string;
  userId: string;
  sessionId: string | null;
  text: string;
  domains: string[];
  createdAt: string;
  embedding: number[];
};

export const NO_RELEVANT_MEMORY_TEXT = "(no relevant memory)";

type ScoredRecord = { record: MemoryRecord; score: number; order: number };

/**
 * Process-memory store with embedding retrieval.
 *
 * Ranking: cosine similarity to the query, plus a bonus for matching one of the identity's
 * expertise domains and a smaller one for the current session. Output is capped at a share of
 * the budget that remains when retrieval runs.
 */
export class InMemoryMemoryService implements MemoryService {
  private readonly records: MemoryRecord[] = [];
  private readonly countTokens: TokenCounter;
  private readonly budgetShare: number;
  private readonly maxItems: number;
  private readonly minScore: number;

  constructor(opts: {
    countTokens: TokenCounter;
    budgetShare?: number;
    maxItems?: number;
    minScore?: number;
  }) {
    this.countTokens = opts.countTokens;
    this.budgetShare = opts.budgetShare ?? 0.25;
    this.maxItems = opts.maxItems ?? 8;
    this.minScore = opts.minScore ?? 0.1;
  }

  remember(args: { userId: string; text: string; sessionId?: string; domains?: string[] }): MemoryRecord {
    const record: MemoryRecord = {
      id: randomUUID(),
      userId: args.userId,
      sessionId: args.sessionId ?? null,
      text: args.text,
      domains: (args.domains ?? []).map((d) => d.toLowerCase()),
      createdAt: new Date().toISOString(),
      embedding: computeQueryEmbedding(args.text),
    };
    this.records.push(record);
    return record;
  }

  listForUser(userId: string): MemoryRecord[] {
    return this.records.filter((r) => r.userId === userId);
  }

  async retrieve(req: MemoryRetrievalRequest): Promise<string> {
    req.signal.throwIfAborted();

    const domains = new Set(req.expertiseDomains.map((d) => d.toLowerCase()));
    const scored: ScoredRecord[] = [];

    this.records.forEach((record, order) => {
      if (record.userId !== req.userId) return;

      let score = cosineSimilarity(req.queryEmbedding, record.embedding);
      if (record.domains.some((d) => domains.has(d))) score += 0.1;
      if (record.sessionId === req.sessionId) score += 0.05;

      if (score >= this.minScore) {
        scored.push({ record, score, order });
      }
    });

    // Highest score first; newest first on ties.
    scored.sort((a, b) => b.score - a.score || b.order - a.order);

    const tokenCap = Math.floor(req.budget.remaining() * this.budgetShare);
    const lines: string[] = [];

    for (const { record } of scored) {
      if (lines.length >= this.maxItems) break;

      const line = `[memory:${record.id}] ${record.text}`;
      if (this.countTokens([...lines, line].join("\n")) > tokenCap) break;
      lines.push(line);
    }

    return lines.length ? lines.join("\n") : NO_RELEVANT_MEMORY_TEXT;
  }
}
