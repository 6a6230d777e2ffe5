import type { Logger } from "../observability/logger";
import type { BudgetAllocator } from "./token_budget";
import type { TokenCounter } from "./token_counter";

/**
 * Section assembler.
 *
 * Turns the ordered (header, content) list into the fixed-shape prompt document.
 * Cost is measured on the formatted section (delimiter + header line included) and charged
 * against the turn's allocator under the lowercased header.
 *
 * Order is fixed by the caller and never changed here.
 */

export const SECTION_HEADERS = [
  "SYSTEM",
  "IDENTITY SNAPSHOT",
  "MOOD STATE",
  "RELEVANT MEMORY",
  "CURRENT REQUEST",
] as const;

export type SectionHeader = (typeof SECTION_HEADERS)[number];

export type Section = {
  header: SectionHeader;
  content: string;
};

/**
 * What happens when a section's allocation is refused.
 * - omit: drop the section, header line included.
 * - degrade: emit the section with MEMORY_BUDGET_PLACEHOLDER (cost not re-checked).
 * - reserve: the section is charged before every other section; a refusal there is fatal.
 */
export type RefusalPolicy = "omit" | "degrade" | "reserve";

export const SECTION_REFUSAL_POLICY: Readonly<Record<SectionHeader, RefusalPolicy>> = Object.freeze({
  SYSTEM: "omit",
  "IDENTITY SNAPSHOT": "omit",
  "MOOD STATE": "omit",
  "RELEVANT MEMORY": "degrade",
  "CURRENT REQUEST": "reserve",
});

export const MEMORY_BUDGET_PLACEHOLDER = "[Memory context omitted due to budget constraints]";

export type SectionDisposition = "included" | "degraded" | "omitted";

export type SectionOutcome = {
  header: SectionHeader;
  disposition: SectionDisposition;
  requestedTokens: number;
  committedTokens: number;
};

export type AssembledPrompt = {
  text: string;
  outcomes: SectionOutcome[];
};

export class RequestOverCapacityError extends Error {
  header: SectionHeader;
  requestedTokens: number;
  remaining: number;

  constructor(args: { header: SectionHeader; requestedTokens: number; remaining: number }) {
    super(
      `${args.header} needs ${args.requestedTokens} tokens but only ${args.remaining} remain`
    );
    this.name = "RequestOverCapacityError";
    this.header = args.header;
    this.requestedTokens = args.requestedTokens;
    this.remaining = args.remaining;
  }
}

export function formatSection(header: SectionHeader, content: string): string {
  return `---\n## ${header}\n${content}\n`;
}

export function budgetComponentName(header: SectionHeader): string {
  return header.toLowerCase();
}

type PreparedSection = {
  section: Section;
  formatted: string;
  tokens: number;
  policy: RefusalPolicy;
};

export function assembleSections(
  sections: readonly Section[],
  budget: BudgetAllocator,
  opts: {
    countTokens: TokenCounter;
    logger?: Logger;
    policy?: Partial<Record<SectionHeader, RefusalPolicy>>;
  }
): AssembledPrompt {
  const policy: Record<SectionHeader, RefusalPolicy> = { ...SECTION_REFUSAL_POLICY, ...opts.policy };
  const seen = new Set<SectionHeader>();
  const prepared: PreparedSection[] = [];

  for (const section of sections) {
    if (seen.has(section.header)) {
      throw new RangeError(`duplicate section header: ${section.header}`);
    }
    seen.add(section.header);

    const formatted = formatSection(section.header, section.content);
    prepared.push({
      section,
      formatted,
      tokens: opts.countTokens(formatted),
      policy: policy[section.header],
    });
  }

  // Reserved sections are charged up front so lower-priority sections give way first.
  const reserved = new Set<SectionHeader>();
  for (const entry of prepared) {
    if (entry.policy !== "reserve") continue;

    const { header } = entry.section;
    if (!budget.allocate(budgetComponentName(header), entry.tokens)) {
      throw new RequestOverCapacityError({
        header,
        requestedTokens: entry.tokens,
        remaining: budget.remaining(),
      });
    }
    reserved.add(header);
  }

  const parts: string[] = [];
  const outcomes: SectionOutcome[] = [];

  for (const entry of prepared) {
    const { header } = entry.section;

    if (reserved.has(header) || budget.allocate(budgetComponentName(header), entry.tokens)) {
      parts.push(entry.formatted);
      outcomes.push({
        header,
        disposition: "included",
        requestedTokens: entry.tokens,
        committedTokens: entry.tokens,
      });
      continue;
    }

    if (entry.policy === "degrade") {
      parts.push(formatSection(header, MEMORY_BUDGET_PLACEHOLDER));
      outcomes.push({ header, disposition: "degraded", requestedTokens: entry.tokens, committedTokens: 0 });
    } else {
      outcomes.push({ header, disposition: "omitted", requestedTokens: entry.tokens, committedTokens: 0 });
    }

    opts.logger?.warn(
      { header, requestedTokens: entry.tokens, remaining: budget.remaining(), policy: entry.policy },
      "assembler.section_refused"
    );
  }

  return { text: parts.join("\n"), outcomes };
}
