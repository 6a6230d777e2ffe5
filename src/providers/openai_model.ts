import { z } from "zod";

import type { Logger } from "../observability/logger";
import {
  GenerationProviderError,
  type GenerationBackend,
  type GenerationRequest,
} from "./generation_backend";

const ResponsesErrorBody = z
  .object({
    error: z
      .object({
        type: z.string().optional(),
        code: z.string().nullable().optional(),
        message: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

const ResponsesBody = z
  .object({
    output: z
      .array(
        z
          .object({
            content: z.array(z.object({ text: z.string().optional() }).passthrough()).optional(),
          })
          .passthrough()
      )
      .optional(),
    output_text: z.string().optional(),
  })
  .passthrough();

export function extractOutputText(body: unknown): string | undefined {
  const parsed = ResponsesBody.safeParse(body);
  if (!parsed.success) return undefined;

  for (const item of parsed.data.output ?? []) {
    for (const part of item.content ?? []) {
      if (typeof part.text === "string" && part.text) return part.text;
    }
  }

  return parsed.data.output_text || undefined;
}

export type OpenAIBackendSettings = {
  apiKey: string;
  model: string;
  baseUrl: string;
  maxOutputTokens?: number;
};

/**
 * OpenAI Responses API backend (plain text output).
 * Errors surface as GenerationProviderError; the orchestrator decides what a failure means.
 */
export class OpenAIGenerationBackend implements GenerationBackend {
  readonly name = "openai" as const;

  constructor(
    private readonly settings: OpenAIBackendSettings,
    private readonly log?: Logger,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async generate(req: GenerationRequest): Promise<string> {
    const body: Record<string, unknown> = {
      model: this.settings.model,
      store: false,
      stream: false,
      input: req.promptText,
    };
    if (typeof this.settings.maxOutputTokens === "number") {
      body.max_output_tokens = this.settings.maxOutputTokens;
    }

    const res = await this.fetchImpl(`${this.settings.baseUrl}/responses`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.settings.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    if (!res.ok) {
      const text = await res.text();
      let json: unknown = null;
      try {
        json = JSON.parse(text);
      } catch {
        json = null;
      }
      const parsedError = ResponsesErrorBody.safeParse(json);
      const detail = parsedError.success ? parsedError.data.error : undefined;
      const errorType = detail?.type;
      const errorCode = detail?.code ?? undefined;
      const bodySnippet = (detail?.message ?? text).slice(0, 500);
      const statusCode = res.status;

      this.log?.error(
        {
          turnId: req.turnId,
          statusCode,
          requestId: res.headers.get("x-request-id") ?? undefined,
          bodySnippet,
          errorType,
          errorCode,
        },
        "openai.request_failed"
      );
      throw new GenerationProviderError(`OpenAI error ${statusCode}: ${bodySnippet}`, {
        statusCode,
        errorType,
      });
    }

    const content = extractOutputText(await res.json());
    if (!content) {
      throw new GenerationProviderError("OpenAI response missing content", { statusCode: 502 });
    }

    return content;
  }
}
