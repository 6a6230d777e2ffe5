export type GenerationBackendName = "fake" | "openai";

export type GenerationRequest = {
  promptText: string;
  turnId: string;
};

/**
 * Text-generation seam. A rejection here is the one fatal failure of a turn; the orchestrator
 * turns it into a tagged error result and does not retry.
 */
export interface GenerationBackend {
  readonly name: GenerationBackendName;
  generate(req: GenerationRequest): Promise<string>;
}

/** Upstream answered with an error or an unusable body. Never retried. */
export class GenerationProviderError extends Error {
  statusCode: number;
  errorType?: string;

  constructor(message: string, args: { statusCode?: number; errorType?: string } = {}) {
    super(message);
    this.name = "GenerationProviderError";
    this.statusCode = args.statusCode ?? 502;
    this.errorType = args.errorType;
  }
}
