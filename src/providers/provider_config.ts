import type { TurnConfig } from "../control-plane/turn_config";
import type { Logger } from "../observability/logger";
import { FakeGenerationBackend } from "./fake_model";
import type { GenerationBackend } from "./generation_backend";
import { OpenAIGenerationBackend } from "./openai_model";

export function createGenerationBackend(
  provider: TurnConfig["provider"],
  logger?: Logger
): GenerationBackend {
  if (provider.kind === "openai") {
    const { apiKey, model, baseUrl } = provider.openai;
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY missing");
    }
    return new OpenAIGenerationBackend({ apiKey, model, baseUrl }, logger);
  }

  return new FakeGenerationBackend();
}
