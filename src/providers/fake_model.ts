import type { GenerationBackend, GenerationRequest } from "./generation_backend";

/**
 * Deterministic stand-in for local runs and tests. Echoes the persona name found in the
 * IDENTITY SNAPSHOT section so the wiring is visible end to end.
 */

function personaNameFromPrompt(promptText: string): string {
  const match = promptText.match(/^Name: (.+)$/m);
  return match ? match[1].trim() : "unknown";
}

export class FakeGenerationBackend implements GenerationBackend {
  readonly name = "fake" as const;

  async generate(req: GenerationRequest): Promise<string> {
    const persona = personaNameFromPrompt(req.promptText);
    return `[${persona}] Stub response: I received ${req.promptText.length} prompt chars.`;
  }
}
