import type { FinalAnswer, ProviderName, ProviderResult } from "../types";
import { renderResult } from "../types";
import { errorMessage } from "../utils/timeout";
import { safeLog } from "../utils/redact";
import { GENERATORS } from "./client";
import type { GenerateFn, GenerateSettings } from "./providers/types";

/** A source answer as handed to the arbiter: a provider result, or already-rendered text. */
export type SynthesisInput = ProviderResult | string;

export interface Synthesizer {
  readonly model: string;
  synthesize(originalPrompt: string, outputA: SynthesisInput, outputB: SynthesisInput): Promise<FinalAnswer>;
}

export type SynthesizerOptions = GenerateSettings & {
  provider: ProviderName;
  generate?: GenerateFn;
};

function describe(label: string, input: SynthesisInput): { heading: string; body: string } {
  if (typeof input === "string") return { heading: label, body: input };
  return { heading: input.model ? `${label} (${input.model})` : label, body: renderResult(input) };
}

export function buildSynthesisPrompt(
  originalPrompt: string,
  outputA: SynthesisInput,
  outputB: SynthesisInput
): string {
  const a = describe("Output A", outputA);
  const b = describe("Output B", outputB);

  return [
    "You are the **AI Arbiter**. Your sole mission is to critique and synthesize two distinct AI model outputs into a single, flawless, and superior final answer for the user's prompt.",
    "",
    "**Original User Prompt:**",
    originalPrompt,
    "",
    `**${a.heading}:**`,
    "---",
    a.body,
    "---",
    "",
    `**${b.heading}:**`,
    "---",
    b.body,
    "---",
    "",
    "**INSTRUCTIONS:** Combine the strongest elements, correct any errors, and ensure the final answer is perfectly tailored to the original prompt. If an output is an error marker instead of an answer, rely on the other output. Generate only the polished, final response. Do NOT mention the names of the models or the critique process."
  ].join("\n");
}

export function createSynthesizer(options: SynthesizerOptions): Synthesizer {
  const { provider, generate = GENERATORS[options.provider], ...settings } = options;

  return {
    model: settings.model,
    async synthesize(
      originalPrompt: string,
      outputA: SynthesisInput,
      outputB: SynthesisInput
    ): Promise<FinalAnswer> {
      const metaPrompt = buildSynthesisPrompt(originalPrompt, outputA, outputB);
      const startedAt = Date.now();
      try {
        const { text, latencyMs } = await generate(metaPrompt, settings);
        return { status: "ok", text, latencyMs };
      } catch (err) {
        const final: FinalAnswer = {
          status: "error",
          message: errorMessage(err),
          latencyMs: Date.now() - startedAt
        };
        safeLog(`[synthesizer:${provider}] synthesis failed`, final);
        return final;
      }
    }
  };
}
