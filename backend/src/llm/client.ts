import type { ProviderName, ProviderResult } from "../types";
import { errorMessage, isAbortError } from "../utils/timeout";
import { safeLog } from "../utils/redact";
import { generateGemini } from "./providers/gemini";
import { generateOpenAI } from "./providers/openai";
import type { GenerateFn, GenerateSettings } from "./providers/types";

export const GENERATORS: Record<ProviderName, GenerateFn> = {
  gpt: generateOpenAI,
  gemini: generateGemini
};

/**
 * One LLM provider behind a text-in/text-out call. `call` always resolves:
 * failures come back as an `error` result rather than a rejection.
 */
export interface ProviderClient {
  readonly provider: ProviderName;
  readonly model: string;
  call(prompt: string): Promise<ProviderResult>;
}

export type ProviderClientOptions = GenerateSettings & {
  provider: ProviderName;
  generate?: GenerateFn;
};

export function failedResult(
  provider: ProviderName,
  model: string,
  err: unknown,
  latencyMs: number
): ProviderResult {
  return {
    status: "error",
    kind: isAbortError(err) ? "timeout" : "error",
    provider,
    model,
    message: errorMessage(err),
    latencyMs
  };
}

export function createProviderClient(options: ProviderClientOptions): ProviderClient {
  const { provider, generate = GENERATORS[options.provider], ...settings } = options;

  return {
    provider,
    model: settings.model,
    async call(prompt: string): Promise<ProviderResult> {
      const startedAt = Date.now();
      try {
        const { text, latencyMs } = await generate(prompt, settings);
        return { status: "ok", provider, model: settings.model, text, latencyMs };
      } catch (err) {
        const result = failedResult(provider, settings.model, err, Date.now() - startedAt);
        safeLog(`[${provider}] request failed`, result);
        return result;
      }
    }
  };
}
