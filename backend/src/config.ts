import type { ProviderName } from "./types";
import { getEnv, getFloatEnv, getIntEnv } from "./utils/env";
import { safeLog } from "./utils/redact";

export type RoleConfig = {
  provider: ProviderName;
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
};

export type PipelineConfig = {
  primaryA: RoleConfig;
  primaryB: RoleConfig;
  arbiter: RoleConfig;
};

export const DEFAULT_GPT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_GEMINI_MODEL = "gemini-2.5-pro";
export const DEFAULT_PRIMARY_TEMPERATURE = 0.5;
export const DEFAULT_ARBITER_TEMPERATURE = 0.2;

/**
 * Reads the three model roles from the environment. Timeouts default to 0
 * (wait indefinitely). A missing key is only logged here; calls made without
 * it come back as provider errors.
 */
export function loadPipelineConfig(): PipelineConfig {
  const openaiKey = getEnv("OPENAI_API_KEY");
  const geminiKey = getEnv("GEMINI_API_KEY");
  const primaryTemperature = getFloatEnv("PRIMARY_TEMPERATURE", DEFAULT_PRIMARY_TEMPERATURE);
  const providerTimeoutMs = getIntEnv("PROVIDER_TIMEOUT_MS", 0);

  const missing = [
    ...(openaiKey ? [] : ["OPENAI_API_KEY"]),
    ...(geminiKey ? [] : ["GEMINI_API_KEY"])
  ];
  if (missing.length) safeLog("[config] api keys not configured", { missing });

  return {
    primaryA: {
      provider: "gpt",
      apiKey: openaiKey,
      model: getEnv("GPT_MODEL") ?? DEFAULT_GPT_MODEL,
      temperature: primaryTemperature,
      timeoutMs: providerTimeoutMs
    },
    primaryB: {
      provider: "gemini",
      apiKey: geminiKey,
      model: getEnv("GEMINI_MODEL") ?? DEFAULT_GEMINI_MODEL,
      temperature: primaryTemperature,
      timeoutMs: providerTimeoutMs
    },
    arbiter: {
      provider: "gemini",
      apiKey: geminiKey,
      model: getEnv("ARBITER_MODEL") ?? DEFAULT_GEMINI_MODEL,
      temperature: getFloatEnv("ARBITER_TEMPERATURE", DEFAULT_ARBITER_TEMPERATURE),
      timeoutMs: getIntEnv("SYNTH_TIMEOUT_MS", 0)
    }
  };
}
