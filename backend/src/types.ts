export type ProviderName = "gpt" | "gemini";

export type ProviderRole = "primaryA" | "primaryB";

export type ProviderErrorKind = "error" | "timeout";

export type ProviderResult =
  | {
      status: "ok";
      provider: ProviderName;
      model: string;
      text: string;
      latencyMs: number;
    }
  | {
      status: "error";
      kind: ProviderErrorKind;
      provider: ProviderName;
      model: string;
      message: string;
      latencyMs: number;
    };

export type ResultSet = Record<ProviderRole, ProviderResult>;

export type FinalAnswer =
  | { status: "ok"; text: string; latencyMs: number }
  | { status: "error"; message: string; latencyMs: number };

export const SYNTHESIS_ERROR_TAG = "SYNTHESIS_CRITICAL_ERROR";

export const PIPELINE_ERROR_PREFIX = "A critical error occurred in the Agent pipeline: ";

export function errorTag(provider: ProviderName): string {
  return `${provider.toUpperCase()}_ERROR`;
}

/** Text-channel form of a provider result: the completion, or a `[GPT_ERROR] ...` sentinel. */
export function renderResult(result: ProviderResult): string {
  if (result.status === "ok") return result.text;
  return `[${errorTag(result.provider)}] Failed to get response: ${result.message}`;
}

export function renderFinal(final: FinalAnswer): string {
  if (final.status === "ok") return final.text;
  return `[${SYNTHESIS_ERROR_TAG}] Synthesis failed. Error: ${final.message}`;
}

export type ChatTurn = { role: "user" | "assistant"; content: string };

export type ChatRequest = {
  threadId: string;
  message: string;
  history?: ChatTurn[];
};

export type Candidate = {
  role: ProviderRole;
  provider: ProviderName;
  model: string;
  status: "ok" | ProviderErrorKind;
  text?: string;
  errorMessage?: string;
  latencyMs: number;
};
