import { postJson } from "../http";
import type { GenerateSettings, Generation } from "./types";

type OpenAIChatCompletionResponse = {
  choices?: Array<{ message?: { role?: string; content?: string | null } }>;
};

export const OPENAI_CHAT_URL = "https://api.openai.com/v1/chat/completions";

export async function generateOpenAI(prompt: string, settings: GenerateSettings): Promise<Generation> {
  const { apiKey } = settings;
  if (!apiKey) throw new Error("OPENAI_API_KEY not configured");

  const body = {
    model: settings.model,
    messages: [{ role: "user", content: prompt }],
    temperature: settings.temperature
  };

  const { data, latencyMs } = await postJson<OpenAIChatCompletionResponse>(
    OPENAI_CHAT_URL,
    body,
    { authorization: `Bearer ${apiKey}` },
    { timeoutMs: settings.timeoutMs, fetch: settings.fetch }
  );

  const text = data.choices?.[0]?.message?.content ?? "";
  if (!text.trim()) throw new Error("Empty OpenAI response");
  return { text, latencyMs };
}
