import { postJson } from "../http";
import type { GenerateSettings, Generation } from "./types";

type GeminiGenerateContentResponse = {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
  }>;
};

export function sanitizeUnicode(input: string): string {
  let out = "";
  for (let i = 0; i < input.length; i++) {
    const code = input.charCodeAt(i);
    // drop control characters, keep \t \n \r
    if (code < 0x09 || (code > 0x0d && code < 0x20) || code === 0x0b || code === 0x0c) {
      continue;
    }
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = input.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        out += input.slice(i, i + 2);
        i++;
      } else {
        out += "\uFFFD";
      }
    } else if (code >= 0xdc00 && code <= 0xdfff) {
      out += "\uFFFD";
    } else {
      out += input[i];
    }
  }
  return out;
}

export function geminiUrl(model: string): string {
  const modelPath = model.startsWith("models/") ? model : `models/${model}`;
  return `https://generativelanguage.googleapis.com/v1beta/${modelPath}:generateContent`;
}

export async function generateGemini(prompt: string, settings: GenerateSettings): Promise<Generation> {
  const { apiKey } = settings;
  if (!apiKey) throw new Error("GEMINI_API_KEY not configured");

  const body = {
    contents: [{ role: "user", parts: [{ text: sanitizeUnicode(prompt) }] }],
    generationConfig: { temperature: settings.temperature }
  };

  const { data, latencyMs } = await postJson<GeminiGenerateContentResponse>(
    geminiUrl(settings.model),
    body,
    { "x-goog-api-key": apiKey },
    { timeoutMs: settings.timeoutMs, fetch: settings.fetch }
  );

  const text = sanitizeUnicode(
    data.candidates?.[0]?.content?.parts?.map((p) => p.text ?? "").join("").trim() ?? ""
  );

  if (!text) throw new Error("Empty Gemini response");
  return { text, latencyMs };
}
