import { setTimeout as delay } from "node:timers/promises";
import type { FetchLike } from "../src/llm/http";
import type { GenerateFn, GenerateSettings } from "../src/llm/providers/types";

export type FetchCall = { url: string; init: RequestInit };

export function jsonFetch(status: number, payload: unknown, calls: FetchCall[] = []): FetchLike {
  return async (url, init) => {
    calls.push({ url, init });
    return new Response(JSON.stringify(payload), {
      status,
      statusText: status === 200 ? "OK" : "Internal Server Error"
    });
  };
}

/** A fetch that never answers and rejects only when its signal aborts. */
export function hangingFetch(): FetchLike {
  return (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      init.signal?.addEventListener("abort", () => reject(init.signal?.reason));
    });
}

export function sentBody(call: FetchCall | undefined): unknown {
  return JSON.parse(String(call?.init.body));
}

export type GenerateCall = { prompt: string; settings: GenerateSettings };

export function fixedGenerate(text: string, calls: GenerateCall[] = [], delayMs = 0): GenerateFn {
  return async (prompt, settings) => {
    calls.push({ prompt, settings });
    if (delayMs > 0) await delay(delayMs);
    return { text, latencyMs: delayMs };
  };
}

export function failingGenerate(message: string, calls: GenerateCall[] = []): GenerateFn {
  return async (prompt, settings) => {
    calls.push({ prompt, settings });
    throw new Error(message);
  };
}

export const BASE_SETTINGS: GenerateSettings = {
  apiKey: "test-key",
  model: "test-model",
  temperature: 0.5,
  timeoutMs: 0
};
