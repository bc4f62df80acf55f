import type { FetchLike } from "../http";

export type GenerateSettings = {
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  fetch?: FetchLike;
};

export type Generation = { text: string; latencyMs: number };

export type GenerateFn = (prompt: string, settings: GenerateSettings) => Promise<Generation>;
