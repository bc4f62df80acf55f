import { withTimeout } from "../utils/timeout";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class HttpError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
    body: string
  ) {
    super(`HTTP ${status} ${statusText}: ${body.slice(0, 4000)}`);
    this.name = "HttpError";
  }
}

export type PostOptions = {
  timeoutMs: number;
  fetch?: FetchLike;
};

export async function postJson<T>(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options: PostOptions
): Promise<{ data: T; latencyMs: number }> {
  const doFetch = options.fetch ?? fetch;
  const { result, latencyMs } = await withTimeout(async (signal) => {
    const res = await doFetch(url, {
      method: "POST",
      headers: { "content-type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal
    });
    const text = await res.text();
    if (!res.ok) throw new HttpError(res.status, res.statusText, text);
    return JSON.parse(text) as T;
  }, options.timeoutMs);

  return { data: result, latencyMs };
}
