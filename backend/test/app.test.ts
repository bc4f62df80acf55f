import test from "node:test";
import assert from "node:assert/strict";
import { createApp } from "../src/app";
import type { AppOptions } from "../src/app";
import { createProviderClient } from "../src/llm/client";
import { createPipeline } from "../src/llm/pipeline";
import { createSynthesizer } from "../src/llm/synthesizer";
import { BASE_SETTINGS, failingGenerate, fixedGenerate } from "./helpers";

const pipeline = createPipeline({
  primaryA: createProviderClient({
    ...BASE_SETTINGS,
    provider: "gpt",
    model: "gpt-3.5-turbo",
    generate: failingGenerate("connection reset")
  }),
  primaryB: createProviderClient({
    ...BASE_SETTINGS,
    provider: "gemini",
    model: "gemini-2.5-pro",
    generate: fixedGenerate("Paris is the capital of France.")
  }),
  synthesizer: createSynthesizer({
    ...BASE_SETTINGS,
    provider: "gemini",
    model: "gemini-arbiter",
    generate: fixedGenerate("Paris.")
  })
});

async function withServer(options: AppOptions, fn: (baseUrl: string) => Promise<void>): Promise<void> {
  const server = createApp(options).listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  assert.ok(address && typeof address === "object");
  try {
    await fn(`http://127.0.0.1:${address.port}`);
  } finally {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

function postChat(baseUrl: string, payload: unknown): Promise<Response> {
  return fetch(`${baseUrl}/api/hybrid/chat`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(payload)
  });
}

test("POST /api/hybrid/chat returns the synthesized reply and both candidates", async () => {
  await withServer({ pipeline: () => pipeline }, async (baseUrl) => {
    const res = await postChat(baseUrl, {
      threadId: "thread-1",
      message: "Capital of France?",
      history: [
        { role: "assistant", content: "Hello!" },
        { role: "system", content: "dropped" }
      ]
    });
    const body = JSON.parse(await res.text());

    assert.equal(res.status, 200);
    assert.equal(body.threadId, "thread-1");
    assert.equal(typeof body.turnId, "string");
    assert.equal(body.reply, "Paris.");
    assert.equal(body.synthesis, "ok");
    assert.deepEqual(body.candidates, [
      {
        role: "primaryA",
        provider: "gpt",
        model: "gpt-3.5-turbo",
        status: "error",
        errorMessage: "connection reset",
        latencyMs: body.candidates[0].latencyMs
      },
      {
        role: "primaryB",
        provider: "gemini",
        model: "gemini-2.5-pro",
        status: "ok",
        text: "Paris is the capital of France.",
        latencyMs: 0
      }
    ]);
    assert.deepEqual(body.history, [
      { role: "assistant", content: "Hello!" },
      { role: "user", content: "Capital of France?" },
      { role: "assistant", content: "Paris." }
    ]);
  });
});

test("POST /api/hybrid/chat rejects a blank message", async () => {
  await withServer({ pipeline: () => pipeline }, async (baseUrl) => {
    const res = await postChat(baseUrl, { threadId: "thread-1", message: "   " });
    const body = JSON.parse(await res.text());

    assert.equal(res.status, 400);
    assert.deepEqual(body.error, { code: "BAD_REQUEST", message: "message is required" });
  });
});

test("a pipeline failure is shown as a critical error reply", async () => {
  const broken: AppOptions = {
    pipeline: () => {
      throw new Error("client construction failed");
    }
  };

  await withServer(broken, async (baseUrl) => {
    const res = await postChat(baseUrl, { threadId: "thread-2", message: "hi" });
    const body = JSON.parse(await res.text());

    assert.equal(res.status, 200);
    assert.equal(body.reply, "A critical error occurred in the Agent pipeline: client construction failed");
    assert.deepEqual(body.error, { code: "PIPELINE_FAILED", message: "client construction failed" });
    assert.deepEqual(body.history, [
      { role: "user", content: "hi" },
      { role: "assistant", content: "A critical error occurred in the Agent pipeline: client construction failed" }
    ]);
  });
});

test("GET /api/hybrid/config lists the model of each role", async () => {
  await withServer({ pipeline: () => pipeline }, async (baseUrl) => {
    const res = await fetch(`${baseUrl}/api/hybrid/config`);

    assert.equal(res.status, 200);
    assert.deepEqual(JSON.parse(await res.text()), {
      models: { primaryA: "gpt-3.5-turbo", primaryB: "gemini-2.5-pro", arbiter: "gemini-arbiter" }
    });
  });
});
