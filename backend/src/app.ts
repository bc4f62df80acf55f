import { randomUUID } from "node:crypto";
import express from "express";
import type { Candidate, ChatRequest, ChatTurn, ProviderResult, ProviderRole } from "./types";
import { PIPELINE_ERROR_PREFIX } from "./types";
import { safeLog } from "./utils/redact";
import { errorMessage } from "./utils/timeout";
import type { Pipeline } from "./llm/pipeline";
import { getDefaultPipeline } from "./llm/pipeline";

export type AppOptions = {
  pipeline?: () => Pipeline;
};

function getVersion(): string {
  return process.env.npm_package_version ?? process.env.APP_VERSION ?? "dev";
}

function toCandidate(role: ProviderRole, result: ProviderResult): Candidate {
  if (result.status === "ok") {
    return {
      role,
      provider: result.provider,
      model: result.model,
      status: "ok",
      text: result.text,
      latencyMs: result.latencyMs
    };
  }
  return {
    role,
    provider: result.provider,
    model: result.model,
    status: result.kind,
    errorMessage: result.message,
    latencyMs: result.latencyMs
  };
}

function normalizeHistory(value: unknown): ChatTurn[] {
  if (!Array.isArray(value)) return [];
  const turns: ChatTurn[] = [];
  for (const item of value) {
    if (!item || typeof item !== "object") continue;
    const { role, content } = item as { role?: unknown; content?: unknown };
    if ((role === "user" || role === "assistant") && typeof content === "string") {
      turns.push({ role, content });
    }
  }
  return turns;
}

export function createApp(options: AppOptions = {}) {
  const resolvePipeline = options.pipeline ?? getDefaultPipeline;
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") return res.sendStatus(200);
    next();
  });

  app.get("/api/hybrid/config", (_req, res) => {
    try {
      const { deps } = resolvePipeline();
      res.json({
        models: {
          primaryA: deps.primaryA.model,
          primaryB: deps.primaryB.model,
          arbiter: deps.synthesizer.model
        }
      });
    } catch (err) {
      res.status(500).json({ error: { code: "PIPELINE_FAILED", message: errorMessage(err) } });
    }
  });

  app.post("/api/hybrid/chat", async (req, res) => {
    const turnId = randomUUID();
    const body = (req.body ?? {}) as Partial<ChatRequest>;
    const threadId = typeof body.threadId === "string" && body.threadId.trim() ? body.threadId : randomUUID();
    const message = typeof body.message === "string" ? body.message : "";
    const history = normalizeHistory(body.history);

    if (!message.trim()) {
      return res.status(400).json({
        threadId,
        turnId,
        error: { code: "BAD_REQUEST", message: "message is required" }
      });
    }

    safeLog("[/api/hybrid/chat] request", { threadId, turnId, message });

    const nextHistory: ChatTurn[] = [...history, { role: "user", content: message }];

    try {
      const outcome = await resolvePipeline().execute(message);
      const responseBody = {
        threadId,
        turnId,
        reply: outcome.reply,
        synthesis: outcome.final.status,
        candidates: [
          toCandidate("primaryA", outcome.results.primaryA),
          toCandidate("primaryB", outcome.results.primaryB)
        ],
        history: [...nextHistory, { role: "assistant", content: outcome.reply }],
        timing: outcome.timing
      };
      safeLog("[/api/hybrid/chat] response", responseBody);
      return res.json(responseBody);
    } catch (err) {
      const reply = `${PIPELINE_ERROR_PREFIX}${errorMessage(err)}`;
      safeLog("[/api/hybrid/chat] pipeline_failed", { threadId, turnId, error: errorMessage(err) });
      return res.json({
        threadId,
        turnId,
        reply,
        error: { code: "PIPELINE_FAILED", message: errorMessage(err) },
        history: [...nextHistory, { role: "assistant", content: reply }]
      });
    }
  });

  app.get("/", (_req, res) => {
    res.type("text").send(`hybrid-agent-backend ${getVersion()}`);
  });

  return app;
}
