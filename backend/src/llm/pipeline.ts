import type { PipelineConfig } from "../config";
import { loadPipelineConfig } from "../config";
import type { FinalAnswer, ResultSet } from "../types";
import { renderFinal } from "../types";
import type { ProviderClient } from "./client";
import { createProviderClient } from "./client";
import { dispatch } from "./dispatcher";
import type { FetchLike } from "./http";
import type { Synthesizer } from "./synthesizer";
import { createSynthesizer } from "./synthesizer";

export type PipelineDeps = {
  primaryA: ProviderClient;
  primaryB: ProviderClient;
  synthesizer: Synthesizer;
};

export type PipelineOutcome = {
  results: ResultSet;
  final: FinalAnswer;
  reply: string;
  timing: { totalMs: number; dispatchMs: number; synthMs: number };
};

export interface Pipeline {
  readonly deps: PipelineDeps;
  execute(prompt: string): Promise<PipelineOutcome>;
  run(prompt: string): Promise<string>;
}

export function createPipeline(deps: PipelineDeps): Pipeline {
  const execute = async (prompt: string): Promise<PipelineOutcome> => {
    const startedAt = Date.now();
    const results = await dispatch(prompt, { primaryA: deps.primaryA, primaryB: deps.primaryB });
    const dispatchMs = Date.now() - startedAt;

    const final = await deps.synthesizer.synthesize(prompt, results.primaryA, results.primaryB);
    const totalMs = Date.now() - startedAt;

    return {
      results,
      final,
      reply: renderFinal(final),
      timing: { totalMs, dispatchMs, synthMs: totalMs - dispatchMs }
    };
  };

  return {
    deps,
    execute,
    run: async (prompt) => (await execute(prompt)).reply
  };
}

export function createPipelineFromConfig(config: PipelineConfig, fetchImpl?: FetchLike): Pipeline {
  return createPipeline({
    primaryA: createProviderClient({ ...config.primaryA, fetch: fetchImpl }),
    primaryB: createProviderClient({ ...config.primaryB, fetch: fetchImpl }),
    synthesizer: createSynthesizer({ ...config.arbiter, fetch: fetchImpl })
  });
}

let defaultPipeline: Pipeline | undefined;

export function getDefaultPipeline(): Pipeline {
  if (!defaultPipeline) defaultPipeline = createPipelineFromConfig(loadPipelineConfig());
  return defaultPipeline;
}

/** Runs one turn against the environment-configured models and returns the reply text. */
export async function hybridAgentExecute(prompt: string): Promise<string> {
  return getDefaultPipeline().run(prompt);
}
