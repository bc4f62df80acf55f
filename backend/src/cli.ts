#!/usr/bin/env node
import { loadDotEnv } from "./env-file";
import { hybridAgentExecute } from "./llm/pipeline";
import { PIPELINE_ERROR_PREFIX } from "./types";
import { errorMessage } from "./utils/timeout";

const SAMPLE_PROMPT =
  "Explain the core difference between quantum computing and classical computing in simple terms, and name two modern cryptographic algorithms vulnerable to quantum attacks.";

async function main(argv: string[]): Promise<number> {
  loadDotEnv();
  const prompt = argv.join(" ").trim() || SAMPLE_PROMPT;
  const rule = "=".repeat(50);

  console.log("--- Running Hybrid Agent ---");
  try {
    const reply = await hybridAgentExecute(prompt);
    console.log(`\n${rule}\nFINAL SYNTHESIZED AGENT OUTPUT\n${rule}`);
    console.log(reply);
    return 0;
  } catch (err) {
    console.error(`${PIPELINE_ERROR_PREFIX}${errorMessage(err)}`);
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
