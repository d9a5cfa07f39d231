#!/usr/bin/env node
/**
 * Deep Research Agent — command-line entry point.
 *
 * Usage:
 *   npm start -- "history of the transistor" [--session <id>]
 *
 * Options:
 *   --session <id>  Session id used as the run's thread id and trace
 *                   session (default: a fresh UUID). Checkpoints live in
 *                   memory for this process only, so a later invocation
 *                   always starts a new run.
 *   -h, --help      Show help
 *
 * Exit codes:
 *   0 - Report written to stdout
 *   1 - Configuration or run failure
 *   2 - No query given
 */

import "dotenv/config";

import { randomUUID } from "node:crypto";
import { parseArgs } from "node:util";

import { SERVICE_NAME, VERSION, isLangfuseConfigured, loadConfig, validateConfig } from "./config";
import { createRunnerFromConfig, runResearch } from "./graphs/research-agent";
import { initializeLangfuse, shutdownLangfuse } from "./infra/tracing";
import { errorMessage } from "./models/errors";

const USAGE = `
Usage: deep-research-agent <query> [options]

Options:
  --session <id>  Session id for tracing (default: a fresh UUID).
                  Each invocation starts a new run.
  -h, --help      Show this help message
`;

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      session: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const query = positionals.join(" ").trim();
  if (query === "") {
    console.error(USAGE);
    return 2;
  }

  const config = loadConfig();
  validateConfig(config);

  console.info(`[${SERVICE_NAME}] v${VERSION} model=${config.modelName}`);
  await initializeLangfuse({
    enabled: isLangfuseConfigured(config),
    baseUrl: config.langfuseBaseUrl,
  });

  const sessionId = values.session ?? randomUUID();
  try {
    const runner = await createRunnerFromConfig(config);
    const state = await runResearch(query, sessionId, runner);

    console.info(
      `[${SERVICE_NAME}] session ${sessionId}: ${state.sections.length} sections, ` +
        `${state.searchQueries.length} queries, ${state.iterationCount} iterations, ` +
        `confidence=${state.confidenceScore === null ? "n/a" : `${(state.confidenceScore * 100).toFixed(1)}%`}`,
    );
    process.stdout.write(`${state.reportDraft}\n`);
    return 0;
  } finally {
    shutdownLangfuse();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`[${SERVICE_NAME}] ${errorMessage(error)}`);
    process.exitCode = 1;
  },
);
