#!/usr/bin/env node
/**
 * Article Quality Gate - CLI Entry Point
 *
 * Usage:
 *   quality-gate count <file>             - Word and section count
 *   quality-gate run <file> [options]     - Run the revision loop on an article
 *   quality-gate serve [--port <number>]  - Start the HTTP job API
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadGateConfig, type LoadedConfig } from '../config/gate-config';
import { createLLMCapabilities } from '../capabilities/llm';
import type { QualityGateCapabilities } from '../capabilities/types';
import { countSections } from '../document/sections';
import { countWords } from '../document/word-counter';
import { EventStore } from '../events/event-store';
import { QualityGateError } from '../errors/gate-error';
import { JobService } from '../jobs/job-service';
import { InMemoryKnowledgeStore } from '../knowledge/in-memory-knowledge-store';
import { LLMClient, type LLMProvider } from '../llm/llm-client';
import { getGateLogger, type GateLogger } from '../logging/gate-logger';
import { createDocument } from '../models/document';
import { QualityGateController } from '../quality-gate/quality-gate-controller';
import { WebServer } from '../web/server';
import {
  CLIUsageError,
  EXIT_CODES,
  exitCodeFor,
  parseCountArgs,
  parseRunArgs,
  parseServeArgs,
  type RunArguments,
  type ServeArguments,
} from './args';

/**
 * Help text
 */
const HELP_TEXT = `
Article Quality Gate - CLI

Usage:
  quality-gate <command> [options]

Commands:
  count <file>           Print word and section counts of a Markdown article
  run <file>             Evaluate and revise an article until it passes
  serve                  Start the HTTP job API

Run Options:
  --config <path>        Configuration file (default: config/quality-gate.yaml)
  --knowledge <dir>      Directory of .md/.txt evidence for claim verification
  --provider <provider>  openai | anthropic (default: from config)
  --model <name>         Model name (default: from config or provider default)
  --max-iterations <n>   Revision budget (1-10)
  --out <file>           Write the best draft here
  --audit-dir <dir>      Record iteration events as JSONL under <dir>/events

Serve Options:
  --port <number>        Port (default: 5680)
  --host <host>          Host (default: localhost)
  --config, --knowledge, --provider, --model, --audit-dir as for run

General Options:
  --help, -h             Show this help message
  --version, -v          Show version

Exit codes:
  0  passed
  1  exhausted or cancelled (best draft still written)
  2  error or invalid usage

Environment:
  OPENAI_API_KEY / ANTHROPIC_API_KEY   API key for the selected provider
  QUALITY_GATE_MAX_ITERATIONS          Override maxIterations
  QUALITY_GATE_PASS_THRESHOLD          Override passThreshold
  QUALITY_GATE_MIN_WORD_COUNT          Override minWordCount
`;

/**
 * Version - read from package.json
 */
function readVersion(): string {
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

function readArticle(file: string): string {
  const resolved = path.resolve(process.cwd(), file);
  if (!fs.existsSync(resolved)) {
    throw new CLIUsageError(`File not found: ${file}`);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function buildCapabilities(
  loaded: LoadedConfig,
  options: { provider?: LLMProvider; model?: string; knowledgeDir?: string },
  logger: GateLogger
): QualityGateCapabilities {
  const provider = options.provider ?? loaded.llm.provider;
  const client = LLMClient.fromEnv(provider, options.model ?? loaded.llm.model, {
    temperature: loaded.llm.temperature,
    maxTokens: loaded.llm.maxTokens,
  });

  let knowledgeStore = new InMemoryKnowledgeStore();
  if (options.knowledgeDir) {
    knowledgeStore = InMemoryKnowledgeStore.fromDirectory(path.resolve(process.cwd(), options.knowledgeDir));
    logger.info('CONFIG', `Loaded ${knowledgeStore.size} evidence passage(s) from ${options.knowledgeDir}`);
  } else {
    logger.warn('CONFIG', 'No --knowledge directory; every claim will be unverified');
  }

  logger.info('CONFIG', `Using ${provider} model ${client.getModel()}`);
  return createLLMCapabilities(client, knowledgeStore);
}

function runCount(args: string[]): number {
  const { file } = parseCountArgs(args);
  const body = readArticle(file);
  console.log(JSON.stringify({ word_count: countWords(body), section_count: countSections(body) }, null, 2));
  return EXIT_CODES.PASSED;
}

async function runGate(runArgs: RunArguments): Promise<number> {
  const logger = getGateLogger();
  const body = readArticle(runArgs.file);
  const loaded = loadGateConfig(runArgs.configPath, { logger });
  const capabilities = buildCapabilities(loaded, runArgs, logger);

  const eventStore = runArgs.auditDir
    ? new EventStore({ stateDir: path.resolve(process.cwd(), runArgs.auditDir), logger })
    : undefined;
  const controller = new QualityGateController(capabilities, { logger, eventStore });

  const abort = new AbortController();
  const onSigint = (): void => {
    logger.warn('ROUTING', 'Cancellation requested; stopping after the current step');
    abort.abort();
  };
  process.once('SIGINT', onSigint);

  const document = createDocument(body, { title: path.basename(runArgs.file) });
  const config = runArgs.maxIterations !== undefined
    ? { ...loaded.gate, maxIterations: runArgs.maxIterations }
    : loaded.gate;

  const result = await controller
    .run(document, config, { signal: abort.signal })
    .finally(() => process.removeListener('SIGINT', onSigint));

  if (runArgs.outFile) {
    fs.writeFileSync(path.resolve(process.cwd(), runArgs.outFile), result.finalDocument.body, 'utf-8');
  }

  console.log(JSON.stringify({
    terminal_reason: result.terminalReason,
    iterations_used: result.iterationsUsed,
    final_revision: result.finalDocument.revisionNumber,
    overall_score: result.finalReport?.overallScore ?? null,
    word_count: result.finalReport?.wordCount ?? null,
    issues: result.finalReport?.issues ?? [],
    error: result.error,
    out: runArgs.outFile,
  }, null, 2));

  return exitCodeFor(result.terminalReason);
}

async function serve(serveArgs: ServeArguments, version: string): Promise<void> {
  const logger = getGateLogger();
  const loaded = loadGateConfig(serveArgs.configPath, { logger });
  const capabilities = buildCapabilities(loaded, serveArgs, logger);

  const eventStore = serveArgs.auditDir
    ? new EventStore({ stateDir: path.resolve(process.cwd(), serveArgs.auditDir), logger })
    : undefined;
  const controller = new QualityGateController(capabilities, { logger, eventStore });
  const jobService = new JobService(controller, { logger, eventStore });

  const server = new WebServer({
    port: serveArgs.port,
    host: serveArgs.host,
    jobService,
    baseConfig: loaded.gate,
    logger,
    version,
  });
  await server.start();

  const state = server.getState();
  logger.info('JOB', `Quality gate API listening on http://${state.host}:${state.port}`);

  const shutdown = (): void => {
    logger.info('JOB', 'Shutting down');
    server.stop().then(
      () => process.exit(EXIT_CODES.PASSED),
      (error: unknown) => {
        logger.logError('Server shutdown failed', error);
        process.exit(EXIT_CODES.ERROR);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(HELP_TEXT);
    process.exit(args.length === 0 ? EXIT_CODES.ERROR : EXIT_CODES.PASSED);
  }

  const version = readVersion();
  if (args.includes('--version') || args.includes('-v')) {
    console.log(version);
    process.exit(EXIT_CODES.PASSED);
  }

  const [command, ...restArgs] = args;

  try {
    switch (command) {
      case 'count':
        process.exit(runCount(restArgs));
        break;

      case 'run':
        process.exit(await runGate(parseRunArgs(restArgs)));
        break;

      case 'serve':
        await serve(parseServeArgs(restArgs), version);
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.log(HELP_TEXT);
        process.exit(EXIT_CODES.ERROR);
    }
  } catch (err) {
    if (err instanceof CLIUsageError) {
      console.error(`Error: ${err.message}`);
      console.error('Run quality-gate --help for usage.');
    } else if (err instanceof QualityGateError) {
      console.error(JSON.stringify({
        error: {
          code: err.code,
          message: err.message,
        },
      }, null, 2));
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run main
main().catch((err: unknown) => {
  console.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(EXIT_CODES.ERROR);
});
