/**
 * CLI argument parsing
 */

import { isLLMProvider, type LLMProvider } from '../llm/llm-client';
import type { TerminalReason } from '../models/loop';

/**
 * Exit codes
 */
export const EXIT_CODES = {
  PASSED: 0,
  EXHAUSTED: 1,
  ERROR: 2,
} as const;

export class CLIUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIUsageError';
  }
}

export interface RunArguments {
  file: string;
  configPath?: string;
  knowledgeDir?: string;
  provider?: LLMProvider;
  model?: string;
  outFile?: string;
  auditDir?: string;
  maxIterations?: number;
}

export interface ServeArguments {
  port?: number;
  host?: string;
  configPath?: string;
  knowledgeDir?: string;
  provider?: LLMProvider;
  model?: string;
  auditDir?: string;
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CLIUsageError(`${flag} requires a value`);
  }
  return value;
}

function parseProvider(value: string): LLMProvider {
  if (!isLLMProvider(value)) {
    throw new CLIUsageError(`Invalid provider: ${value}. Must be openai or anthropic.`);
  }
  return value;
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 1 || port > 65535 || String(port) !== value) {
    throw new CLIUsageError(`Invalid port: ${value}. Must be a number between 1 and 65535.`);
  }
  return port;
}

/**
 * Parse `count <file>`
 */
export function parseCountArgs(args: string[]): { file: string } {
  const file = args.find(arg => !arg.startsWith('-'));
  if (!file) {
    throw new CLIUsageError('count requires a file');
  }
  return { file };
}

/**
 * Parse `run <file> [options]`
 */
export function parseRunArgs(args: string[]): RunArguments {
  let file: string | undefined;
  const result: Omit<RunArguments, 'file'> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--config') {
      result.configPath = requireValue(args, i++, arg);
    } else if (arg === '--knowledge') {
      result.knowledgeDir = requireValue(args, i++, arg);
    } else if (arg === '--provider') {
      result.provider = parseProvider(requireValue(args, i++, arg));
    } else if (arg === '--model') {
      result.model = requireValue(args, i++, arg);
    } else if (arg === '--out') {
      result.outFile = requireValue(args, i++, arg);
    } else if (arg === '--audit-dir') {
      result.auditDir = requireValue(args, i++, arg);
    } else if (arg === '--max-iterations') {
      const value = requireValue(args, i++, arg);
      const n = parseInt(value, 10);
      if (isNaN(n) || String(n) !== value) {
        throw new CLIUsageError(`Invalid --max-iterations: ${value}`);
      }
      result.maxIterations = n;
    } else if (arg.startsWith('-')) {
      throw new CLIUsageError(`Unknown option: ${arg}`);
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new CLIUsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (file === undefined) {
    throw new CLIUsageError('run requires a file');
  }
  return { file, ...result };
}

/**
 * Parse `serve [options]`
 */
export function parseServeArgs(args: string[]): ServeArguments {
  const result: ServeArguments = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--port') {
      result.port = parsePort(requireValue(args, i++, arg));
    } else if (arg === '--host') {
      result.host = requireValue(args, i++, arg);
    } else if (arg === '--config') {
      result.configPath = requireValue(args, i++, arg);
    } else if (arg === '--knowledge') {
      result.knowledgeDir = requireValue(args, i++, arg);
    } else if (arg === '--provider') {
      result.provider = parseProvider(requireValue(args, i++, arg));
    } else if (arg === '--model') {
      result.model = requireValue(args, i++, arg);
    } else if (arg === '--audit-dir') {
      result.auditDir = requireValue(args, i++, arg);
    } else {
      throw new CLIUsageError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

/**
 * Cancelled runs count as a soft failure, like exhaustion
 */
export function exitCodeFor(reason: TerminalReason): number {
  switch (reason) {
    case 'passed':
      return EXIT_CODES.PASSED;
    case 'exhausted':
    case 'cancelled':
      return EXIT_CODES.EXHAUSTED;
    case 'error':
      return EXIT_CODES.ERROR;
  }
}
