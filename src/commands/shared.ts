import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import type { Config } from '../config.js';
import { errorMessage } from '../modules/errors.js';
import { getLogger } from '../utils/logger.js';
import type { GenerationModel } from '../modules/state/models/generations.js';
import type { SuggestionUsage } from '../modules/topics/suggester.js';

/** commander argParser for positive integers. */
export function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

export function requireAnthropicKey(config: Config): void {
  if (!config.anthropicApiKey) {
    throw new Error('ANTHROPIC_API_KEY is required for genre suggestions. Set it in .env or pass --input <file>.');
  }
}

/** Store LLM token usage; returns the generation id. */
export function recordUsage(generations: GenerationModel, usage: SuggestionUsage | null): number | undefined {
  if (!usage) return undefined;
  return generations.record({
    purpose: 'genre-suggestion',
    model: usage.model,
    inputTokens: usage.inputTokens,
    outputTokens: usage.outputTokens,
  })?.id;
}

/** Print a run-level error in red and exit non-zero. */
export function exitWithError(err: unknown): never {
  getLogger().debug({ err }, 'Command failed');
  console.error(chalk.red(`\n  Error: ${errorMessage(err)}\n`));
  process.exit(1);
}
