import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import fs from 'node:fs';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { getDb } from '../modules/state/db.js';
import { createGenerationModel } from '../modules/state/models/generations.js';
import { normalize } from '../modules/topics/normalizer.js';
import { GenreSuggester } from '../modules/topics/suggester.js';
import { calculateCostCents, formatCents } from '../utils/pricing.js';
import { printTopicList } from './render.js';
import { exitWithError, positiveInt, recordUsage, requireAnthropicKey } from './shared.js';

interface SuggestOptions {
  count?: number;
  out?: string;
  json?: boolean;
}

export function registerSuggestCommand(program: Command): void {
  program
    .command('suggest')
    .description('Ask the model for candidate genres without scoring them')
    .option('-n, --count <n>', 'Number of genres', positiveInt)
    .option('-o, --out <file>', 'Write the genres as JSON, ready for `analyze --input`')
    .option('--json', 'Output as JSON')
    .action(async (opts: SuggestOptions) => {
      try {
        const config = loadConfig();
        createLogger(config.logLevel);
        requireAnthropicKey(config);
        const count = opts.count ?? config.suggestionCount;
        const suggester = new GenreSuggester(config.anthropicApiKey, count);

        const spinner = opts.json ? undefined : ora(`Requesting ${count} genre suggestions...`).start();
        const topics = normalize(await suggester.load());
        const usage = suggester.lastUsage;
        recordUsage(createGenerationModel(getDb(config.dbPath)), usage);

        const cost = usage ? calculateCostCents(usage.model, usage.inputTokens, usage.outputTokens) : 0;
        spinner?.succeed(`${topics.length} genre(s) suggested (${formatCents(cost)})`);

        if (opts.out) {
          fs.writeFileSync(opts.out, JSON.stringify({ genres: topics }, null, 2) + '\n', 'utf-8');
          if (!opts.json) console.log(chalk.dim(`  Written to ${opts.out}`));
        }

        if (opts.json) {
          console.log(JSON.stringify(topics, null, 2));
          return;
        }

        console.log('');
        printTopicList(topics);
      } catch (err) {
        exitWithError(err);
      }
    });
}
