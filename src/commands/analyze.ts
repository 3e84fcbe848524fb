import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { getDb } from '../modules/state/db.js';
import { createRunModel } from '../modules/state/models/runs.js';
import { createGenerationModel } from '../modules/state/models/generations.js';
import { normalize } from '../modules/topics/normalizer.js';
import { FileTopicSource, type TopicSource } from '../modules/topics/sources.js';
import { GenreSuggester } from '../modules/topics/suggester.js';
import { createProviders, fetchBudgetMs } from '../modules/signals/providers/index.js';
import { rankAnalyses, runAnalysis } from '../modules/analysis/runner.js';
import { printRanking, printTopicDetail } from './render.js';
import { exitWithError, positiveInt, recordUsage, requireAnthropicKey } from './shared.js';

interface AnalyzeOptions {
  input?: string;
  count?: number;
  social?: boolean;
  concurrency?: number;
  timeout?: number;
  deadline?: number;
  topic?: string;
  detail?: boolean;
  json?: boolean;
  save: boolean;
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Score topics on demand, competition and (optionally) social signals')
    .option('-i, --input <file>', 'Read topics from a JSON file instead of asking for suggestions')
    .option('-n, --count <n>', 'Number of genres to request when suggesting', positiveInt)
    .option('--social', 'Include the social axis')
    .option('--concurrency <n>', 'Max in-flight provider calls', positiveInt)
    .option('--timeout <ms>', 'Per-call provider timeout in milliseconds', positiveInt)
    .option('--deadline <seconds>', 'Stop the run after this many seconds and keep partial results', positiveInt)
    .option('--topic <name>', 'Show the per-keyword breakdown for one topic')
    .option('--detail', 'Show the per-keyword breakdown for every topic')
    .option('--json', 'Output the run as JSON')
    .option('--no-save', 'Do not store the run in history')
    .action(async (opts: AnalyzeOptions) => {
      const quiet = opts.json ?? false;

      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);
      const deadline = opts.deadline === undefined
        ? undefined
        : setTimeout(() => controller.abort(), opts.deadline * 1000);

      try {
        const config = loadConfig();
        createLogger(config.logLevel);

        let source: TopicSource;
        let suggester: GenreSuggester | undefined;
        if (opts.input) {
          source = new FileTopicSource(opts.input);
        } else {
          requireAnthropicKey(config);
          suggester = new GenreSuggester(config.anthropicApiKey, opts.count ?? config.suggestionCount);
          source = suggester;
        }

        const loadSpinner = quiet ? undefined : ora(suggester ? 'Asking for genre suggestions...' : 'Loading topics...').start();
        const topics = normalize(await source.load());

        if (topics.length === 0) {
          loadSpinner?.warn('No topics found');
          if (quiet) console.log(JSON.stringify({ analyses: [] }, null, 2));
          return;
        }
        loadSpinner?.succeed(`${topics.length} topic(s) from ${source.name}`);

        const providerConfig = { ...config, fetchTimeoutMs: opts.timeout ?? config.fetchTimeoutMs };
        const providers = createProviders(providerConfig);

        const spinner = quiet ? undefined : ora(`Analyzing ${topics.length} topic(s)... (Ctrl-C keeps partial results)`).start();
        const result = await runAnalysis(topics, providers, {
          includeSocial: opts.social ?? false,
          maxConcurrency: opts.concurrency ?? config.maxConcurrency,
          fetchTimeoutMs: fetchBudgetMs(providerConfig),
          signal: controller.signal,
          weights: config.weights,
        });

        if (result.cancelled) {
          spinner?.warn(`Cancelled: ${result.analyses.length} of ${topics.length} topic(s) have data`);
        } else {
          spinner?.succeed('Analysis complete');
        }

        let runId: number | undefined;
        if (opts.save) {
          const db = getDb(config.dbPath);
          const generations = createGenerationModel(db);
          runId = createRunModel(db).save(result, source.name);
          const generationId = recordUsage(generations, suggester?.lastUsage ?? null);
          if (generationId !== undefined) generations.linkToRun(generationId, runId);
        }

        if (quiet) {
          console.log(JSON.stringify({ runId: runId ?? null, ...result }, null, 2));
          return;
        }

        printRanking(result);

        const detailed = opts.detail
          ? rankAnalyses(result)
          : result.analyses.filter(a => a.topic.name === opts.topic);
        if (opts.topic && detailed.length === 0) {
          console.log(chalk.yellow(`  No topic named "${opts.topic}" in this run.\n`));
        }
        detailed.forEach(printTopicDetail);

        if (runId !== undefined) {
          console.log(chalk.dim(`  Saved as run #${runId}. View again with \`history show ${runId}\`.\n`));
        }
      } catch (err) {
        exitWithError(err);
      } finally {
        clearTimeout(deadline);
        process.removeListener('SIGINT', onSigint);
      }
    });
}
