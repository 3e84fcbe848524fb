import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { getDb } from '../modules/state/db.js';
import { createRunModel } from '../modules/state/models/runs.js';
import { createGenerationModel } from '../modules/state/models/generations.js';
import { formatScore } from '../utils/format.js';
import { formatCents, modelDisplayName } from '../utils/pricing.js';
import { printRanking, printTopicDetail } from './render.js';
import { exitWithError, positiveInt } from './shared.js';

interface ListOptions {
  limit: number;
  json?: boolean;
}

interface ShowOptions {
  topic?: string;
  json?: boolean;
}

interface CostOptions {
  days: number;
  json?: boolean;
}

export function registerHistoryCommand(program: Command): void {
  const history = program
    .command('history')
    .description('Past analysis runs and suggestion cost');

  // ─── list ─────────────────────────────────────────────────────────────
  history
    .command('list')
    .description('List recent runs')
    .option('--limit <n>', 'Max runs', positiveInt, 20)
    .option('--json', 'Output as JSON')
    .action((opts: ListOptions) => {
      try {
        const config = loadConfig();
        createLogger(config.logLevel);
        const runs = createRunModel(getDb(config.dbPath)).getRecent(opts.limit);

        if (opts.json) {
          console.log(JSON.stringify(runs, null, 2));
          return;
        }

        if (runs.length === 0) {
          console.log(chalk.yellow('\n  No runs yet. Run `analyze` first.\n'));
          return;
        }

        console.log(chalk.bold('\n  Recent Runs'));
        console.log(chalk.dim('  ═'.repeat(25)));
        for (const r of runs) {
          const flags = [r.include_social ? 'social' : '', r.cancelled ? chalk.red('cancelled') : ''].filter(Boolean).join(' ');
          const top = r.top_topic ? `${r.top_topic} ${chalk.cyan(formatScore(r.top_score ?? 0))}` : chalk.dim('none');
          console.log(`  ${chalk.bold(`#${r.id}`)}  ${chalk.dim(r.started_at)}  ${r.topic_count} topic(s) from ${r.source}  top: ${top} ${flags}`);
        }
        console.log('');
      } catch (err) {
        exitWithError(err);
      }
    });

  // ─── show ─────────────────────────────────────────────────────────────
  history
    .command('show')
    .description('Show the ranking stored for a run')
    .argument('<id>', 'Run id', positiveInt)
    .option('--topic <name>', 'Show the per-keyword breakdown for one topic')
    .option('--json', 'Output as JSON')
    .action((id: number, opts: ShowOptions) => {
      try {
        const config = loadConfig();
        createLogger(config.logLevel);
        const snapshot = createRunModel(getDb(config.dbPath)).getSnapshot(id);

        if (!snapshot) throw new Error(`Run #${id} not found or unreadable`);

        if (opts.json) {
          console.log(JSON.stringify(snapshot, null, 2));
          return;
        }

        console.log(chalk.dim(`\n  Run #${id}, ${snapshot.startedAt}`));
        printRanking(snapshot);
        if (opts.topic) {
          const match = snapshot.analyses.filter(a => a.topic.name === opts.topic);
          if (match.length === 0) console.log(chalk.yellow(`  No topic named "${opts.topic}" in run #${id}.\n`));
          match.forEach(printTopicDetail);
        }
      } catch (err) {
        exitWithError(err);
      }
    });

  // ─── cost ─────────────────────────────────────────────────────────────
  history
    .command('cost')
    .description('Token usage and cost of genre suggestions')
    .option('--days <n>', 'Lookback window in days', positiveInt, 7)
    .option('--json', 'Output as JSON')
    .action((opts: CostOptions) => {
      try {
        const config = loadConfig();
        createLogger(config.logLevel);
        const summary = createGenerationModel(getDb(config.dbPath)).getCostSummary(opts.days);

        if (opts.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        console.log(chalk.bold(`\n  Suggestion Cost (last ${opts.days} days)`));
        console.log(chalk.dim('  ═'.repeat(25)));
        console.log(`  Calls: ${summary.totalCalls}  Tokens: ${summary.totalInputTokens} in / ${summary.totalOutputTokens} out`);
        console.log(`  Total: ${chalk.cyan(formatCents(summary.totalCostCents))}`);
        for (const [model, m] of Object.entries(summary.byModel)) {
          console.log(chalk.dim(`    ${modelDisplayName(model)}: ${m.calls} call(s), ${formatCents(m.costCents)}`));
        }
        console.log('');
      } catch (err) {
        exitWithError(err);
      }
    });
}
