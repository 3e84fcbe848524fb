import type { Command } from 'commander';
import chalk from 'chalk';
import { generateSynthetic } from '../modules/signals/synthetic.js';
import { formatCount, formatScore } from '../utils/format.js';

interface SynthOptions {
  json?: boolean;
}

/** Show the reproducible stand-in metrics a keyword gets when no provider answers. */
export function registerSynthCommand(program: Command): void {
  program
    .command('synth')
    .description('Print the deterministic synthetic metrics for keywords')
    .argument('<keywords...>', 'One or more keywords')
    .option('--json', 'Output as JSON')
    .action((keywords: string[], opts: SynthOptions) => {
      const rows = keywords.map(keyword => ({
        keyword,
        demand: generateSynthetic(keyword, 'demand'),
        competition: generateSynthetic(keyword, 'competition'),
        social: generateSynthetic(keyword, 'social'),
      }));

      if (opts.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }

      console.log('');
      for (const row of rows) {
        console.log(chalk.bold(`  ${row.keyword}`));
        console.log(`    volume ${formatCount(row.demand.monthlyVolume)} | difficulty ${formatScore(row.competition.difficulty)} | competitors ${formatCount(row.competition.competitorCount)}`);
        console.log(`    posts ${formatCount(row.social.tweetCount)} | engagement ${row.social.engagementRate.toFixed(2)} | ${row.social.sentiment}`);
      }
      console.log('');
    });
}
