import chalk from 'chalk';
import type { TopicAnalysis, RunResult } from '../modules/analysis/runner.js';
import { rankAnalyses } from '../modules/analysis/runner.js';
import { metricsInKeywordOrder, type AxisResult } from '../modules/analysis/axis-analyzer.js';
import type { Topic } from '../modules/topics/types.js';
import { AXES, SYNTHETIC_SOURCE, isSynthetic } from '../modules/signals/types.js';
import { formatCount, formatScore, padDisplay, scoreBar, summarizeKeywords, truncate } from '../utils/format.js';

const NAME_WIDTH = 28;

function scoreColor(score: number): (text: string) => string {
  if (score >= 60) return chalk.green;
  if (score >= 35) return chalk.yellow;
  return chalk.red;
}

function axisFlags(analysis: TopicAnalysis): string {
  const results: AxisResult[] = [analysis.demand, analysis.competition];
  if (analysis.social) results.push(analysis.social);
  const fallbacks = results.reduce((n, r) => n + r.fallbackKeywords.length, 0);

  const flags: string[] = [];
  if (fallbacks > 0) flags.push(chalk.yellow(`${fallbacks} fallback`));
  if (!analysis.complete) flags.push(chalk.red('partial'));
  return flags.join(' ');
}

export function printProviders(result: RunResult): void {
  const parts = AXES
    .filter(axis => axis !== 'social' || result.includeSocial)
    .map(axis => {
      const name = result.providers[axis];
      return `${axis}: ${name === SYNTHETIC_SOURCE ? chalk.yellow(name) : chalk.cyan(name)}`;
    });
  console.log(chalk.dim(`  Providers  ${parts.join(chalk.dim(' | '))}`));
}

export function printRanking(result: RunResult): void {
  const ranked = rankAnalyses(result);

  console.log(chalk.bold('\n  Topic Ranking'));
  console.log(chalk.dim('  ═'.repeat(30)));
  printProviders(result);
  console.log('');

  const header = `  ${'#'.padStart(2)}  ${padDisplay('Topic', NAME_WIDTH)} ${'Total'.padStart(5)}  ${'Dem'.padStart(5)} ${'Ease'.padStart(5)}${result.includeSocial ? ` ${'Soc'.padStart(5)}` : ''}`;
  console.log(chalk.dim(header));

  ranked.forEach((a, i) => {
    const s = a.score;
    const color = scoreColor(s.total);
    const social = result.includeSocial ? ` ${formatScore(s.social ?? 0).padStart(5)}` : '';
    console.log(
      `  ${String(i + 1).padStart(2)}  ${padDisplay(truncate(a.topic.name, 14), NAME_WIDTH)} ${color(formatScore(s.total).padStart(5))}  ` +
      `${formatScore(s.demand).padStart(5)} ${formatScore(s.competitionEase).padStart(5)}${social}  ` +
      `${color(scoreBar(s.total, 16))} ${axisFlags(a)}`,
    );
  });

  if (result.cancelled) {
    console.log(chalk.yellow('\n  Run was cancelled; scores cover the keywords measured before the stop.'));
  }
  console.log('');
}

function printTopicHeader(topic: Topic): void {
  console.log(chalk.bold(`\n  ${topic.name}`));
  if (topic.description) console.log(chalk.dim(`  ${topic.description}`));
  if (topic.audience) console.log(chalk.dim(`  Audience: ${topic.audience}`));
  console.log(chalk.dim(`  Keywords: ${summarizeKeywords(topic.keywords, 8)}`));
}

function sourceTag(metric: { source: string }): string {
  return isSynthetic(metric) ? chalk.yellow('synthetic') : chalk.cyan(metric.source);
}

/** Per-keyword drill-down for one topic. */
export function printTopicDetail(analysis: TopicAnalysis): void {
  printTopicHeader(analysis.topic);
  const s = analysis.score;
  const weights = Object.entries(s.weights).map(([k, v]) => `${k} ${v}`).join(', ');
  console.log(`  Total ${scoreColor(s.total)(formatScore(s.total))} ${chalk.dim(`(${weights})`)}`);

  console.log(chalk.bold(`\n    Demand ${formatScore(analysis.demand.axisScore)}`));
  for (const [keyword, m] of metricsInKeywordOrder(analysis.topic.keywords, analysis.demand)) {
    console.log(`      ${padDisplay(truncate(keyword, 16), 34)} vol ${formatCount(m.monthlyVolume).padStart(9)}  interest ${formatScore(m.interest).padStart(5)}  ${m.trend.padEnd(7)} ${sourceTag(m)}`);
  }

  console.log(chalk.bold(`\n    Competition ease ${formatScore(analysis.competition.axisScore)}`));
  for (const [keyword, m] of metricsInKeywordOrder(analysis.topic.keywords, analysis.competition)) {
    console.log(`      ${padDisplay(truncate(keyword, 16), 34)} difficulty ${formatScore(m.difficulty).padStart(5)}  competitors ${formatCount(m.competitorCount).padStart(9)}  ${sourceTag(m)}`);
  }

  if (analysis.social) {
    console.log(chalk.bold(`\n    Social ${formatScore(analysis.social.axisScore)}`));
    for (const [keyword, m] of metricsInKeywordOrder(analysis.topic.keywords, analysis.social)) {
      console.log(`      ${padDisplay(truncate(keyword, 16), 34)} posts ${formatCount(m.tweetCount).padStart(7)}  engagement ${m.engagementRate.toFixed(2).padStart(6)}  ${m.sentiment.padEnd(17)} ${sourceTag(m)}`);
    }
  }
  console.log('');
}

export function printTopicList(topics: readonly Topic[]): void {
  topics.forEach((topic, i) => {
    console.log(`  ${chalk.cyan(String(i + 1).padStart(2))}. ${chalk.bold(topic.name)}`);
    if (topic.description) console.log(chalk.dim(`      ${topic.description}`));
    if (topic.audience) console.log(chalk.dim(`      Audience: ${topic.audience}`));
    console.log(`      ${summarizeKeywords(topic.keywords, 8)}`);
  });
  console.log('');
}
