import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { RunResult } from '../../analysis/runner.js';
import { rankAnalyses } from '../../analysis/runner.js';
import { SENTIMENTS } from '../../signals/types.js';
import { isRecord } from '../../../utils/guards.js';

export interface RunRecord {
  id: number;
  source: string;
  started_at: string;
  finished_at: string;
  cancelled: number;
  include_social: number;
  topic_count: number;
  top_topic: string | null;
  top_score: number | null;
  snapshot_json: string;
  created_at: string;
}

export type RunSummary = Omit<RunRecord, 'snapshot_json'>;

const demandMetric = z.object({
  interest: z.number(),
  trend: z.enum(['rising', 'falling', 'unknown']),
  monthlyVolume: z.number(),
  source: z.string(),
});

const competitionMetric = z.object({
  difficulty: z.number(),
  competitorCount: z.number(),
  source: z.string(),
});

const socialMetric = z.object({
  tweetCount: z.number(),
  engagementRate: z.number(),
  sentiment: z.enum(SENTIMENTS),
  source: z.string(),
});

function axisResult<A extends 'demand' | 'competition' | 'social', M extends z.ZodTypeAny>(axis: A, metric: M) {
  return z.object({
    axis: z.literal(axis),
    topicName: z.string(),
    // z.record skips a "__proto__" key, so validate entries and rebuild
    perKeyword: z
      .preprocess(v => (isRecord(v) ? Object.entries(v) : v), z.array(z.tuple([z.string(), metric])))
      .transform(entries => Object.fromEntries(entries)),
    axisScore: z.number(),
    fallbackKeywords: z.array(z.string()),
    complete: z.boolean(),
  });
}

const snapshotSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  cancelled: z.boolean(),
  includeSocial: z.boolean(),
  providers: z.object({ demand: z.string(), competition: z.string(), social: z.string() }),
  analyses: z.array(z.object({
    topic: z.object({
      name: z.string(),
      keywords: z.array(z.string()),
      description: z.string().optional(),
      audience: z.string().optional(),
    }),
    demand: axisResult('demand', demandMetric),
    competition: axisResult('competition', competitionMetric),
    social: axisResult('social', socialMetric).optional(),
    score: z.object({
      topicName: z.string(),
      total: z.number(),
      demand: z.number(),
      competitionEase: z.number(),
      social: z.number().optional(),
      weights: z.object({ demand: z.number(), competition: z.number(), social: z.number().optional() }),
    }),
    complete: z.boolean(),
  })),
});

/** Parse a stored snapshot back into a RunResult; null when it does not validate. */
export function parseSnapshot(json: string): RunResult | null {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return null;
  }
  const parsed = snapshotSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Append-only run history. A snapshot is written once per run and never
 * updated.
 */
export function createRunModel(db: Database.Database) {
  const insert = db.prepare(`
    INSERT INTO runs (source, started_at, finished_at, cancelled, include_social, topic_count, top_topic, top_score, snapshot_json)
    VALUES (@source, @started_at, @finished_at, @cancelled, @include_social, @topic_count, @top_topic, @top_score, @snapshot_json)
  `);
  const byId = db.prepare<[number | bigint], RunRecord>('SELECT * FROM runs WHERE id = ?');
  const recent = db.prepare<[number], RunSummary>(`
    SELECT id, source, started_at, finished_at, cancelled, include_social, topic_count, top_topic, top_score, created_at
    FROM runs ORDER BY id DESC LIMIT ?
  `);

  return {
    save(result: RunResult, source: string): number {
      const top = rankAnalyses(result)[0];
      const info = insert.run({
        source,
        started_at: result.startedAt,
        finished_at: result.finishedAt,
        cancelled: result.cancelled ? 1 : 0,
        include_social: result.includeSocial ? 1 : 0,
        topic_count: result.analyses.length,
        top_topic: top?.topic.name ?? null,
        top_score: top?.score.total ?? null,
        snapshot_json: JSON.stringify(result),
      });
      return Number(info.lastInsertRowid);
    },

    getRecent(limit = 20): RunSummary[] {
      return recent.all(limit);
    },

    get(id: number): RunRecord | undefined {
      return byId.get(id);
    },

    getSnapshot(id: number): RunResult | null {
      const row = byId.get(id);
      return row ? parseSnapshot(row.snapshot_json) : null;
    },
  };
}

export type RunModel = ReturnType<typeof createRunModel>;
