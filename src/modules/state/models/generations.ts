import type Database from 'better-sqlite3';
import { calculateCostCents } from '../../../utils/pricing.js';

export interface GenerationRecord {
  id: number;
  run_id: number | null;
  purpose: string;
  model: string;
  input_tokens: number;
  output_tokens: number;
  cost_cents: number;
  created_at: string;
}

export interface RecordGenerationInput {
  runId?: number;
  purpose: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export interface CostSummary {
  totalCostCents: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  byModel: Record<string, { costCents: number; calls: number }>;
  byPurpose: Record<string, { costCents: number; calls: number }>;
  totalCalls: number;
}

function bump(bucket: Record<string, { costCents: number; calls: number }>, key: string, costCents: number): void {
  const entry = bucket[key] ?? { costCents: 0, calls: 0 };
  entry.costCents += costCents;
  entry.calls += 1;
  bucket[key] = entry;
}

export function createGenerationModel(db: Database.Database) {
  const insert = db.prepare(`
    INSERT INTO generations (run_id, purpose, model, input_tokens, output_tokens, cost_cents)
    VALUES (@run_id, @purpose, @model, @input_tokens, @output_tokens, @cost_cents)
  `);
  const byId = db.prepare<[number | bigint], GenerationRecord>('SELECT * FROM generations WHERE id = ?');
  const since = db.prepare<[number], GenerationRecord>(
    `SELECT * FROM generations WHERE created_at >= datetime('now', '-' || ? || ' days')`,
  );

  return {
    record(input: RecordGenerationInput): GenerationRecord | undefined {
      const info = insert.run({
        run_id: input.runId ?? null,
        purpose: input.purpose,
        model: input.model,
        input_tokens: input.inputTokens,
        output_tokens: input.outputTokens,
        cost_cents: calculateCostCents(input.model, input.inputTokens, input.outputTokens),
      });
      return byId.get(info.lastInsertRowid);
    },

    /** Attach a suggestion call to the run it fed. */
    linkToRun(generationId: number, runId: number): void {
      db.prepare('UPDATE generations SET run_id = ? WHERE id = ?').run(runId, generationId);
    },

    getCostSummary(days = 7): CostSummary {
      const rows = since.all(days);

      const byModel: CostSummary['byModel'] = {};
      const byPurpose: CostSummary['byPurpose'] = {};
      let totalCostCents = 0;
      let totalInputTokens = 0;
      let totalOutputTokens = 0;

      for (const row of rows) {
        totalCostCents += row.cost_cents;
        totalInputTokens += row.input_tokens;
        totalOutputTokens += row.output_tokens;
        bump(byModel, row.model, row.cost_cents);
        bump(byPurpose, row.purpose, row.cost_cents);
      }

      return {
        totalCostCents,
        totalInputTokens,
        totalOutputTokens,
        byModel,
        byPurpose,
        totalCalls: rows.length,
      };
    },
  };
}

export type GenerationModel = ReturnType<typeof createGenerationModel>;
