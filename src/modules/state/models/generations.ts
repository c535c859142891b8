import type Database from 'better-sqlite3';
import { calculateCostCents } from '../../../utils/pricing.js';

export interface GenerationRecord {
  id: number;
  purpose: string;
  provider: string;
  model: string;
  input_tokens: number;
  output_tokens: number;
  cost_cents: number;
  created_at: string;
}

export interface RecordGenerationInput {
  purpose: string;
  provider: string;
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

export function createGenerationModel(db: Database.Database) {
  const insert = db.prepare(`
    INSERT INTO generations (purpose, provider, model, input_tokens, output_tokens, cost_cents)
    VALUES (@purpose, @provider, @model, @input_tokens, @output_tokens, @cost_cents)
  `);

  return {
    record(input: RecordGenerationInput): GenerationRecord {
      const info = insert.run({
        purpose: input.purpose,
        provider: input.provider,
        model: input.model,
        input_tokens: input.inputTokens,
        output_tokens: input.outputTokens,
        cost_cents: calculateCostCents(input.model, input.inputTokens, input.outputTokens),
      });
      return db.prepare('SELECT * FROM generations WHERE id = ?').get(info.lastInsertRowid) as GenerationRecord;
    },

    getCostSummary(days = 7): CostSummary {
      const rows = db.prepare(
        `SELECT * FROM generations WHERE created_at >= datetime('now', '-' || ? || ' days')`
      ).all(days) as GenerationRecord[];

      const byModel: Record<string, { costCents: number; calls: number }> = {};
      const byPurpose: Record<string, { costCents: number; calls: number }> = {};
      let totalCostCents = 0;
      let totalInputTokens = 0;
      let totalOutputTokens = 0;

      for (const row of rows) {
        totalCostCents += row.cost_cents;
        totalInputTokens += row.input_tokens;
        totalOutputTokens += row.output_tokens;

        const model = (byModel[row.model] ??= { costCents: 0, calls: 0 });
        model.costCents += row.cost_cents;
        model.calls += 1;

        const purpose = (byPurpose[row.purpose] ??= { costCents: 0, calls: 0 });
        purpose.costCents += row.cost_cents;
        purpose.calls += 1;
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
