/**
 * Anthropic model pricing, dollars per million tokens.
 */

interface ModelPricing {
  inputPerMTok: number;
  outputPerMTok: number;
}

const MODEL_PRICING: Record<string, ModelPricing> = {
  'claude-opus-4-1-20250805':   { inputPerMTok: 15,   outputPerMTok: 75 },
  'claude-sonnet-4-5-20250929': { inputPerMTok: 3,    outputPerMTok: 15 },
  'claude-haiku-4-5-20251001':  { inputPerMTok: 1,    outputPerMTok: 5  },
};

/** Cost in cents of one call; unknown models cost 0. */
export function calculateCostCents(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = MODEL_PRICING[model];
  if (!pricing) return 0;

  const dollars =
    (inputTokens / 1_000_000) * pricing.inputPerMTok +
    (outputTokens / 1_000_000) * pricing.outputPerMTok;
  return dollars * 100;
}

export function formatCents(cents: number): string {
  return `$${(cents / 100).toFixed(cents > 0 && cents < 1 ? 4 : 2)}`;
}

export function modelDisplayName(model: string): string {
  if (model.includes('opus')) return 'Opus';
  if (model.includes('sonnet')) return 'Sonnet';
  if (model.includes('haiku')) return 'Haiku';
  return model;
}
