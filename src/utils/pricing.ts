/**
 * Model pricing: hardcoded rates per million tokens.
 */

interface ModelPricing {
  inputPerMTok: number;   // $ per 1M input tokens
  outputPerMTok: number;  // $ per 1M output tokens
}

const MODEL_PRICING: Record<string, ModelPricing> = {
  'claude-sonnet-4-5-20250929':   { inputPerMTok: 3,    outputPerMTok: 15 },
  'claude-haiku-4-5-20251001':    { inputPerMTok: 1,    outputPerMTok: 5  },
  'gpt-4o':                       { inputPerMTok: 2.5,  outputPerMTok: 10 },
  'gpt-4o-mini':                  { inputPerMTok: 0.15, outputPerMTok: 0.6 },
};

/**
 * Calculate the cost in cents for a given API call. Unknown models cost 0.
 */
export function calculateCostCents(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = MODEL_PRICING[model];
  if (!pricing) return 0;

  const inputCost = (inputTokens / 1_000_000) * pricing.inputPerMTok;
  const outputCost = (outputTokens / 1_000_000) * pricing.outputPerMTok;

  return (inputCost + outputCost) * 100; // convert to cents
}

/**
 * Get the display name for a model.
 */
export function modelDisplayName(model: string): string {
  if (model.includes('opus')) return 'Opus';
  if (model.includes('sonnet')) return 'Sonnet';
  if (model.includes('haiku')) return 'Haiku';
  if (model.startsWith('gpt-')) return model.replace(/^gpt-/, 'GPT-');
  return model;
}
