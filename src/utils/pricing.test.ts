import { describe, expect, it } from 'vitest';
import { calculateCostCents, modelDisplayName } from './pricing.js';

describe('calculateCostCents', () => {
  it('prices input and output tokens per million', () => {
    expect(calculateCostCents('claude-sonnet-4-5-20250929', 1_000_000, 1_000_000)).toBe(1800);
    expect(calculateCostCents('gpt-4o', 2_000_000, 0)).toBe(500);
  });

  it('charges nothing for unknown models', () => {
    expect(calculateCostCents('local-model', 1_000_000, 1_000_000)).toBe(0);
  });
});

describe('modelDisplayName', () => {
  it('shortens known model families', () => {
    expect(modelDisplayName('claude-haiku-4-5-20251001')).toBe('Haiku');
    expect(modelDisplayName('gpt-4o')).toBe('GPT-4o');
    expect(modelDisplayName('local-model')).toBe('local-model');
  });
});
