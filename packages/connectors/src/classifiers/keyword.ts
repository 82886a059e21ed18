/**
 * Keyword Classifier
 *
 * Deterministic lexicon classifier for the classifier port. Used when no
 * model-backed classifier is configured, and as the offline default.
 *
 * Each matched bullish/bearish phrase adds weight to its class; neutral
 * carries a fixed prior. Ties between bullish and bearish resolve to neutral.
 */

import { readFileSync } from 'node:fs';
import type { SentimentClass, SentimentLabel } from '@tokenpulse/core';
import type { Classifier } from '../types.js';

export interface Lexicon {
  bullish: string[];
  bearish: string[];
}

const HIT_WEIGHT = 2;
const BASE_WEIGHT = 1;
const NEUTRAL_PRIOR = 2;

export function loadDefaultLexicon(): Lexicon {
  const raw = readFileSync(new URL('./lexicon.json', import.meta.url), 'utf8');
  const parsed: unknown = JSON.parse(raw);
  if (!isLexicon(parsed)) {
    throw new Error('lexicon.json must contain "bullish" and "bearish" string arrays');
  }
  return parsed;
}

function isLexicon(value: unknown): value is Lexicon {
  if (typeof value !== 'object' || value === null) return false;
  if (!('bullish' in value) || !('bearish' in value)) return false;
  return isStringArray(value.bullish) && isStringArray(value.bearish);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function phrasePattern(phrase: string): RegExp {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^a-z0-9])${escaped}(?=$|[^a-z0-9])`, 'i');
}

export class KeywordClassifier implements Classifier {
  readonly id = 'keyword';

  private bullish: RegExp[];
  private bearish: RegExp[];

  constructor(lexicon: Lexicon = loadDefaultLexicon()) {
    this.bullish = lexicon.bullish.map(phrasePattern);
    this.bearish = lexicon.bearish.map(phrasePattern);
  }

  /**
   * Number of distinct lexicon phrases of a class found in the text
   */
  countHits(text: string, label: SentimentLabel): number {
    const patterns = label === 'bullish' ? this.bullish : label === 'bearish' ? this.bearish : [];
    return patterns.filter((p) => p.test(text)).length;
  }

  async classify(text: string): Promise<SentimentClass> {
    const bullishWeight = BASE_WEIGHT + HIT_WEIGHT * this.countHits(text, 'bullish');
    const bearishWeight = BASE_WEIGHT + HIT_WEIGHT * this.countHits(text, 'bearish');
    const total = bullishWeight + bearishWeight + NEUTRAL_PRIOR;

    const probabilities: Record<SentimentLabel, number> = {
      bullish: bullishWeight / total,
      neutral: NEUTRAL_PRIOR / total,
      bearish: bearishWeight / total,
    };

    let label: SentimentLabel = 'neutral';
    if (bullishWeight > bearishWeight && bullishWeight > NEUTRAL_PRIOR) label = 'bullish';
    else if (bearishWeight > bullishWeight && bearishWeight > NEUTRAL_PRIOR) label = 'bearish';

    return { label, confidence: probabilities[label], probabilities };
  }
}
