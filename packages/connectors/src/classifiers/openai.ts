/**
 * OpenAI Classifier
 *
 * Model-backed implementation of the classifier port. The model is asked for
 * JSON probabilities; the reply is validated and renormalized so the three
 * classes always sum to 1.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { SentimentClass, SentimentLabel } from '@tokenpulse/core';
import type { Classifier } from '../types.js';

export interface OpenAIClassifierConfig {
  apiKey: string;
  model?: string;
  client?: OpenAI;
}

const ReplySchema = z.object({
  bullish: z.number().min(0),
  neutral: z.number().min(0),
  bearish: z.number().min(0),
});

const SYSTEM_PROMPT =
  'You classify crypto social posts. Respond with JSON only: ' +
  '{"bullish": <0-1>, "neutral": <0-1>, "bearish": <0-1>} where the three numbers sum to 1.';

export class OpenAIClassifier implements Classifier {
  readonly id = 'openai';

  private openai: OpenAI;
  private model: string;

  constructor(config: OpenAIClassifierConfig) {
    this.openai = config.client ?? new OpenAI({ apiKey: config.apiKey });
    this.model = config.model ?? 'gpt-4o-mini';
  }

  async classify(text: string): Promise<SentimentClass> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: text.slice(0, 2000) },
      ],
      temperature: 0,
      max_tokens: 60,
    });

    const content = response.choices[0]?.message?.content ?? '';
    return parseClassifierReply(content);
  }
}

/**
 * Turn a model reply into a SentimentClass. Throws on anything that is not
 * the requested JSON shape.
 */
export function parseClassifierReply(content: string): SentimentClass {
  const jsonContent = content.replace(/```json\n?|\n?```/g, '').trim();

  let raw: unknown;
  try {
    raw = JSON.parse(jsonContent);
  } catch {
    throw new Error('Failed to parse classifier response');
  }

  const parsed = ReplySchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error('Classifier response missing class probabilities');
  }

  const total = parsed.data.bullish + parsed.data.neutral + parsed.data.bearish;
  if (total <= 0) {
    throw new Error('Classifier returned all-zero probabilities');
  }

  const probabilities: Record<SentimentLabel, number> = {
    bullish: parsed.data.bullish / total,
    neutral: parsed.data.neutral / total,
    bearish: parsed.data.bearish / total,
  };

  let label: SentimentLabel = 'neutral';
  if (probabilities.bullish > probabilities.neutral && probabilities.bullish > probabilities.bearish) {
    label = 'bullish';
  } else if (probabilities.bearish > probabilities.neutral && probabilities.bearish > probabilities.bullish) {
    label = 'bearish';
  }

  return { label, confidence: probabilities[label], probabilities };
}
