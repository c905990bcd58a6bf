import { z } from 'zod';
import lexiconData from '../data/sentiment-lexicon.json';
import { SentimentScorer } from '../types';

const lexiconSchema = z.object({
  positive: z.array(z.string()),
  negative: z.array(z.string()),
  negators: z.array(z.string())
});

export type SentimentLexicon = z.infer<typeof lexiconSchema>;

export const DEFAULT_LEXICON: SentimentLexicon = lexiconSchema.parse(lexiconData);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z']+/)
    .map(token => token.replace(/^'+|'+$/g, ''))
    .filter(token => token.length > 0);
}

/**
 * Local keyword heuristic used when no external scorer is wired in.
 * Score is (positive - negative) / (positive + negative); a negator directly
 * before a keyword flips its polarity. Text without keywords scores 0.
 */
export class LexiconSentimentScorer implements SentimentScorer {
  private positive: Set<string>;
  private negative: Set<string>;
  private negators: Set<string>;

  constructor(lexicon: SentimentLexicon = DEFAULT_LEXICON) {
    this.positive = new Set(lexicon.positive);
    this.negative = new Set(lexicon.negative);
    this.negators = new Set(lexicon.negators);
  }

  async score(text: string): Promise<number> {
    return this.scoreSync(text);
  }

  scoreSync(text: string): number {
    const tokens = tokenize(text);
    let positive_count = 0;
    let negative_count = 0;

    tokens.forEach((token, index) => {
      const polarity = this.positive.has(token) ? 1 : this.negative.has(token) ? -1 : 0;
      if (polarity === 0) return;

      const negated = index > 0 && this.negators.has(tokens[index - 1]);
      const effective = negated ? -polarity : polarity;
      if (effective > 0) positive_count++;
      else negative_count++;
    });

    const total = positive_count + negative_count;
    if (total === 0) return 0;
    return (positive_count - negative_count) / total;
  }
}
