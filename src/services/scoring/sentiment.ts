import natural from 'natural';

/** Compound polarity in [-1, 1]; 0 for empty or neutral text. */
export type SentimentAnalyzer = (text: string) => number;

// Same normalisation VADER uses to squash a raw valence sum into (-1, 1).
const NORMALIZATION_ALPHA = 15;

export function normalizeValence(sum: number, alpha = NORMALIZATION_ALPHA): number {
  if (!Number.isFinite(sum) || sum === 0) return 0;
  return sum / Math.sqrt(sum * sum + alpha);
}

export function createAfinnSentimentAnalyzer(): SentimentAnalyzer {
  const tokenizer = new natural.WordTokenizer();
  const analyzer = new natural.SentimentAnalyzer('English', natural.PorterStemmer, 'afinn');

  return (text: string): number => {
    const tokens = tokenizer.tokenize(text.toLowerCase()) ?? [];
    if (tokens.length === 0) return 0;
    // getSentiment returns the per-token mean; the compound measure wants the sum.
    const mean = analyzer.getSentiment(tokens);
    return normalizeValence(mean * tokens.length);
  };
}
