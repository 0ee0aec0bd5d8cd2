import Sentiment from 'sentiment';
import { LoggerService } from './LoggerService';

/**
 * Maps text to a toxicity score in [0, 1]
 */
export interface ToxicityScorer {
  score(text: string): Promise<number>;
  warmup(): Promise<void>;
}

// AFINN weights run -5..5 per token; a comparative of -4 already reads as abuse
const SATURATION = 4;

/**
 * Lexicon scorer on the AFINN word list. Negative sentiment per token is
 * scaled into a toxicity score.
 */
export class SentimentToxicityScorer implements ToxicityScorer {
  private analyzer: Sentiment;
  private logger: LoggerService;

  constructor(logger: LoggerService) {
    this.analyzer = new Sentiment();
    this.logger = logger;
  }

  async score(text: string): Promise<number> {
    const result = this.analyzer.analyze(text);
    const negativity = Math.max(0, -result.comparative);
    const score = Math.min(1, negativity / SATURATION);
    return Math.round(score * 10000) / 10000;
  }

  async warmup(): Promise<void> {
    const started = Date.now();
    await this.score('warming up the moderation scorer');
    this.logger.info(`Toxicity scorer ready in ${Date.now() - started}ms`);
  }
}
