import { DEFAULT_SPAM_KEYWORDS } from '../config/spam-keywords';
import { KeywordClassificationResult, SpamClassifier } from '../types/classification';
import { logger as baseLogger } from '../utils/logger';

const logger = baseLogger.child({ module: 'SpamClassifier' });

// Each distinct matched keyword is worth twice its share of the list.
const MATCH_WEIGHT = 2.0;

/**
 * Flags a message when any keyword occurs in its lowercased subject and body.
 * Keywords are lowercased as given; surrounding spaces are kept and take part
 * in the match.
 */
export class KeywordSpamClassifier implements SpamClassifier {
  private readonly keywords: readonly string[];

  constructor(keywords: readonly string[] = DEFAULT_SPAM_KEYWORDS) {
    this.keywords = Object.freeze(this.normalizeKeywords(keywords));

    if (this.keywords.length === 0) {
      logger.warn('Keyword classifier has no keywords; every message will be classified as safe');
    }
  }

  getKeywords(): readonly string[] {
    return this.keywords;
  }

  classify(subject: string, body: string): KeywordClassificationResult {
    const text = `${subject} ${body}`.toLowerCase();
    const matchedKeywords = this.keywords.filter(keyword => text.includes(keyword));

    const totalKeywords = this.keywords.length;
    const confidence = totalKeywords > 0
      ? Math.min(1.0, (matchedKeywords.length / totalKeywords) * MATCH_WEIGHT)
      : 0.0;

    const result: KeywordClassificationResult = {
      isSpam: matchedKeywords.length > 0,
      confidence,
      matchedKeywords
    };

    logger.debug({ isSpam: result.isSpam, confidence, matchedKeywords }, 'Email classified');

    return result;
  }

  private normalizeKeywords(keywords: readonly string[]): string[] {
    const normalized = keywords
      .map(keyword => keyword.toLowerCase())
      .filter(keyword => keyword.trim().length > 0);

    return [...new Set(normalized)];
  }
}
