export interface ClassificationResult {
  isSpam: boolean;
  confidence: number;
}

export interface KeywordClassificationResult extends ClassificationResult {
  matchedKeywords: string[];
}

/**
 * A spam classification strategy. The keyword matcher is the only one shipped;
 * anything else (a model-backed scorer, say) plugs in behind the same call.
 */
export interface SpamClassifier {
  classify(subject: string, body: string): ClassificationResult;
}
