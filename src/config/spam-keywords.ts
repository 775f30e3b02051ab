// Phrases common in unsolicited mail. Matched as lowercase substrings of
// "<subject> <body>".
export const DEFAULT_SPAM_KEYWORDS: readonly string[] = Object.freeze([
  'urgent',
  'lottery',
  'wire transfer',
  'click here',
  'limited time',
  'act now',
  'winner',
  'prize',
  'congratulations',
  'free money',
  'claim now',
  'expires soon',
  'guaranteed',
  'risk-free',
  'no obligation',
  'limited offer',
  'exclusive deal',
  'one-time offer',
  'act immediately',
  "don't miss out"
]);
