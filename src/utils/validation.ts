import { z } from 'zod';
import { ConfigurationError } from '../types/errors';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform(val => val === 'true' || val === '1');

const keywordList = z
  .string()
  .transform(val => val.split(',').map(keyword => keyword.trim()).filter(keyword => keyword.length > 0))
  .pipe(z.array(z.string()).min(1, 'At least one keyword is required'));

// Environment variables validation schema
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Triage run
  DRY_RUN: booleanFlag.default('true'),
  MAX_RESULTS: z.coerce.number().int().min(1).max(500).default(10),

  // OAuth2 client and persisted token
  GMAIL_CREDENTIALS_PATH: z.string().min(1).default('credentials.json'),
  GMAIL_TOKEN_PATH: z.string().min(1).default('token.json'),

  // Classifier
  SPAM_KEYWORDS: keywordList.optional(),
});

export type Environment = z.infer<typeof envSchema>;

export interface TriageConfig {
  nodeEnv: Environment['NODE_ENV'];
  logLevel: Environment['LOG_LEVEL'];
  dryRun: boolean;
  maxResults: number;
  credentialsPath: string;
  tokenPath: string;
  spamKeywords?: string[];
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TriageConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid environment variables: ${formatIssues(result.error)}`,
      result.error.flatten().fieldErrors
    );
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    dryRun: parsed.DRY_RUN,
    maxResults: parsed.MAX_RESULTS,
    credentialsPath: parsed.GMAIL_CREDENTIALS_PATH,
    tokenPath: parsed.GMAIL_TOKEN_PATH,
    spamKeywords: parsed.SPAM_KEYWORDS
  };
}
