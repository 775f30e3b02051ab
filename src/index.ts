#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { GoogleOAuthService } from './auth/google-oauth';
import { GmailClient } from './services/gmail-client';
import { KeywordSpamClassifier } from './services/spam-classifier';
import { TriageProcessor } from './services/triage-processor';
import { TriageSummary } from './types/triage';
import { handleError } from './types/errors';
import { TriageConfig, loadConfig } from './utils/validation';
import { logger } from './utils/logger';

function reportSummary(summary: TriageSummary): void {
  summary.results.forEach(result => {
    logger.info({
      messageId: result.messageId,
      from: result.fromEmail,
      subject: result.subject,
      confidence: `${(result.confidence * 100).toFixed(2)}%`,
      action: result.action
    }, result.isSpam ? '🚨 SPAM' : '✅ SAFE');
  });

  logger.info({
    total: summary.total,
    spam: summary.spam,
    safe: summary.safe,
    errors: summary.errors.length
  }, 'Processing complete');

  if (summary.dryRun) {
    logger.warn('Dry run was enabled, no emails were moved. Set DRY_RUN=false to enable filtering');
  } else {
    logger.info(`✓ ${summary.moved} email(s) moved to trash`);
  }
}

export async function main(): Promise<number> {
  let config: TriageConfig;
  try {
    config = loadConfig();
    logger.level = config.logLevel;
    logger.info('✅ Environment variables validated');
  } catch (error) {
    logger.error({ error: handleError(error) }, '❌ Invalid configuration');
    return 1;
  }

  try {
    const oauth = new GoogleOAuthService({
      credentialsPath: config.credentialsPath,
      tokenPath: config.tokenPath
    });
    const auth = await oauth.authorize();
    logger.info('✅ Authenticated with Gmail');

    const processor = new TriageProcessor(
      GmailClient.fromAuth(auth),
      new KeywordSpamClassifier(config.spamKeywords),
      { dryRun: config.dryRun, maxResults: config.maxResults }
    );

    const summary = await processor.run();
    if (summary.total === 0) {
      logger.info('No unread messages to process');
      return 0;
    }

    reportSummary(summary);
    return 0;
  } catch (error) {
    logger.error({ error: handleError(error) }, '❌ Triage run failed');
    return 1;
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.fatal({ err: error }, 'Unexpected failure');
      process.exitCode = 1;
    });
}
