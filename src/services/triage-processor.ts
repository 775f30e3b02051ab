import { ClassificationResult, SpamClassifier } from '../types/classification';
import { NormalizedEmail } from '../types/email';
import { describeError } from '../types/errors';
import { MailProvider } from '../types/mail-provider';
import { MessageVerdict, TriageError, TriageOptions, TriageSummary } from '../types/triage';
import { logger as baseLogger } from '../utils/logger';
import { ContentExtractor } from './content-extractor';

const logger = baseLogger.child({ module: 'TriageProcessor' });

export class TriageProcessor {
  private readonly mailProvider: MailProvider;
  private readonly classifier: SpamClassifier;
  private readonly extractor: ContentExtractor;
  private readonly options: TriageOptions;

  constructor(
    mailProvider: MailProvider,
    classifier: SpamClassifier,
    options: TriageOptions,
    extractor: ContentExtractor = new ContentExtractor()
  ) {
    this.mailProvider = mailProvider;
    this.classifier = classifier;
    this.options = options;
    this.extractor = extractor;
  }

  /**
   * Runs one pass over the unread inbox. Listing failures propagate; a failure
   * on a single message is recorded in the summary and the pass moves on.
   */
  async run(): Promise<TriageSummary> {
    const startTime = Date.now();
    const { dryRun, maxResults } = this.options;

    if (dryRun) {
      logger.warn('Dry run enabled, no email will be moved to trash');
    } else {
      logger.warn('Dry run disabled, spam WILL be moved to trash');
    }

    const messageIds = await this.mailProvider.listUnreadMessageIds(maxResults);
    logger.info({ count: messageIds.length }, 'Found unread messages');

    const results: MessageVerdict[] = [];
    const errors: TriageError[] = [];

    for (const [index, messageId] of messageIds.entries()) {
      const log = logger.child({ messageId, position: `${index + 1}/${messageIds.length}` });

      let email: NormalizedEmail;
      try {
        const raw = await this.mailProvider.getMessage(messageId);
        email = this.extractor.extract(raw);
        log.info({ from: email.fromEmail, subject: email.subject.substring(0, 50) }, 'Processing message');
      } catch (error) {
        errors.push(this.recordError(log, messageId, 'fetch', error));
        continue;
      }

      let classification: ClassificationResult;
      try {
        classification = this.classifier.classify(email.subject, email.body);
      } catch (error) {
        errors.push(this.recordError(log, messageId, 'classify', error));
        continue;
      }

      const verdict: MessageVerdict = {
        messageId,
        fromEmail: email.fromEmail,
        subject: email.subject,
        isSpam: classification.isSpam,
        confidence: classification.confidence,
        action: 'kept'
      };

      if (!classification.isSpam) {
        log.info({ confidence: classification.confidence }, 'Classified as safe');
        results.push(verdict);
        continue;
      }

      log.info({ confidence: classification.confidence }, 'Classified as spam');

      if (dryRun) {
        log.info('Dry run: would move message to trash');
        verdict.action = 'would-trash';
      } else {
        try {
          await this.mailProvider.moveToTrash(messageId);
          verdict.action = 'trashed';
        } catch (error) {
          errors.push(this.recordError(log, messageId, 'trash', error));
        }
      }

      results.push(verdict);
    }

    const spam = results.filter(result => result.isSpam).length;
    const summary: TriageSummary = {
      total: messageIds.length,
      spam,
      safe: results.length - spam,
      moved: results.filter(result => result.action === 'trashed').length,
      errors,
      dryRun,
      results,
      durationMs: Date.now() - startTime
    };

    logger.info({
      total: summary.total,
      spam: summary.spam,
      safe: summary.safe,
      moved: summary.moved,
      errors: summary.errors.length,
      dryRun,
      durationMs: summary.durationMs
    }, 'Triage completed');

    return summary;
  }

  private recordError(
    log: typeof logger,
    messageId: string,
    stage: TriageError['stage'],
    error: unknown
  ): TriageError {
    const message = describeError(error);
    log.error({ stage, err: error }, `Failed to ${stage} message`);
    return { messageId, stage, message };
  }
}
