import { OAuth2Client } from 'google-auth-library';
import { gmail_v1, google } from 'googleapis';
import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import { RawMessage } from '../types/email';
import { ExternalServiceError, RateLimitError, describeError } from '../types/errors';
import { MailProvider } from '../types/mail-provider';
import { logger as baseLogger } from '../utils/logger';

const logger = baseLogger.child({ module: 'GmailClient' });

const SERVICE_NAME = 'gmail';
const DEFAULT_RETRY_AFTER_SECONDS = 60;

/**
 * The slice of `gmail.users.messages` the client uses. The real resource from
 * `google.gmail()` satisfies it, and so does a set of plain mocks.
 */
export interface GmailMessagesApi {
  list(params: gmail_v1.Params$Resource$Users$Messages$List): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
  get(params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<{ data: gmail_v1.Schema$Message }>;
  modify(params: gmail_v1.Params$Resource$Users$Messages$Modify): Promise<{ data: gmail_v1.Schema$Message }>;
}

export interface GmailClientOptions {
  sleep?: (ms: number) => Promise<void>;
  defaultRetryAfterSeconds?: number;
}

const httpErrorSchema = z.object({
  response: z.object({
    status: z.number(),
    headers: z.unknown().optional()
  })
});

const retryAfterHeaderSchema = z.object({
  'retry-after': z.union([z.string(), z.number()])
});

export class GmailClient implements MailProvider {
  private readonly messages: GmailMessagesApi;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly defaultRetryAfterSeconds: number;

  constructor(messages: GmailMessagesApi, options: GmailClientOptions = {}) {
    this.messages = messages;
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.defaultRetryAfterSeconds = options.defaultRetryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS;
  }

  static fromAuth(auth: OAuth2Client, options?: GmailClientOptions): GmailClient {
    const gmail = google.gmail({ version: 'v1', auth });
    return new GmailClient(gmail.users.messages, options);
  }

  async listUnreadMessageIds(maxResults: number): Promise<string[]> {
    const response = await this.withRateLimitRetry('fetch unread messages', () =>
      this.messages.list({
        userId: 'me',
        q: 'is:unread',
        maxResults
      })
    );

    const messages = response.data.messages ?? [];
    const messageIds = messages
      .map(message => message.id)
      .filter((id): id is string => typeof id === 'string' && id.length > 0);

    logger.info({ count: messageIds.length, maxResults }, 'Listed unread messages');
    return messageIds;
  }

  async getMessage(messageId: string): Promise<RawMessage> {
    const response = await this.withRateLimitRetry(`get message ${messageId}`, () =>
      this.messages.get({
        userId: 'me',
        id: messageId,
        format: 'full'
      })
    );

    return response.data;
  }

  async moveToTrash(messageId: string): Promise<void> {
    await this.withRateLimitRetry(`move message ${messageId} to trash`, () =>
      this.messages.modify({
        userId: 'me',
        id: messageId,
        requestBody: {
          addLabelIds: ['TRASH'],
          removeLabelIds: ['INBOX']
        }
      })
    );

    logger.info({ messageId }, 'Moved message to trash');
  }

  // A 429 is retried once after the server's Retry-After delay.
  private async withRateLimitRetry<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (this.getStatus(error) !== 429) {
        throw this.toServiceError(operation, error);
      }

      const retryAfterSeconds = this.getRetryAfterSeconds(error);
      logger.warn({ operation, retryAfterSeconds }, 'Gmail rate limit exceeded, retrying once');
      await this.sleep(retryAfterSeconds * 1000);

      try {
        return await call();
      } catch (retryError) {
        throw this.toServiceError(operation, retryError);
      }
    }
  }

  private toServiceError(operation: string, error: unknown): ExternalServiceError {
    const message = `Failed to ${operation}: ${describeError(error)}`;
    const status = this.getStatus(error);

    if (status === 429) {
      return new RateLimitError(SERVICE_NAME, message, this.getRetryAfterSeconds(error));
    }

    return new ExternalServiceError(SERVICE_NAME, message, status);
  }

  private getStatus(error: unknown): number | undefined {
    const parsed = httpErrorSchema.safeParse(error);
    return parsed.success ? parsed.data.response.status : undefined;
  }

  private getRetryAfterSeconds(error: unknown): number {
    const parsed = httpErrorSchema.safeParse(error);
    if (!parsed.success) {
      return this.defaultRetryAfterSeconds;
    }

    const headers = parsed.data.response.headers;
    let raw: string | number | null | undefined;

    if (headers instanceof Headers) {
      raw = headers.get('retry-after');
    } else {
      const header = retryAfterHeaderSchema.safeParse(headers);
      raw = header.success ? header.data['retry-after'] : undefined;
    }

    const seconds = typeof raw === 'number' ? raw : parseInt(raw ?? '', 10);
    return Number.isFinite(seconds) && seconds >= 0 ? seconds : this.defaultRetryAfterSeconds;
  }
}
