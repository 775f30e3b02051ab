import {
  DecodeIssue,
  ExtractionResult,
  NormalizedEmail,
  RawMessage,
  RawMessageHeader,
  RawMessagePart
} from '../types/email';
import { decodeBase64Url, decodeHeaderValue } from '../utils/encoding';
import { logger as baseLogger } from '../utils/logger';

const logger = baseLogger.child({ module: 'ContentExtractor' });

const TEXT_MIME_TYPES = ['text/plain', 'text/html'];

interface BodySelection {
  body: string;
  issues: DecodeIssue[];
}

export class ContentExtractor {
  extract(message: RawMessage): NormalizedEmail {
    return this.extractWithDiagnostics(message).email;
  }

  /**
   * Same as {@link extract}, plus the decode failures that were absorbed on
   * the way. A message with issues still gets a complete record: failed
   * fields fall back to the raw header value or an empty body.
   */
  extractWithDiagnostics(message: RawMessage): ExtractionResult {
    const payload: RawMessagePart = message.payload ?? {};
    const headers = this.readHeaders(payload.headers ?? []);
    const issues: DecodeIssue[] = [];

    const subject = decodeHeaderValue(headers.subject);
    if (!subject.ok) {
      issues.push({ field: 'subject', reason: subject.reason });
    }

    const selection = this.extractBody(payload);
    issues.push(...selection.issues);

    if (issues.length > 0) {
      logger.warn({ messageId: message.id, issues }, 'Message content partially decoded');
    }

    return {
      email: {
        subject: subject.value,
        body: selection.body,
        snippet: message.snippet ?? '',
        fromEmail: headers.from
      },
      issues
    };
  }

  private readHeaders(headers: RawMessageHeader[]): { subject: string; from: string } {
    let subject = '';
    let from = '';

    headers.forEach(header => {
      const name = header.name?.toLowerCase();
      if (name === 'subject') {
        subject = header.value ?? '';
      } else if (name === 'from') {
        from = header.value ?? '';
      }
    });

    return { subject, from };
  }

  private extractBody(payload: RawMessagePart): BodySelection {
    const selection: BodySelection = { body: '', issues: [] };

    if (payload.parts) {
      this.selectFromParts(payload.parts, selection);
      return selection;
    }

    const data = payload.body?.data;
    if (payload.mimeType && TEXT_MIME_TYPES.includes(payload.mimeType) && data) {
      selection.body = this.decodeBody(data, selection);
    }

    return selection;
  }

  // Returns true once a text/plain part has been taken, which ends the scan.
  private selectFromParts(parts: RawMessagePart[], selection: BodySelection): boolean {
    for (const part of parts) {
      if (part.parts) {
        if (this.selectFromParts(part.parts, selection)) {
          return true;
        }
        continue;
      }

      const data = part.body?.data;
      if (!data) continue;

      if (part.mimeType === 'text/plain') {
        selection.body = this.decodeBody(data, selection);
        return true;
      }

      if (part.mimeType === 'text/html' && !selection.body) {
        selection.body = this.decodeBody(data, selection);
      }
    }

    return false;
  }

  private decodeBody(data: string, selection: BodySelection): string {
    const decoded = decodeBase64Url(data);
    if (!decoded.ok) {
      selection.issues.push({ field: 'body', reason: decoded.reason });
    }
    return decoded.value;
  }
}
