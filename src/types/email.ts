// Structural subset of the Gmail API message resource. Fields are optional and
// nullable because that is how the API client types them, so a
// gmail_v1.Schema$Message can be passed in directly.
export interface RawMessageHeader {
  name?: string | null;
  value?: string | null;
}

export interface RawMessagePart {
  mimeType?: string | null;
  headers?: RawMessageHeader[] | null;
  body?: {
    data?: string | null;
  } | null;
  parts?: RawMessagePart[] | null;
}

export interface RawMessage {
  id?: string | null;
  snippet?: string | null;
  payload?: RawMessagePart | null;
}

export interface NormalizedEmail {
  subject: string;
  body: string;
  snippet: string;
  fromEmail: string;
}

export type DecodedField = 'subject' | 'body';

export interface DecodeIssue {
  field: DecodedField;
  reason: string;
}

// Decoding never throws; a failed decode still carries the value to use.
export type DecodeResult =
  | { ok: true; value: string }
  | { ok: false; value: string; reason: string };

export interface ExtractionResult {
  email: NormalizedEmail;
  issues: DecodeIssue[];
}
