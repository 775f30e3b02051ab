export type TriageAction = 'trashed' | 'would-trash' | 'kept';

export interface TriageOptions {
  dryRun: boolean;
  maxResults: number;
}

export interface MessageVerdict {
  messageId: string;
  fromEmail: string;
  subject: string;
  isSpam: boolean;
  confidence: number;
  action: TriageAction;
}

export interface TriageError {
  messageId: string;
  stage: 'fetch' | 'classify' | 'trash';
  message: string;
}

export interface TriageSummary {
  total: number;
  spam: number;
  safe: number;
  moved: number;
  errors: TriageError[];
  dryRun: boolean;
  results: MessageVerdict[];
  durationMs: number;
}
