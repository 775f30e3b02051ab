import { RawMessage } from './email';

export interface MailProvider {
  listUnreadMessageIds(maxResults: number): Promise<string[]>;
  getMessage(messageId: string): Promise<RawMessage>;
  moveToTrash(messageId: string): Promise<void>;
}
