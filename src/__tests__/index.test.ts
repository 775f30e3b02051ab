jest.mock('googleapis', () => ({
  google: {
    gmail: jest.fn(),
  },
}));

jest.mock('../auth/google-oauth');

import { OAuth2Client } from 'google-auth-library';
import { GoogleOAuthService } from '../auth/google-oauth';
import { main } from '../index';
import { GmailClient } from '../services/gmail-client';
import { testMessages } from './fixtures/test-emails';

describe('main', () => {
  const originalEnv = process.env;
  let messages: { list: jest.Mock; get: jest.Mock; modify: jest.Mock };

  beforeEach(() => {
    jest.clearAllMocks();
    process.env = { ...originalEnv, LOG_LEVEL: 'silent', DRY_RUN: 'false', MAX_RESULTS: '5' };

    messages = { list: jest.fn(), get: jest.fn(), modify: jest.fn() };
    messages.list.mockResolvedValue({ data: { messages: [{ id: 'spam-1' }, { id: 'safe-1' }] } });
    messages.get.mockImplementation(({ id }: { id: string }) =>
      Promise.resolve({ data: id === 'spam-1' ? testMessages.spam : testMessages.safe })
    );
    messages.modify.mockResolvedValue({ data: {} });

    jest.mocked(GoogleOAuthService.prototype.authorize).mockResolvedValue(new OAuth2Client());
    jest.spyOn(GmailClient, 'fromAuth').mockReturnValue(new GmailClient(messages));
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  it('should triage the inbox and exit cleanly', async () => {
    await expect(main()).resolves.toBe(0);

    expect(GoogleOAuthService).toHaveBeenCalledWith({
      credentialsPath: 'credentials.json',
      tokenPath: 'token.json'
    });
    expect(messages.list).toHaveBeenCalledWith({ userId: 'me', q: 'is:unread', maxResults: 5 });
    expect(messages.modify).toHaveBeenCalledTimes(1);
    expect(messages.modify).toHaveBeenCalledWith(expect.objectContaining({ id: 'spam-1' }));
  });

  it('should honor a keyword override', async () => {
    process.env.SPAM_KEYWORDS = 'agenda';

    await expect(main()).resolves.toBe(0);

    expect(messages.modify).toHaveBeenCalledTimes(1);
    expect(messages.modify).toHaveBeenCalledWith(expect.objectContaining({ id: 'safe-1' }));
  });

  it('should exit with 1 on invalid configuration', async () => {
    process.env.DRY_RUN = 'maybe';

    await expect(main()).resolves.toBe(1);
    expect(GoogleOAuthService).not.toHaveBeenCalled();
  });

  it('should exit with 1 when authorization fails', async () => {
    jest.mocked(GoogleOAuthService.prototype.authorize).mockRejectedValue(new Error('access_denied'));

    await expect(main()).resolves.toBe(1);
    expect(messages.list).not.toHaveBeenCalled();
  });

  it('should exit with 1 when listing fails', async () => {
    messages.list.mockRejectedValue(new Error('unauthorized'));

    await expect(main()).resolves.toBe(1);
  });
});
