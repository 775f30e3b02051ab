// Mock googleapis before importing GmailClient
jest.mock('googleapis', () => ({
  google: {
    gmail: jest.fn(),
  },
}));

import { google } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import { GmailClient } from '../../services/gmail-client';
import { ExternalServiceError, RateLimitError } from '../../types/errors';
import { testMessages } from '../fixtures/test-emails';

function httpError(status: number, headers: Record<string, string> = {}): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    response: { status, headers }
  });
}

describe('GmailClient', () => {
  let messages: { list: jest.Mock; get: jest.Mock; modify: jest.Mock };
  let sleep: jest.Mock;
  let client: GmailClient;

  beforeEach(() => {
    jest.clearAllMocks();

    messages = {
      list: jest.fn(),
      get: jest.fn(),
      modify: jest.fn()
    };
    sleep = jest.fn().mockResolvedValue(undefined);
    client = new GmailClient(messages, { sleep });
  });

  describe('listUnreadMessageIds', () => {
    it('should query unread messages and return their ids', async () => {
      messages.list.mockResolvedValue({
        data: { messages: [{ id: 'a1', threadId: 't1' }, { threadId: 't2' }, { id: 'b2' }] }
      });

      const ids = await client.listUnreadMessageIds(10);

      expect(ids).toEqual(['a1', 'b2']);
      expect(messages.list).toHaveBeenCalledWith({ userId: 'me', q: 'is:unread', maxResults: 10 });
    });

    it('should return an empty list when there are no messages', async () => {
      messages.list.mockResolvedValue({ data: { resultSizeEstimate: 0 } });

      await expect(client.listUnreadMessageIds(5)).resolves.toEqual([]);
    });

    it('should wrap other failures in ExternalServiceError', async () => {
      messages.list.mockRejectedValue(httpError(500));

      const error = await client.listUnreadMessageIds(10).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ExternalServiceError);
      expect(error).not.toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({
        status: 500,
        code: 'EXTERNAL_SERVICE_ERROR',
        message: 'External service error (gmail): Failed to fetch unread messages: Request failed with status code 500'
      });
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('getMessage', () => {
    it('should fetch the full message', async () => {
      messages.get.mockResolvedValue({ data: testMessages.spam });

      const message = await client.getMessage('spam-1');

      expect(message).toBe(testMessages.spam);
      expect(messages.get).toHaveBeenCalledWith({ userId: 'me', id: 'spam-1', format: 'full' });
    });

    it('should name the message in errors', async () => {
      messages.get.mockRejectedValue(new Error('socket hang up'));

      await expect(client.getMessage('m-42')).rejects.toThrow(
        'External service error (gmail): Failed to get message m-42: socket hang up'
      );
    });
  });

  describe('moveToTrash', () => {
    it('should add the TRASH label and remove INBOX', async () => {
      messages.modify.mockResolvedValue({ data: { id: 'spam-1' } });

      await client.moveToTrash('spam-1');

      expect(messages.modify).toHaveBeenCalledWith({
        userId: 'me',
        id: 'spam-1',
        requestBody: {
          addLabelIds: ['TRASH'],
          removeLabelIds: ['INBOX']
        }
      });
    });
  });

  describe('rate limiting', () => {
    it('should retry once after the Retry-After delay', async () => {
      messages.get
        .mockRejectedValueOnce(httpError(429, { 'retry-after': '7' }))
        .mockResolvedValueOnce({ data: testMessages.safe });

      const message = await client.getMessage('safe-1');

      expect(message).toBe(testMessages.safe);
      expect(messages.get).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(7000);
    });

    it('should wait the default delay when Retry-After is missing', async () => {
      messages.modify
        .mockRejectedValueOnce(httpError(429))
        .mockResolvedValueOnce({ data: {} });

      await client.moveToTrash('spam-1');

      expect(sleep).toHaveBeenCalledWith(60000);
    });

    it('should read Retry-After from a Headers instance', async () => {
      const error = Object.assign(new Error('Too Many Requests'), {
        response: { status: 429, headers: new Headers({ 'Retry-After': '3' }) }
      });
      messages.list
        .mockRejectedValueOnce(error)
        .mockResolvedValueOnce({ data: { messages: [{ id: 'x' }] } });

      await expect(client.listUnreadMessageIds(1)).resolves.toEqual(['x']);
      expect(sleep).toHaveBeenCalledWith(3000);
    });

    it('should give up with RateLimitError after a second 429', async () => {
      messages.list.mockRejectedValue(httpError(429, { 'retry-after': '2' }));

      const error = await client.listUnreadMessageIds(10).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ retryAfterSeconds: 2, status: 429, code: 'RATE_LIMIT_ERROR' });
      expect(messages.list).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('should honor a configured default delay', async () => {
      client = new GmailClient(messages, { sleep, defaultRetryAfterSeconds: 1 });
      messages.get
        .mockRejectedValueOnce(httpError(429, { 'retry-after': 'soon' }))
        .mockResolvedValueOnce({ data: {} });

      await client.getMessage('m-1');

      expect(sleep).toHaveBeenCalledWith(1000);
    });
  });

  describe('fromAuth', () => {
    it('should build a client over the Gmail v1 messages resource', async () => {
      const resource = { list: jest.fn(), get: jest.fn(), modify: jest.fn() };
      resource.list.mockResolvedValue({ data: { messages: [{ id: 'z' }] } });
      (google.gmail as jest.Mock).mockReturnValue({ users: { messages: resource } });
      const auth = new OAuth2Client('test-client-id', 'test-client-secret');

      const gmailClient = GmailClient.fromAuth(auth);

      expect(google.gmail).toHaveBeenCalledWith({ version: 'v1', auth });
      await expect(gmailClient.listUnreadMessageIds(3)).resolves.toEqual(['z']);
    });
  });
});
