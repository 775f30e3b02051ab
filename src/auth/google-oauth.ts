import { authenticate } from '@google-cloud/local-auth';
import { Credentials, OAuth2Client } from 'google-auth-library';
import { promises as fs } from 'fs';
import { AuthorizedUser, ClientKey, authorizedUserSchema, clientSecretsSchema } from '../schemas/auth';
import { AuthenticationError, ConfigurationError, describeError } from '../types/errors';
import { formatIssues } from '../utils/validation';
import { logger as baseLogger } from '../utils/logger';

const logger = baseLogger.child({ module: 'GoogleOAuth' });

export const GMAIL_SCOPES = ['https://www.googleapis.com/auth/gmail.modify'];

export type ConsentFlow = (keyfilePath: string, scopes: string[]) => Promise<Credentials>;

export interface GoogleOAuthOptions {
  credentialsPath: string;
  tokenPath: string;
  consentFlow?: ConsentFlow;
}

// Opens the browser on a loopback redirect and waits for the user's consent.
const localConsentFlow: ConsentFlow = async (keyfilePath, scopes) => {
  const client = await authenticate({ keyfilePath, scopes });
  return client.credentials;
};

export class GoogleOAuthService {
  private readonly credentialsPath: string;
  private readonly tokenPath: string;
  private readonly consentFlow: ConsentFlow;

  constructor(options: GoogleOAuthOptions) {
    this.credentialsPath = options.credentialsPath;
    this.tokenPath = options.tokenPath;
    this.consentFlow = options.consentFlow ?? localConsentFlow;
  }

  /**
   * Returns an authorized client. A saved token is reused when it can still be
   * refreshed; otherwise the consent flow runs and its refresh token, if any,
   * is saved.
   */
  async authorize(): Promise<OAuth2Client> {
    const clientKey = await this.loadClientKey();

    const savedUser = await this.loadSavedToken();
    if (savedUser) {
      const client = this.createClient(clientKey);
      client.setCredentials({ refresh_token: savedUser.refresh_token });

      try {
        await client.getAccessToken();
        logger.info({ tokenPath: this.tokenPath }, 'Using saved Gmail token');
        return client;
      } catch (error) {
        logger.warn({ err: error }, 'Saved token could not be refreshed, starting a new OAuth flow');
      }
    }

    let credentials: Credentials;
    try {
      credentials = await this.consentFlow(this.credentialsPath, GMAIL_SCOPES);
    } catch (error) {
      throw new AuthenticationError(`OAuth flow failed: ${describeError(error)}`);
    }

    // Google only issues a refresh token on the first grant; without one this
    // run can still proceed on the access token, but nothing is saved.
    if (credentials.refresh_token) {
      await this.saveToken(clientKey, credentials.refresh_token);
    } else {
      logger.warn({ tokenPath: this.tokenPath }, 'OAuth flow returned no refresh token, token not saved');
    }

    const client = this.createClient(clientKey);
    client.setCredentials(credentials);
    return client;
  }

  private createClient(clientKey: ClientKey): OAuth2Client {
    return new OAuth2Client(clientKey.client_id, clientKey.client_secret, clientKey.redirect_uris?.[0]);
  }

  private async loadClientKey(): Promise<ClientKey> {
    let content: string;
    try {
      content = await fs.readFile(this.credentialsPath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(
        `'${this.credentialsPath}' not found. Download the OAuth client file from Google Cloud Console and place it there.`,
        { cause: describeError(error) }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`'${this.credentialsPath}' is not valid JSON: ${describeError(error)}`);
    }

    const parsed = clientSecretsSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid OAuth client file '${this.credentialsPath}': ${formatIssues(parsed.error)}`);
    }

    const clientKey = parsed.data.installed ?? parsed.data.web;
    if (!clientKey) {
      throw new ConfigurationError(`Invalid OAuth client file '${this.credentialsPath}'`);
    }
    return clientKey;
  }

  private async loadSavedToken(): Promise<AuthorizedUser | null> {
    let content: string;
    try {
      content = await fs.readFile(this.tokenPath, 'utf-8');
    } catch {
      logger.debug({ tokenPath: this.tokenPath }, 'No saved token');
      return null;
    }

    try {
      const parsed = authorizedUserSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn({ tokenPath: this.tokenPath, issues: formatIssues(parsed.error) }, 'Ignoring malformed token file');
    } catch (error) {
      logger.warn({ tokenPath: this.tokenPath, err: error }, 'Ignoring unreadable token file');
    }
    return null;
  }

  private async saveToken(clientKey: ClientKey, refreshToken: string): Promise<void> {
    const payload: AuthorizedUser = {
      type: 'authorized_user',
      client_id: clientKey.client_id,
      client_secret: clientKey.client_secret,
      refresh_token: refreshToken,
    };

    await fs.writeFile(this.tokenPath, JSON.stringify(payload, null, 2), { mode: 0o600 });
    logger.info({ tokenPath: this.tokenPath }, 'Authentication successful, token saved');
  }
}
