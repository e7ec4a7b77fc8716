import { google } from 'googleapis';
import { AuthExpiredError, errorMessage } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';

const log = createChildLogger('gbp-auth');

/**
 * Returns a bearer token that is currently valid for the Business Profile API.
 * Throws AuthExpiredError when no token can be obtained.
 */
export type CredentialProvider = () => Promise<string>;

export type CredentialSettings =
  | { mode: 'refresh_token'; clientId: string; clientSecret: string; refreshToken: string }
  | { mode: 'access_token'; accessToken: string };

export function credentialSettingsFromEnv(env: {
  GBP_CLIENT_ID?: string;
  GBP_CLIENT_SECRET?: string;
  GBP_REFRESH_TOKEN?: string;
  GBP_ACCESS_TOKEN?: string;
}): CredentialSettings {
  if (env.GBP_CLIENT_ID && env.GBP_CLIENT_SECRET && env.GBP_REFRESH_TOKEN) {
    return {
      mode: 'refresh_token',
      clientId: env.GBP_CLIENT_ID,
      clientSecret: env.GBP_CLIENT_SECRET,
      refreshToken: env.GBP_REFRESH_TOKEN,
    };
  }
  if (env.GBP_ACCESS_TOKEN) {
    return { mode: 'access_token', accessToken: env.GBP_ACCESS_TOKEN };
  }
  throw new AuthExpiredError('No GBP credentials configured');
}

/**
 * Build the credential provider. In refresh-token mode the googleapis
 * OAuth2 client caches the access token and refreshes it when it expires.
 */
export function createCredentialProvider(settings: CredentialSettings): CredentialProvider {
  if (settings.mode === 'access_token') {
    log.warn('Using a static GBP access token; it will not be refreshed');
    return async () => settings.accessToken;
  }

  const oauth2Client = new google.auth.OAuth2(settings.clientId, settings.clientSecret);
  oauth2Client.setCredentials({ refresh_token: settings.refreshToken });

  oauth2Client.on('tokens', (tokens) => {
    if (tokens.expiry_date) {
      log.info({ expiresAt: new Date(tokens.expiry_date).toISOString() }, 'GBP access token refreshed');
    }
  });

  return async () => {
    let token: string | null | undefined;
    try {
      token = (await oauth2Client.getAccessToken()).token;
    } catch (err) {
      throw new AuthExpiredError(`Failed to refresh GBP access token: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!token) {
      throw new AuthExpiredError('Failed to get GBP access token');
    }
    return token;
  };
}
