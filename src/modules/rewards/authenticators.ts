import { CredentialsInvalidError } from './errors.js';
import type { RewardsApiClient } from './rewards-client.js';
import type { AuthenticationContext, IssuedToken, RewardCredentials, RewardsAuthenticator } from './types.js';

interface CredentialsAuthenticatorConfig {
  client: RewardsApiClient;
  getCredentials: () => RewardCredentials | null;
  name?: string;
}

interface DisabledAuthenticatorConfig {
  name?: string;
  message?: string;
}

export function createCredentialsAuthenticator(config: CredentialsAuthenticatorConfig): RewardsAuthenticator {
  return {
    name: config.name || 'credentials',
    async authenticate(ctx: AuthenticationContext): Promise<IssuedToken> {
      const credentials = config.getCredentials();
      if (!credentials || !credentials.email.trim() || !credentials.password) {
        throw new CredentialsInvalidError('REWARDS_EMAIL or REWARDS_PASSWORD is missing');
      }

      const issued = await config.client.authenticate(credentials, ctx.signal);
      return {
        token: issued.token,
        expiresAt: issued.expiresAt
      };
    }
  };
}

export function createDisabledAuthenticator(config: DisabledAuthenticatorConfig = {}): RewardsAuthenticator {
  const message = config.message || 'No credentials configured; set REWARDS_EMAIL and REWARDS_PASSWORD.';
  return {
    name: config.name || 'disabled',
    async authenticate(_ctx: AuthenticationContext): Promise<IssuedToken> {
      throw new CredentialsInvalidError(message);
    }
  };
}
