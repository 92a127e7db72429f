/**
 * HipChat Credential Loader
 *
 * Reads the chat credentials from the global configuration on first use and
 * keeps them for the lifetime of the loader. Jobs without a `hipchat`
 * section never trigger the lookup, so configurations without a `[hipchat]`
 * section stay valid for them.
 *
 * @module translators/credential-loader
 */

import type { GlobalConfig } from '../adapters/global-config-adapter.js';
import {
  HipChatCredentialsSchema,
  HipChatFailureMode,
  type HipChatCredentials,
} from '../contracts/hipchat.contract.js';
import { ConfigurationError, JobBuilderError } from '../errors.js';
import { createLogger, type Logger } from '../logging/logger.js';

export class CredentialLoader {
  private credentials: HipChatCredentials | null = null;
  private readonly config: GlobalConfig;
  private readonly logger: Logger;

  constructor(config: GlobalConfig, logger: Logger = createLogger('hipchat')) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Whether credentials have been loaded
   */
  get loaded(): boolean {
    return this.credentials !== null;
  }

  /**
   * Return the credentials, reading them on the first call.
   *
   * @throws ConfigurationError (MISSING_CREDENTIALS) when the `[hipchat]`
   * section or its authtoken is absent or blank
   */
  load(): HipChatCredentials {
    if (this.credentials?.authToken) {
      return this.credentials;
    }

    let authToken: string;
    try {
      authToken = this.config.get('hipchat', 'authtoken');
    } catch (error) {
      if (!(error instanceof JobBuilderError)) {
        throw error;
      }
      throw this.missingCredentials(error.message);
    }

    const result = HipChatCredentialsSchema.safeParse({
      authToken,
      serverUrl: this.config.get('jenkins', 'url'),
      sendAs: this.config.get('hipchat', 'send-as'),
    });
    if (!result.success) {
      throw this.missingCredentials(result.error.issues.map((i) => i.message).join('; '));
    }

    this.credentials = result.data;
    this.logger.debug(`Loaded credentials for ${this.credentials.serverUrl}`);

    return this.credentials;
  }

  private missingCredentials(reason: string): ConfigurationError {
    const message = `The configuration file needs a hipchat section containing authtoken:\n${reason}`;
    this.logger.fatal(message);
    return new ConfigurationError(message, HipChatFailureMode.MISSING_CREDENTIALS);
  }
}
