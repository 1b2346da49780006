// src/core/token/TokenStore.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import type { TokenStoreConfig } from '../../config/ConfigValidator';
import type { Logger } from '../../observability/Logger';
import { TokenEncryption } from './TokenEncryption';

/**
 * Persists refresh tokens between client instances.
 *
 * Reddit rotates refresh tokens on some grants, so the latest one is written
 * back after every refresh.
 */
export class TokenStore {
  private store: Keyv<string>;
  private encryption?: TokenEncryption;

  constructor(
    config: TokenStoreConfig,
    private logger: Logger
  ) {
    const namespace = config.namespace ?? 'reddit';

    if (config.backend === 'redis' && config.url) {
      this.store = new Keyv<string>({ store: new KeyvRedis(config.url), namespace });
    } else if (config.backend === 'postgres' && config.url) {
      this.store = new Keyv<string>({ store: new KeyvPostgres({ uri: config.url }), namespace });
    } else {
      this.store = new Keyv<string>({ namespace });
    }

    if (config.encryption) {
      this.encryption = new TokenEncryption(
        config.encryption.key,
        config.encryption.previousKeys
      );
    }
  }

  async getRefreshToken(key: string): Promise<string | undefined> {
    const stored = await this.store.get(this.createKey(key));
    if (!stored) {
      this.logger.debug('Refresh token not found', { key });
      return undefined;
    }
    return this.encryption ? this.encryption.decrypt(stored) : stored;
  }

  async setRefreshToken(key: string, refreshToken: string): Promise<void> {
    const value = this.encryption ? this.encryption.encrypt(refreshToken) : refreshToken;
    await this.store.set(this.createKey(key), value);
    this.logger.debug('Refresh token saved', { key });
  }

  async deleteRefreshToken(key: string): Promise<void> {
    await this.store.delete(this.createKey(key));
    this.logger.debug('Refresh token deleted', { key });
  }

  private createKey(key: string): string {
    return `refresh_token:${key}`;
  }
}
