// src/reddit.ts

import type { CoreDeps } from './models/types';
import { AuthCore } from './core/auth/AuthCore';
import { HttpCore } from './core/http/HttpCore';
import { TokenStore } from './core/token/TokenStore';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig } from './config/ConfigValidator';
import type { RedditConfig, RedditSettings } from './config/ConfigValidator';
import { Comment } from './models/Comment';
import { Submission } from './models/Submission';
import { Subreddit } from './models/Subreddit';
import { User } from './models/User';

export class Reddit {
  readonly auth: AuthCore;
  readonly user: User;
  private core: CoreDeps;

  private constructor(settings: RedditSettings) {
    const logger = new Logger(settings.logging);
    const metrics = new MetricsCollector(settings.metrics, logger);
    const tokens = new TokenStore(settings.tokenStore, logger);
    const http = new HttpCore(
      { oauthUrl: settings.oauthUrl, userAgent: settings.userAgent, timeout: settings.timeout },
      metrics,
      logger
    );
    const auth = new AuthCore(
      {
        clientId: settings.clientId,
        clientSecret: settings.clientSecret,
        redirectUri: settings.redirectUri,
        username: settings.username,
        password: settings.password,
        refreshToken: settings.refreshToken,
        redditUrl: settings.redditUrl,
        userAgent: settings.userAgent,
        timeout: settings.timeout,
      },
      tokens,
      metrics,
      logger
    );
    http.useTokenProvider(auth);

    this.core = {
      auth,
      http,
      logger,
      metrics,
      settings: { validateOnSubmit: settings.validateOnSubmit },
    };
    this.auth = auth;
    this.user = new User(this.core);
  }

  /**
   * Create a client. Must be awaited: a stored refresh token is looked up
   * before the authorization flow is chosen.
   *
   * @throws {z.ZodError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const reddit = await Reddit.init({
   *   clientId: process.env.REDDIT_CLIENT_ID,
   *   clientSecret: process.env.REDDIT_CLIENT_SECRET,
   *   userAgent: 'script:my-bot:v1.0 (by u/my-bot)',
   *   username: process.env.REDDIT_USERNAME,
   *   password: process.env.REDDIT_PASSWORD,
   * });
   *
   * const comment = reddit.comment('abc123');
   * await comment.edit('Updated body', { preserveInlineMedia: true });
   * ```
   */
  static async init(config: RedditConfig): Promise<Reddit> {
    const settings = validateConfig(config);
    const reddit = new Reddit(settings);

    await reddit.core.auth.initialize();

    reddit.core.logger.info('Reddit client initialized', { readOnly: reddit.readOnly });
    return reddit;
  }

  get readOnly(): boolean {
    return this.core.auth.readOnly;
  }

  /**
   * @throws {ClientError} when unset with only read-only authorization available
   */
  set readOnly(value: boolean) {
    this.core.auth.setReadOnly(value);
  }

  get validateOnSubmit(): boolean {
    return this.core.settings.validateOnSubmit;
  }

  set validateOnSubmit(value: boolean) {
    this.core.settings.validateOnSubmit = value;
  }

  /**
   * Lazy comment; nothing is requested until an attribute is fetched.
   */
  comment(id: string): Comment {
    return new Comment(this.core, { id });
  }

  submission(id: string): Submission {
    return new Submission(this.core, { id });
  }

  subreddit(displayName: string): Subreddit {
    return new Subreddit(this.core, displayName);
  }

  /**
   * Prometheus text exposition of the client's metrics.
   */
  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  async close(): Promise<void> {
    await this.core.metrics.close();
    this.core.logger.info('Reddit client closed');
  }
}
