// src/core/auth/AuthCore.ts

import { Issuer, Client, TokenSet, custom, errors, generators } from 'openid-client';
import type {
  AccessGrant,
  AuthSettings,
  AuthUrlOptions,
  ImplicitGrantOptions,
  UserAuthMode,
} from './types';
import type { TokenProvider } from '../http/types';
import type { TokenStore } from '../token/TokenStore';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import {
  ClientError,
  OAuthConfigError,
  OAuthError,
  TokenExpiredError,
  TokenRefreshError,
} from '../../utils/errors';
import { withOAuthSpan } from '../../observability/tracing';

const INSTALLED_CLIENT_GRANT = 'https://oauth.reddit.com/grants/installed_client';
const DEFAULT_DEVICE_ID = 'DO_NOT_TRACK_THIS_DEVICE';

export function parseScopes(scope: string | undefined): Set<string> {
  return new Set((scope ?? '').split(/[\s,]+/).filter(Boolean));
}

/**
 * Issues and renews access tokens for every Reddit app type.
 *
 * Two grants are tracked side by side: the read-only grant (client
 * credentials, or the installed-client grant for apps without a secret) and
 * the user grant of the configured flow. `readOnly` selects which one API
 * calls use.
 */
export class AuthCore implements TokenProvider {
  private client: Client;
  private userMode?: UserAuthMode;
  private userGrant?: AccessGrant;
  private readOnlyGrant?: AccessGrant;
  private refreshToken?: string;
  private readOnlyFlag = true;

  constructor(
    private settings: AuthSettings,
    private tokens: TokenStore,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.client = this.createOAuth2Client();
  }

  /**
   * Pick the initial flow from configuration and any stored refresh token.
   */
  async initialize(): Promise<void> {
    if (this.settings.username && this.settings.password) {
      this.userMode = 'script';
    } else {
      this.refreshToken =
        this.settings.refreshToken ?? (await this.tokens.getRefreshToken(this.tokenKey));
      if (this.refreshToken) {
        this.userMode = 'web';
      }
    }
    this.readOnlyFlag = this.userMode === undefined;

    this.logger.info('AuthCore initialized', {
      mode: this.userMode ?? 'read-only',
      installedApp: this.isInstalledApp,
    });
  }

  get readOnly(): boolean {
    return this.readOnlyFlag;
  }

  setReadOnly(value: boolean): void {
    if (!value && !this.userMode) {
      throw new ClientError(
        'readOnly cannot be unset as only read-only authorization is available'
      );
    }
    this.readOnlyFlag = value;
  }

  get isInstalledApp(): boolean {
    return this.settings.clientSecret === null;
  }

  /**
   * Build the URL a user visits to grant this app access.
   */
  url(opts: AuthUrlOptions): string {
    const implicit = opts.implicit ?? false;
    const duration = opts.duration ?? (implicit ? 'temporary' : 'permanent');

    if (!this.settings.redirectUri) {
      throw new OAuthConfigError('redirectUri must be configured to build an authorization URL');
    }
    if (implicit && !this.isInstalledApp) {
      throw new ClientError('The implicit grant flow is only available to installed apps');
    }
    if (implicit && duration === 'permanent') {
      throw new ClientError('The implicit grant flow only supports temporary access tokens');
    }

    const state = opts.state ?? generators.state();
    const authUrl = this.client.authorizationUrl({
      scope: opts.scopes.join(' '),
      state,
      duration,
      response_type: implicit ? 'token' : 'code',
      redirect_uri: this.settings.redirectUri,
    });

    this.logger.debug('Created auth URL', { implicit, duration, state });
    return authUrl;
  }

  /**
   * Exchange an authorization code and switch to the web flow.
   *
   * @returns The refresh token, when a permanent duration was granted
   */
  async authorize(code: string): Promise<string | undefined> {
    const redirectUri = this.settings.redirectUri;
    if (!redirectUri) {
      throw new OAuthConfigError('redirectUri must be configured to exchange a code');
    }

    const tokenSet = await this.requestGrant('authorization_code', () =>
      this.client.oauthCallback(redirectUri, { code }, {})
    );

    this.userGrant = this.toAccessGrant(tokenSet);
    this.userMode = 'web';
    this.readOnlyFlag = false;
    this.refreshToken = tokenSet.refresh_token;
    if (tokenSet.refresh_token) {
      await this.tokens.setRefreshToken(this.tokenKey, tokenSet.refresh_token);
    }

    this.logger.info('Authorization code exchanged', {
      scopes: Array.from(this.userGrant.scopes),
      hasRefreshToken: Boolean(tokenSet.refresh_token),
    });
    return tokenSet.refresh_token;
  }

  /**
   * Install an access token obtained through the implicit grant flow.
   */
  implicit(opts: ImplicitGrantOptions): void {
    if (!this.isInstalledApp) {
      throw new ClientError('implicit can only be used with installed apps');
    }

    this.userGrant = {
      accessToken: opts.accessToken,
      expiresAt: new Date(Date.now() + opts.expiresIn * 1000),
      scopes: parseScopes(opts.scope),
    };
    this.userMode = 'implicit';
    this.refreshToken = undefined;
    this.readOnlyFlag = false;
  }

  /**
   * Scopes of the grant API calls currently use.
   */
  async scopes(): Promise<Set<string>> {
    const grant = await this.activeGrant();
    return new Set(grant.scopes);
  }

  async getAccessToken(): Promise<string> {
    const grant = await this.activeGrant();
    return grant.accessToken;
  }

  /**
   * Revoke the user's token and fall back to read-only access.
   */
  async revoke(): Promise<void> {
    const token = this.refreshToken ?? this.userGrant?.accessToken;

    if (token) {
      const hint = this.refreshToken ? 'refresh_token' : 'access_token';
      try {
        await withOAuthSpan('revoke', hint, () => this.client.revoke(token, hint));
        this.logger.info('Token revoked', { hint });
      } catch (error: unknown) {
        this.logger.warn('Token revocation failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    await this.tokens.deleteRefreshToken(this.tokenKey);
    this.userGrant = undefined;
    this.userMode = undefined;
    this.refreshToken = undefined;
    this.readOnlyFlag = true;
  }

  private get tokenKey(): string {
    return this.settings.clientId;
  }

  private async activeGrant(): Promise<AccessGrant> {
    if (this.readOnlyFlag) {
      const current = this.readOnlyGrant;
      if (current && isValid(current)) return current;
      const fresh = await this.grantReadOnly();
      this.readOnlyGrant = fresh;
      return fresh;
    }

    const current = this.userGrant;
    if (current && isValid(current)) return current;
    const fresh = await this.grantUser();
    this.userGrant = fresh;
    return fresh;
  }

  private async grantReadOnly(): Promise<AccessGrant> {
    if (this.isInstalledApp) {
      const tokenSet = await this.requestGrant(INSTALLED_CLIENT_GRANT, () =>
        this.client.grant({ grant_type: INSTALLED_CLIENT_GRANT, device_id: DEFAULT_DEVICE_ID })
      );
      return this.toAccessGrant(tokenSet);
    }

    const tokenSet = await this.requestGrant('client_credentials', () =>
      this.client.grant({ grant_type: 'client_credentials' })
    );
    return this.toAccessGrant(tokenSet);
  }

  private async grantUser(): Promise<AccessGrant> {
    switch (this.userMode) {
      case 'script': {
        const { username, password } = this.settings;
        const tokenSet = await this.requestGrant('password', () =>
          this.client.grant({ grant_type: 'password', username, password })
        );
        return this.toAccessGrant(tokenSet);
      }
      case 'web':
        return this.refreshUserGrant();
      case 'implicit':
        throw new TokenExpiredError('Implicit grant access token expired');
      default:
        throw new ClientError('No user authorization is available');
    }
  }

  private async refreshUserGrant(): Promise<AccessGrant> {
    const refreshToken = this.refreshToken;
    if (!refreshToken) {
      throw new TokenExpiredError('Access token expired and no refresh token is available');
    }

    let tokenSet: TokenSet;
    try {
      tokenSet = await this.requestGrant('refresh_token', () => this.client.refresh(refreshToken));
    } catch (error: unknown) {
      throw new TokenRefreshError('Failed to refresh token', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const rotated = tokenSet.refresh_token;
    if (rotated && rotated !== refreshToken) {
      this.refreshToken = rotated;
      await this.tokens.setRefreshToken(this.tokenKey, rotated);
    }
    return this.toAccessGrant(tokenSet);
  }

  private async requestGrant(grantType: string, exchange: () => Promise<TokenSet>): Promise<TokenSet> {
    return withOAuthSpan('grant', grantType, async () => {
      try {
        const tokenSet = await exchange();
        this.metrics.incrementCounter('oauth_grants_total', { grant: grantType, status: 'success' });
        this.logger.debug('Token grant successful', {
          grantType,
          tokenType: tokenSet.token_type,
          expiresIn: tokenSet.expires_in,
          scope: tokenSet.scope,
        });
        return tokenSet;
      } catch (error: unknown) {
        this.metrics.incrementCounter('oauth_grants_total', { grant: grantType, status: 'failed' });
        const reason = error instanceof errors.OPError ? error.error : undefined;
        this.logger.error('Token grant failed', {
          grantType,
          reason,
          error: error instanceof Error ? error.message : String(error),
        });
        throw new OAuthError(`Token grant failed: ${reason ?? grantType}`, {
          grantType,
          reason,
        });
      }
    });
  }

  private toAccessGrant(tokenSet: TokenSet): AccessGrant {
    if (!tokenSet.access_token) {
      throw new OAuthError('Token response did not include an access token');
    }
    return {
      accessToken: tokenSet.access_token,
      expiresAt: tokenSet.expires_at ? new Date(tokenSet.expires_at * 1000) : undefined,
      scopes: parseScopes(tokenSet.scope),
    };
  }

  private createOAuth2Client(): Client {
    const base = this.settings.redditUrl.replace(/\/+$/, '');
    const issuer = new Issuer({
      issuer: base,
      authorization_endpoint: `${base}/api/v1/authorize`,
      token_endpoint: `${base}/api/v1/access_token`,
      revocation_endpoint: `${base}/api/v1/revoke_token`,
      token_endpoint_auth_methods_supported: ['client_secret_basic'],
    });

    // Reddit expects HTTP Basic auth even for installed apps, with an empty secret
    const client = new issuer.Client({
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret ?? '',
      redirect_uris: this.settings.redirectUri ? [this.settings.redirectUri] : [],
      response_types: ['code'],
      token_endpoint_auth_method: 'client_secret_basic',
      revocation_endpoint_auth_method: 'client_secret_basic',
    });

    client[custom.http_options] = (_url, options) => ({
      ...options,
      headers: Object.assign({}, options.headers, { 'User-Agent': this.settings.userAgent }),
      timeout: this.settings.timeout,
    });

    return client;
  }
}

function isValid(grant: AccessGrant): boolean {
  return !grant.expiresAt || grant.expiresAt.getTime() > Date.now();
}
