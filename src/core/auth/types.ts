// src/core/auth/types.ts

/**
 * Authenticated (non read-only) authorization flows.
 * - script: password grant for the app owner's account
 * - web: authorization code grant, renewed with a refresh token
 * - implicit: token handed over by an installed app's browser flow
 */
export type UserAuthMode = 'script' | 'web' | 'implicit';

export interface AuthSettings {
  clientId: string;
  clientSecret: string | null;
  redirectUri?: string;
  username?: string;
  password?: string;
  refreshToken?: string;
  redditUrl: string;
  userAgent: string;
  timeout: number;
}

export interface AccessGrant {
  accessToken: string;
  expiresAt?: Date;
  scopes: Set<string>;
}

export type TokenDuration = 'permanent' | 'temporary';

export interface AuthUrlOptions {
  scopes: string[];
  state?: string;
  duration?: TokenDuration;
  implicit?: boolean;
}

export interface ImplicitGrantOptions {
  accessToken: string;
  // seconds
  expiresIn: number;
  scope: string;
}
