// src/index.ts

export { Reddit } from './reddit';
export type { RedditConfig, RedditSettings, TokenStoreConfig } from './config/ConfigValidator';
export { configFromEnv, validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { AuthUrlOptions, ImplicitGrantOptions, TokenDuration } from './core/auth/types';
export { AuthCore } from './core/auth/AuthCore';

export { Comment } from './models/Comment';
export type { CommentData } from './models/Comment';
export { Submission } from './models/Submission';
export type { SubmissionData } from './models/Submission';
export { Subreddit } from './models/Subreddit';
export { User } from './models/User';
export type { RedditorData } from './models/User';
export type { EditOptions } from './models/EditableThing';
export { InlineMedia, InlineImage, InlineGif, InlineVideo } from './models/InlineMedia';
export type { InlineMediaOptions } from './models/InlineMedia';

export { reconcileInlineMedia, parseMediaKinds } from './core/richtext/InlineMediaReconciler';
export type {
  InlineMediaKind,
  InlineMediaNode,
  MediaMetadataMap,
  RichTextDocument,
  RichTextNode,
} from './core/richtext/types';

// Export error classes for error handling
export {
  SDKError,
  ClientError,
  InvalidArgumentError,
  ReadOnlyError,
  RichTextSchemaError,
  UnknownMediaKindError,
  TooLargeMediaError,
  OAuthError,
  OAuthConfigError,
  TokenError,
  TokenExpiredError,
  TokenRefreshError,
  InvalidTokenError,
  InsufficientScopeError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  RedditApiError,
  NetworkError,
  NetworkTimeoutError,
} from './utils/errors';
export type { RedditErrorItem } from './utils/errors';
