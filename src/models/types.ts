// src/models/types.ts

import type { AuthCore } from '../core/auth/AuthCore';
import type { HttpCore } from '../core/http/HttpCore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { MediaMetadataMap } from '../core/richtext/types';

export interface ModelSettings {
  validateOnSubmit: boolean;
}

export interface CoreDeps {
  auth: AuthCore;
  http: HttpCore;
  logger: Logger;
  metrics: MetricsCollector;
  settings: ModelSettings;
}

/** Type prefixes of the fullnames this library works with. */
export type ThingKind = 't1' | 't3';

export interface ThingData {
  id: string;
  [field: string]: unknown;
}

export interface EditableData extends ThingData {
  subreddit?: string;
  media_metadata?: MediaMetadataMap;
}
