// src/models/RedditBase.ts

import type { z } from 'zod';
import type { CoreDeps, ThingData, ThingKind } from './types';
import { API_PATH } from './endpoints';
import { parseListing } from './objector';
import { ClientError } from '../utils/errors';
import { withModelSpan } from '../observability/tracing';

export type ThingSchema<TData extends ThingData> = z.ZodType<TData, z.ZodTypeDef, unknown>;

/**
 * A Reddit thing addressed by its fullname, e.g. `t1_abc123`.
 *
 * Instances start lazy: only the id is known until `fetch()` loads the
 * remaining attributes through `api/info/`.
 */
export abstract class RedditBase<TData extends ThingData> {
  protected abstract readonly kind: ThingKind;
  protected data: TData;
  protected fetched: boolean;

  constructor(
    protected deps: CoreDeps,
    private schema: ThingSchema<TData>,
    data: unknown,
    fetched: boolean = false
  ) {
    this.data = schema.parse(data);
    this.fetched = fetched;
  }

  get id(): string {
    return this.data.id;
  }

  get fullname(): string {
    return `${this.kind}_${this.id}`;
  }

  get isFetched(): boolean {
    return this.fetched;
  }

  toJSON(): TData {
    return this.data;
  }

  async fetch(): Promise<this> {
    return withModelSpan('fetch', this.fullname, async () => {
      const response = await this.deps.http.get<unknown>(API_PATH.info, { id: this.fullname });
      const [thing] = parseListing(response.data);
      if (!thing) {
        throw new ClientError(`No data returned for ${this.fullname}`);
      }

      this.mergeAttributes(thing.data);
      this.fetched = true;
      this.deps.logger.debug('Fetched thing', { fullname: this.fullname });
      return this;
    });
  }

  /**
   * Overlay fields from an API response, skipping the names in `exclude`.
   */
  protected mergeAttributes(update: Record<string, unknown>, exclude: readonly string[] = []): void {
    const merged: Record<string, unknown> = { ...this.data };
    for (const [field, value] of Object.entries(update)) {
      if (!exclude.includes(field)) merged[field] = value;
    }
    this.data = this.schema.parse(merged);
  }
}
