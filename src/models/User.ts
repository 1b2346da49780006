// src/models/User.ts

import { z } from 'zod';
import type { CoreDeps } from './types';
import { API_PATH } from './endpoints';
import { ReadOnlyError } from '../utils/errors';

export const RedditorDataSchema = z
  .object({
    name: z.string(),
    id: z.string().optional(),
  })
  .passthrough();

export type RedditorData = z.infer<typeof RedditorDataSchema>;

/**
 * The authenticated user.
 */
export class User {
  constructor(private deps: CoreDeps) {}

  /**
   * @throws {ReadOnlyError} when the client is in read-only mode
   */
  async me(): Promise<RedditorData> {
    if (this.deps.auth.readOnly) {
      throw new ReadOnlyError('me() is not available in read-only mode');
    }
    const response = await this.deps.http.get<unknown>(API_PATH.me);
    return RedditorDataSchema.parse(response.data);
  }
}
