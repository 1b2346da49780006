// src/models/Submission.ts

import { z } from 'zod';
import type { CoreDeps } from './types';
import { EditableThing } from './EditableThing';
import { MediaMetadataSchema } from '../core/richtext/types';

export const SubmissionDataSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().optional(),
    selftext: z.string().optional(),
    is_self: z.boolean().optional(),
    url: z.string().optional(),
    author: z.string().nullable().optional(),
    subreddit: z.string().optional(),
    media_metadata: MediaMetadataSchema.nullish().transform((value) => value ?? undefined),
  })
  .passthrough();

export type SubmissionData = z.infer<typeof SubmissionDataSchema>;

/**
 * A link or self post. Only self posts have an editable body.
 */
export class Submission extends EditableThing<SubmissionData> {
  protected readonly kind = 't3';

  constructor(deps: CoreDeps, data: unknown, fetched?: boolean) {
    super(deps, SubmissionDataSchema, data, fetched);
  }

  get title(): string | undefined {
    return this.data.title;
  }

  get selftext(): string | undefined {
    return this.data.selftext;
  }

  get isSelf(): boolean {
    return this.data.is_self ?? false;
  }

  get url(): string | undefined {
    return this.data.url;
  }
}
