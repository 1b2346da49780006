// src/models/Comment.ts

import { z } from 'zod';
import type { CoreDeps } from './types';
import { EditableThing } from './EditableThing';
import { MediaMetadataSchema } from '../core/richtext/types';

export const CommentDataSchema = z
  .object({
    id: z.string().min(1),
    body: z.string().optional(),
    author: z.string().nullable().optional(),
    link_id: z.string().optional(),
    parent_id: z.string().optional(),
    subreddit: z.string().optional(),
    media_metadata: MediaMetadataSchema.nullish().transform((value) => value ?? undefined),
  })
  .passthrough();

export type CommentData = z.infer<typeof CommentDataSchema>;

export class Comment extends EditableThing<CommentData> {
  protected readonly kind = 't1';

  constructor(deps: CoreDeps, data: unknown, fetched?: boolean) {
    super(deps, CommentDataSchema, data, fetched);
  }

  get body(): string | undefined {
    return this.data.body;
  }

  get author(): string | undefined {
    return this.data.author ?? undefined;
  }

  get linkId(): string | undefined {
    return this.data.link_id;
  }

  get parentId(): string | undefined {
    return this.data.parent_id;
  }
}
