// src/core/richtext/types.ts

import { z } from 'zod';

/** Canonical inline media element tags in Reddit's rich text JSON. */
export type InlineMediaKind = 'img' | 'video' | 'gif';

/** Media kinds as reported in a thing's `media_metadata`. */
export type MediaElementType = 'Image' | 'RedditVideo' | 'AnimatedImage';

export const INLINE_MEDIA_KINDS: readonly InlineMediaKind[] = ['img', 'video', 'gif'];

/**
 * Any rich text node: block element or inline item. `e` is the tag, `c` the
 * content (string for inline media leaves, child nodes otherwise).
 */
export interface RichTextNode {
  e: string;
  [field: string]: unknown;
}

export interface InlineMediaNode extends RichTextNode {
  e: InlineMediaKind;
  id: string;
  c?: string;
}

export interface RichTextDocument {
  document: RichTextNode[];
  [field: string]: unknown;
}

/** `e` is absent while Reddit is still processing the upload. */
export interface MediaDescriptor {
  e?: string;
  [field: string]: unknown;
}

export type MediaMetadataMap = Record<string, MediaDescriptor>;

export const RichTextNodeSchema = z.object({ e: z.string() }).passthrough();

export const RichTextDocumentSchema = z
  .object({ document: z.array(RichTextNodeSchema) })
  .passthrough();

export const MediaMetadataSchema = z.record(z.object({ e: z.string().optional() }).passthrough());
