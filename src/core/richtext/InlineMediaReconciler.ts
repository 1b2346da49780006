// src/core/richtext/InlineMediaReconciler.ts

import type {
  InlineMediaKind,
  InlineMediaNode,
  MediaElementType,
  MediaMetadataMap,
  RichTextDocument,
  RichTextNode,
} from './types';
import { INLINE_MEDIA_KINDS } from './types';
import { RichTextSchemaError, UnknownMediaKindError } from '../../utils/errors';

export const MEDIA_TYPE_MAPPING: Readonly<Record<MediaElementType, InlineMediaKind>> = {
  Image: 'img',
  RedditVideo: 'video',
  AnimatedImage: 'gif',
};

function isMediaElementType(value: string): value is MediaElementType {
  return Object.prototype.hasOwnProperty.call(MEDIA_TYPE_MAPPING, value);
}

function isInlineMediaKind(value: string): value is InlineMediaKind {
  return INLINE_MEDIA_KINDS.some((kind) => kind === value);
}

/**
 * Translate each descriptor's media type into its rich text element tag.
 *
 * @throws {UnknownMediaKindError} when a descriptor has no media type or one outside the known set
 */
export function parseMediaKinds(mediaMetadata: MediaMetadataMap): Map<string, InlineMediaKind> {
  const kinds = new Map<string, InlineMediaKind>();
  for (const [mediaId, descriptor] of Object.entries(mediaMetadata)) {
    const type = descriptor.e;
    if (type === undefined || !isMediaElementType(type)) {
      throw new UnknownMediaKindError(type ?? 'undefined', { mediaId, status: descriptor.status });
    }
    kinds.set(mediaId, MEDIA_TYPE_MAPPING[type]);
  }
  return kinds;
}

/**
 * Host and path tokens of a URL: scheme and query string removed, split on
 * `.` and `/`.
 */
export function extractUrlTokens(url: string): string[] {
  const withoutScheme = url.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '');
  const [hostAndPath] = withoutScheme.split('?');
  return hostAndPath.split(/[./]/);
}

function matchMediaId(url: string, kinds: Map<string, InlineMediaKind>): string | undefined {
  return extractUrlTokens(url).find((token) => kinds.has(token));
}

/**
 * Rewrite links to known inline media back into inline media elements.
 *
 * Converting markdown to rich text turns existing inline media into plain
 * links; each top-level block holding a link whose URL carries a media id
 * from `mediaMetadata` is replaced, as a whole, by an `img`/`video`/`gif`
 * element. The link text becomes the caption when it differs from the URL.
 * Links to anything else are left alone. Mutates `document` in place.
 */
export function reconcileInlineMedia(
  document: RichTextDocument,
  mediaMetadata?: MediaMetadataMap
): void {
  if (!mediaMetadata || Object.keys(mediaMetadata).length === 0) return;

  const kinds = parseMediaKinds(mediaMetadata);
  const blocks = [...document.document];

  blocks.forEach((block, index) => {
    const items = block.c;

    if (typeof items === 'string') {
      // only inline media leaves carry a string payload
      if (!isInlineMediaKind(block.e)) {
        throw new RichTextSchemaError(`Unexpected rich text element with text content: ${block.e}`, {
          index,
        });
      }
      return;
    }
    if (items === undefined) return;
    if (!Array.isArray(items)) {
      throw new RichTextSchemaError(`Unexpected content in rich text element: ${block.e}`, {
        index,
      });
    }

    const children: unknown[] = items;
    for (const item of children) {
      if (!isLinkItem(item)) continue;

      const mediaId = matchMediaId(item.u, kinds);
      const kind = mediaId ? kinds.get(mediaId) : undefined;
      if (!mediaId || !kind) continue;

      const element: InlineMediaNode = { e: kind, id: mediaId };
      if (typeof item.t === 'string' && item.t !== item.u) {
        element.c = item.t;
      }
      document.document[index] = element;
    }
  });
}

interface LinkItem extends RichTextNode {
  e: 'link';
  u: string;
  t?: unknown;
}

function isLinkItem(item: unknown): item is LinkItem {
  if (typeof item !== 'object' || item === null) return false;
  return 'e' in item && item.e === 'link' && 'u' in item && typeof item.u === 'string';
}
