// src/models/InlineMedia.ts

import type { InlineMediaKind } from '../core/richtext/types';

export interface InlineMediaOptions {
  path: string;
  caption?: string;
}

/**
 * A local media file to embed in a self post or comment body.
 *
 * Once uploaded, `toString()` renders the markdown reference Reddit expands
 * into an inline media element.
 */
export abstract class InlineMedia {
  abstract readonly type: InlineMediaKind;
  readonly path: string;
  readonly caption?: string;
  mediaId?: string;

  constructor({ path, caption }: InlineMediaOptions) {
    this.path = path;
    this.caption = caption;
  }

  toString(): string {
    return `\n\n![${this.type}](${this.mediaId ?? ''} "${this.caption ?? ''}")\n\n`;
  }
}

export class InlineImage extends InlineMedia {
  readonly type = 'img';
}

export class InlineGif extends InlineMedia {
  readonly type = 'gif';
}

export class InlineVideo extends InlineMedia {
  readonly type = 'video';
}
