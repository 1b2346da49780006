// src/models/Subreddit.ts

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { CoreDeps } from './types';
import type { InlineMedia } from './InlineMedia';
import type { RichTextDocument } from '../core/richtext/types';
import { RichTextDocumentSchema } from '../core/richtext/types';
import { API_PATH } from './endpoints';
import {
  ApiClientError,
  InvalidArgumentError,
  RichTextSchemaError,
  TooLargeMediaError,
} from '../utils/errors';

const MIME_TYPES: Readonly<Record<string, string>> = {
  png: 'image/png',
  mov: 'video/quicktime',
  mp4: 'video/mp4',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
};

const DEFAULT_MIME_TYPE = 'image/jpeg';

const ConvertResponseSchema = z.object({ output: RichTextDocumentSchema }).passthrough();

const UploadLeaseSchema = z.object({
  args: z.object({
    action: z.string(),
    fields: z.array(z.object({ name: z.string(), value: z.string() })),
  }),
  asset: z.object({ asset_id: z.string() }).passthrough(),
});

export function mimeTypeFor(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  const extension = fileName.slice(dot + 1).toLowerCase();
  return MIME_TYPES[extension] ?? DEFAULT_MIME_TYPE;
}

/**
 * Reads the S3 `EntityTooLarge` error document, if that is what `error` carries.
 */
export function parseTooLargeError(error: unknown): TooLargeMediaError | undefined {
  if (!(error instanceof ApiClientError)) return undefined;

  const body = error.details?.response;
  if (typeof body !== 'string' || !body.includes('<Code>EntityTooLarge</Code>')) {
    return undefined;
  }

  const maximumSize = /<MaxSizeAllowed>(\d+)<\/MaxSizeAllowed>/.exec(body);
  const actualSize = /<ProposedSize>(\d+)<\/ProposedSize>/.exec(body);
  return new TooLargeMediaError(
    Number(maximumSize?.[1] ?? 0),
    Number(actualSize?.[1] ?? 0)
  );
}

export class Subreddit {
  constructor(
    private deps: CoreDeps,
    readonly displayName: string
  ) {}

  /**
   * Convert markdown to rich text JSON the way Reddit's editor does.
   */
  async convertToFancypants(markdownText: string): Promise<RichTextDocument> {
    const response = await this.deps.http.post<unknown>(API_PATH.convertRteBody, {
      output_mode: 'rtjson',
      markdown_text: markdownText,
    });

    const parsed = ConvertResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new RichTextSchemaError('Unexpected rich text conversion response', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data.output;
  }

  /**
   * Upload a media file and record its id on `media`.
   *
   * @throws {InvalidArgumentError} when `media.path` is not a readable file
   * @throws {TooLargeMediaError} when the file exceeds the upload limit
   */
  async uploadInlineMedia<T extends InlineMedia>(media: T): Promise<T> {
    const stats = await fs.stat(media.path).catch(() => undefined);
    if (!stats?.isFile()) {
      throw new InvalidArgumentError(`'${media.path}' is not a valid file path`, {
        path: media.path,
      });
    }

    media.mediaId = await this.uploadMedia(media.path);
    this.deps.logger.debug('Uploaded inline media', {
      subreddit: this.displayName,
      type: media.type,
      mediaId: media.mediaId,
    });
    return media;
  }

  toString(): string {
    return this.displayName;
  }

  private async uploadMedia(mediaPath: string): Promise<string> {
    const fileName = path.basename(mediaPath).toLowerCase();
    const mimeType = mimeTypeFor(fileName);

    const leaseResponse = await this.deps.http.post<unknown>(API_PATH.mediaAsset, {
      filepath: fileName,
      mimetype: mimeType,
    });
    const lease = UploadLeaseSchema.parse(leaseResponse.data);

    const form = new FormData();
    for (const field of lease.args.fields) {
      form.append(field.name, field.value);
    }
    const contents = await fs.readFile(mediaPath);
    form.append('file', new Blob([contents], { type: mimeType }), fileName);

    // the lease action is protocol relative
    const action = lease.args.action;
    const uploadUrl = action.startsWith('//') ? `https:${action}` : action;

    try {
      await this.deps.http.request({ url: uploadUrl, method: 'POST', body: form });
    } catch (error: unknown) {
      throw parseTooLargeError(error) ?? error;
    }

    return lease.asset.asset_id;
  }
}
