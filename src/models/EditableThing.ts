// src/models/EditableThing.ts

import type { EditableData } from './types';
import type { FormFields } from '../core/http/types';
import type { MediaMetadataMap, RichTextDocument } from '../core/richtext/types';
import type { InlineMedia } from './InlineMedia';
import { RedditBase } from './RedditBase';
import { Subreddit } from './Subreddit';
import { API_PATH } from './endpoints';
import { firstThingData, raiseForApiErrors } from './objector';
import { reconcileInlineMedia } from '../core/richtext/InlineMediaReconciler';
import { containsInlineMedia, formatPlaceholders } from '../core/richtext/markdown';
import { ClientError } from '../utils/errors';
import { addSpanEvent, withModelSpan } from '../observability/tracing';

/**
 * Response fields never copied onto the local object after an edit.
 */
export const EDIT_EXCLUDED_FIELDS: readonly string[] = [
  'fetched',
  'client',
  'submission',
  'replies',
  'subreddit',
];

export interface EditOptions {
  /**
   * Restore existing inline media that markdown conversion turned into links.
   */
  preserveInlineMedia?: boolean;
  /**
   * Media to upload, keyed by the `{placeholder}` in the body they replace.
   */
  inlineMedia?: Record<string, InlineMedia>;
}

/**
 * Things whose body the author can edit or delete: comments and self posts.
 */
export abstract class EditableThing<TData extends EditableData> extends RedditBase<TData> {
  get mediaMetadata(): MediaMetadataMap | undefined {
    return this.data.media_metadata;
  }

  get subreddit(): Subreddit | undefined {
    const name = this.data.subreddit;
    return name ? new Subreddit(this.deps, name) : undefined;
  }

  hasMediaMetadata(): boolean {
    const metadata = this.mediaMetadata;
    return metadata !== undefined && Object.keys(metadata).length > 0;
  }

  async delete(): Promise<void> {
    await withModelSpan('delete', this.fullname, async () => {
      await this.deps.http.post(API_PATH.del, { id: this.fullname });
    });
    this.deps.logger.info('Deleted thing', { fullname: this.fullname });
  }

  /**
   * Replace the body with `body`.
   *
   * Bodies that reference inline media, or that get some through
   * `inlineMedia`, are converted and submitted as rich text.
   */
  async edit(body: string, opts: EditOptions = {}): Promise<this> {
    return withModelSpan('edit', this.fullname, async () => {
      const form: FormFields = {
        thing_id: this.fullname,
        validate_on_submit: this.deps.settings.validateOnSubmit,
      };

      let markdown = body;
      let richText = containsInlineMedia(body);

      const uploads = Object.entries(opts.inlineMedia ?? {});
      if (uploads.length > 0) {
        const subreddit = await this.resolveSubreddit();
        const replacements: Record<string, string> = {};
        for (const [placeholder, media] of uploads) {
          const uploaded = await subreddit.uploadInlineMedia(media);
          replacements[placeholder] = uploaded.toString();
        }
        markdown = formatPlaceholders(body, replacements);
        richText = true;
      }

      if (richText) {
        const subreddit = await this.resolveSubreddit();
        const document = await subreddit.convertToFancypants(markdown);
        if (opts.preserveInlineMedia) {
          await this.restoreInlineMedia(document);
        }
        form.richtext_json = JSON.stringify(document);
      } else {
        form.text = markdown;
      }

      const response = await this.deps.http.post<unknown>(API_PATH.edit, form);
      raiseForApiErrors(response.data);

      const updated = firstThingData(response.data);
      if (updated) {
        this.mergeAttributes(updated, EDIT_EXCLUDED_FIELDS);
      }

      const format = richText ? 'richtext' : 'markdown';
      this.deps.metrics.incrementCounter('edits_total', { kind: this.kind, format });
      this.deps.logger.info('Edited thing', { fullname: this.fullname, format });
      return this;
    });
  }

  private async restoreInlineMedia(document: RichTextDocument): Promise<void> {
    if (!this.fetched && !this.hasMediaMetadata()) {
      await this.fetch();
    }
    if (!this.hasMediaMetadata()) return;

    const original = [...document.document];
    reconcileInlineMedia(document, this.mediaMetadata);

    const restored = document.document.filter((node, index) => node !== original[index]).length;
    if (restored > 0) {
      this.deps.metrics.incrementCounter('inline_media_reconciled', {}, restored);
      addSpanEvent('inline_media.reconciled', { count: restored });
    }
  }

  private async resolveSubreddit(): Promise<Subreddit> {
    if (!this.data.subreddit && !this.fetched) {
      await this.fetch();
    }
    const subreddit = this.subreddit;
    if (!subreddit) {
      throw new ClientError(`Unable to determine the subreddit of ${this.fullname}`);
    }
    return subreddit;
  }
}
