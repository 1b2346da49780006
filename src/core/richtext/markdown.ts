// src/core/richtext/markdown.ts

import { InvalidArgumentError } from '../../utils/errors';

/**
 * Markdown that only survives an edit when sent as rich text: Reddit hosted
 * media links and `![type](mediaId "caption")` references.
 */
export const INLINE_MEDIA_PATTERN =
  /\n\n!?(\[.*?])?\(?((https:\/\/((preview|i)\.redd\.it|reddit.com\/link).*?)|(?!https)([a-zA-Z0-9]+( ".*?")?))\)?/;

export function containsInlineMedia(body: string): boolean {
  return INLINE_MEDIA_PATTERN.test(body);
}

/**
 * Substitute `{name}` placeholders. `{{` and `}}` produce literal braces.
 *
 * @throws {InvalidArgumentError} for a placeholder with no replacement
 */
export function formatPlaceholders(body: string, replacements: Record<string, string>): string {
  return body.replace(/\{\{|\}\}|\{([^{}]*)\}/g, (token, name: string | undefined) => {
    if (token === '{{') return '{';
    if (token === '}}') return '}';
    if (name === undefined || !Object.prototype.hasOwnProperty.call(replacements, name)) {
      throw new InvalidArgumentError(`No inline media given for placeholder '${name ?? ''}'`, {
        placeholder: name,
      });
    }
    return replacements[name];
  });
}
