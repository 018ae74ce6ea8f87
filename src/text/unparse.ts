/**
 * Render text + entities back into markup.
 *
 * Two dialects are supported, matching what the outbound parser accepts:
 *   markdown  **bold**  __italic__  --underline--  ~~strike~~  ||spoiler||  `code`  ```pre```
 *             [text](url)  >quote
 *   html      <b> <i> <u> <s> <spoiler> <code> <pre> <a href> <emoji id> <blockquote>
 *
 * Entity offsets are UTF-16 code units, which is how JS strings index, so
 * positions are used directly against the string.
 */

import type { MessageEntity } from '../parsers/entity.js';

export type MarkupDialect = 'markdown' | 'html';

interface Tag {
  pos: number;
  text: string;
  close: boolean;
  start: number;
  end: number;
  index: number;
}

const MARKDOWN_DELIMITERS: Partial<Record<MessageEntity['type'], string>> = {
  bold: '**',
  italic: '__',
  underline: '--',
  strikethrough: '~~',
  spoiler: '||',
  code: '`',
};

const HTML_TAGS: Partial<Record<MessageEntity['type'], string>> = {
  bold: 'b',
  italic: 'i',
  underline: 'u',
  strikethrough: 's',
  spoiler: 'spoiler',
  code: 'code',
};

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttribute(text: string): string {
  return escapeHtml(text).replace(/"/g, '&quot;');
}

function markdownTags(entity: MessageEntity): [string, string] | null {
  const delimiter = MARKDOWN_DELIMITERS[entity.type];
  if (delimiter) return [delimiter, delimiter];

  switch (entity.type) {
    case 'pre':
      return [`\`\`\`${entity.language ?? ''}\n`, '\n```'];
    case 'text_link':
      return entity.url ? ['[', `](${entity.url})`] : null;
    case 'text_mention':
      return entity.user ? ['[', `](tg://user?id=${entity.user.id})`] : null;
    case 'custom_emoji':
      return entity.customEmojiId !== undefined ? ['![', `](tg://emoji?id=${entity.customEmojiId})`] : null;
    default:
      return null;
  }
}

function htmlTags(entity: MessageEntity): [string, string] | null {
  const tag = HTML_TAGS[entity.type];
  if (tag) return [`<${tag}>`, `</${tag}>`];

  switch (entity.type) {
    case 'pre':
      return entity.language
        ? [`<pre language="${escapeAttribute(entity.language)}">`, '</pre>']
        : ['<pre>', '</pre>'];
    case 'text_link':
      return entity.url ? [`<a href="${escapeAttribute(entity.url)}">`, '</a>'] : null;
    case 'text_mention':
      return entity.user ? [`<a href="tg://user?id=${entity.user.id}">`, '</a>'] : null;
    case 'custom_emoji':
      return entity.customEmojiId !== undefined ? [`<emoji id="${entity.customEmojiId}">`, '</emoji>'] : null;
    case 'blockquote':
      return [entity.collapsed ? '<blockquote expandable>' : '<blockquote>', '</blockquote>'];
    default:
      return null;
  }
}

function collectTags(text: string, entities: readonly MessageEntity[], dialect: MarkupDialect): Tag[] {
  const tags: Tag[] = [];

  entities.forEach((entity, index) => {
    const start = entity.offset;
    const end = entity.offset + entity.length;

    if (dialect === 'markdown' && entity.type === 'blockquote') {
      // Every line inside the quote gets its own marker.
      tags.push({ pos: start, text: '>', close: false, start, end, index });
      for (let i = start; i < end - 1; i++) {
        if (text[i] === '\n') tags.push({ pos: i + 1, text: '>', close: false, start, end, index });
      }
      return;
    }

    const pair = dialect === 'markdown' ? markdownTags(entity) : htmlTags(entity);
    if (!pair) return;
    tags.push({ pos: start, text: pair[0], close: false, start, end, index });
    tags.push({ pos: end, text: pair[1], close: true, start, end, index });
  });

  // At a shared position: closing tags first (innermost first), then opening tags (outermost first).
  return tags.sort((a, b) => {
    if (a.pos !== b.pos) return a.pos - b.pos;
    if (a.close !== b.close) return a.close ? -1 : 1;
    if (a.close) return b.start - a.start || b.index - a.index;
    return b.end - a.end || a.index - b.index;
  });
}

/** Render `text` with `entities` in the given markup dialect */
export function unparse(text: string, entities: readonly MessageEntity[], dialect: MarkupDialect): string {
  const escape = dialect === 'html' ? escapeHtml : (s: string) => s;
  const tags = collectTags(text, entities, dialect);

  let out = '';
  let cursor = 0;
  for (const tag of tags) {
    const pos = Math.min(Math.max(tag.pos, cursor), text.length);
    out += escape(text.slice(cursor, pos)) + tag.text;
    cursor = pos;
  }
  return out + escape(text.slice(cursor));
}
