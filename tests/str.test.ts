import { describe, it, expect } from 'vitest';

import { Str, reindexEntities } from '../src/core/str.js';
import type { MessageEntity } from '../src/parsers/entity.js';
import { escapeHtml, unparse } from '../src/text/unparse.js';

describe('Str markup', () => {
  it('wraps a bold hashtag in markdown delimiters', () => {
    const str = new Str('hi #typescript', [{ type: 'bold', offset: 3, length: 11 }]);
    expect(str.markdown).toBe('hi **#typescript**');
  });

  it('renders the same span as html', () => {
    const str = new Str('hi #typescript', [{ type: 'bold', offset: 3, length: 11 }]);
    expect(str.html).toBe('hi <b>#typescript</b>');
  });

  it('closes inner spans before outer ones at a shared boundary', () => {
    const str = new Str('bold italic', [
      { type: 'bold', offset: 0, length: 11 },
      { type: 'italic', offset: 5, length: 6 },
    ]);
    expect(str.markdown).toBe('**bold __italic__**');
    expect(str.html).toBe('<b>bold <i>italic</i></b>');
  });

  it('escapes text but not tags in html', () => {
    const str = new Str('a < b', [{ type: 'bold', offset: 0, length: 1 }]);
    expect(str.html).toBe('<b>a</b> &lt; b');
  });

  it('marks every quoted line in markdown', () => {
    const str = new Str('one\ntwo', [{ type: 'blockquote', offset: 0, length: 7 }]);
    expect(str.markdown).toBe('>one\n>two');
  });

  it('renders collapsed quotes as expandable blockquotes', () => {
    const str = new Str('long', [{ type: 'blockquote', offset: 0, length: 4, collapsed: true }]);
    expect(str.html).toBe('<blockquote expandable>long</blockquote>');
  });

  it('renders code blocks with their language', () => {
    const str = new Str('x=1', [{ type: 'pre', offset: 0, length: 3, language: 'ts' }]);
    expect(str.markdown).toBe('```ts\nx=1\n```');
    expect(str.html).toBe('<pre language="ts">x=1</pre>');
  });

  it('renders links and mentions', () => {
    const entities: MessageEntity[] = [{ type: 'text_link', offset: 0, length: 4, url: 'https://example.com' }];
    expect(unparse('docs', entities, 'markdown')).toBe('[docs](https://example.com)');
    expect(unparse('docs', entities, 'html')).toBe('<a href="https://example.com">docs</a>');
  });

  it('renders custom emoji with their document id', () => {
    const str = new Str('*', [{ type: 'custom_emoji', offset: 0, length: 1, customEmojiId: 42n }]);
    expect(str.html).toBe('<emoji id="42">*</emoji>');
  });

  it('leaves entities without markup untouched', () => {
    const str = new Str('#tag', [{ type: 'hashtag', offset: 0, length: 4 }]);
    expect(str.markdown).toBe('#tag');
  });

  it('escapes html special characters', () => {
    expect(escapeHtml('<a & b>')).toBe('&lt;a &amp; b&gt;');
  });
});

describe('Str slicing', () => {
  const str = new Str('hello world', [{ type: 'bold', offset: 6, length: 5 }]);

  it('shifts entities to the new origin', () => {
    const tail = str.slice(6);
    expect(tail.value).toBe('world');
    expect(tail.entities).toEqual([{ type: 'bold', offset: 0, length: 5 }]);
  });

  it('clips entities that cross the slice edge', () => {
    const middle = str.slice(4, 8);
    expect(middle.value).toBe('o wo');
    expect(middle.entities).toEqual([{ type: 'bold', offset: 2, length: 2 }]);
  });

  it('drops entities outside the slice', () => {
    expect(str.slice(0, 5).entities).toEqual([]);
  });

  it('counts negative positions from the end', () => {
    expect(str.slice(-5).value).toBe('world');
  });

  it('measures length in UTF-16 code units', () => {
    expect(new Str('👍 ok').length).toBe(5);
  });

  it('converts to its plain value', () => {
    expect(`${str}`).toBe('hello world');
  });

  it('reindexes spans against a window', () => {
    expect(reindexEntities([{ type: 'italic', offset: 2, length: 6 }], 4, 6)).toEqual([
      { type: 'italic', offset: 0, length: 2 },
    ]);
  });
});
