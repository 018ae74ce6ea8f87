import type { MessageEntity } from '../parsers/entity.js';
import { unparse } from '../text/unparse.js';

/**
 * Text paired with its formatting entities.
 *
 * Offsets, lengths and `slice` positions are UTF-16 code units, the unit the
 * wire format counts in. Instances are never mutated after construction.
 */
export class Str {
  readonly value: string;
  readonly entities: readonly MessageEntity[];

  constructor(value: string, entities: readonly MessageEntity[] = []) {
    this.value = value;
    this.entities = entities;
  }

  /** Length in UTF-16 code units */
  get length(): number {
    return this.value.length;
  }

  get markdown(): string {
    return unparse(this.value, this.entities, 'markdown');
  }

  get html(): string {
    return unparse(this.value, this.entities, 'html');
  }

  /** Sub-range of the text, with entities clipped and shifted to the new origin */
  slice(start: number, end: number = this.value.length): Str {
    const from = clamp(start < 0 ? this.value.length + start : start, this.value.length);
    const to = Math.max(from, clamp(end < 0 ? this.value.length + end : end, this.value.length));
    return new Str(this.value.slice(from, to), reindexEntities(this.entities, from, to));
  }

  toString(): string {
    return this.value;
  }
}

function clamp(n: number, max: number): number {
  return Math.min(Math.max(n, 0), max);
}

/**
 * Re-base entities onto the window [from, to): spans are clipped to the window
 * and shifted so `from` becomes offset 0. Spans left empty are dropped.
 */
export function reindexEntities(entities: readonly MessageEntity[], from: number, to: number): MessageEntity[] {
  const result: MessageEntity[] = [];
  for (const entity of entities) {
    const start = Math.max(entity.offset, from);
    const end = Math.min(entity.offset + entity.length, to);
    if (end <= start) continue;
    result.push({ ...entity, offset: start - from, length: end - start });
  }
  return result;
}
