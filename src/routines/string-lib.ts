import { TextEncoder } from 'node:util';
import { defaultAllocator, type Allocator } from '../allocator.js';
import { OwnedString } from '../owned-string.js';

const encoder = new TextEncoder();

/**
 * Copies `input` into a freshly allocated, NUL-terminated UTF-8 buffer owned
 * by the caller. Returns null when the allocator cannot provide the block.
 *
 * Release the result exactly once with {@link freeString}.
 */
export function createString(input: string, allocator: Allocator = defaultAllocator): OwnedString | null {
  if (input.includes('\0')) {
    throw new TypeError('Input contains an embedded NUL character');
  }

  const encoded = encoder.encode(input);
  const block = allocator.allocate(encoded.length + 1);
  if (block === null) return null;

  block.set(encoded);
  block[encoded.length] = 0;
  return new OwnedString(block, allocator);
}

export function freeString(str?: OwnedString | null): void {
  if (!str) return;
  str.release();
}
