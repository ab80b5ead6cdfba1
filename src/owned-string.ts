import { TextDecoder } from 'node:util';
import { DoubleReleaseError, UseAfterReleaseError, type Allocator } from './allocator.js';

const decoder = new TextDecoder();

/**
 * A NUL-terminated UTF-8 buffer with a single owner. Once released, every
 * accessor throws {@link UseAfterReleaseError}.
 */
export class OwnedString {
  private block: Uint8Array | null;

  constructor(block: Uint8Array, private readonly allocator: Allocator) {
    this.block = block;
  }

  get released(): boolean {
    return this.block === null;
  }

  /** The underlying block, terminator included. */
  get bytes(): Uint8Array {
    return this.live();
  }

  /** Byte length without the terminator. */
  get length(): number {
    return this.live().length - 1;
  }

  get value(): string {
    const block = this.live();
    return decoder.decode(block.subarray(0, block.length - 1));
  }

  toString(): string {
    return this.value;
  }

  release(): void {
    if (this.block === null) throw new DoubleReleaseError();
    const block = this.block;
    this.block = null;
    this.allocator.release(block);
  }

  private live(): Uint8Array {
    if (this.block === null) throw new UseAfterReleaseError();
    return this.block;
  }
}
