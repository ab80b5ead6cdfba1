export interface Allocator {
  /** Returns a zeroed block of `size` bytes, or null when none can be provided. */
  allocate(size: number): Uint8Array | null;
  release(block: Uint8Array): void;
}

export class ReleaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReleaseError';
  }
}

export class DoubleReleaseError extends ReleaseError {
  constructor() {
    super('Buffer has already been released');
    this.name = 'DoubleReleaseError';
  }
}

export class UseAfterReleaseError extends ReleaseError {
  constructor() {
    super('Buffer was used after release');
    this.name = 'UseAfterReleaseError';
  }
}

/**
 * Allocator backed by plain typed arrays that keeps count of what is live.
 * `limit` caps the bytes held at once; requests beyond it return null.
 */
export class HeapAllocator implements Allocator {
  private readonly live = new Set<Uint8Array>();
  private bytesInUse = 0;

  constructor(private readonly limit: number = Infinity) {}

  get liveBlocks(): number {
    return this.live.size;
  }

  get liveBytes(): number {
    return this.bytesInUse;
  }

  allocate(size: number): Uint8Array | null {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Allocation size must be a non-negative integer, got ${size}`);
    }
    if (this.bytesInUse + size > this.limit) return null;

    let block: Uint8Array;
    try {
      block = new Uint8Array(size);
    } catch (err) {
      // Array too large for the runtime
      if (err instanceof RangeError) return null;
      throw err;
    }

    this.live.add(block);
    this.bytesInUse += size;
    return block;
  }

  release(block: Uint8Array): void {
    if (!this.live.delete(block)) {
      throw new ReleaseError('Block is not live in this allocator');
    }
    this.bytesInUse -= block.byteLength;
  }
}

export const defaultAllocator = new HeapAllocator();
