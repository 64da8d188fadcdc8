export interface LeakSnapshot {
  chunks: number;
  retainedBytes: number;
}

/**
 * Process-wide buffer that only grows. Chunks are never released while the
 * process lives; the size observed by callers is monotonically non-decreasing.
 */
export class LeakStore {
  private readonly chunks: Buffer[] = [];
  private retainedBytes = 0;

  constructor(private readonly chunkBytes: number) {
    if (!Number.isInteger(chunkBytes) || chunkBytes <= 0) {
      throw new Error('Chunk size must be a positive integer');
    }
  }

  retain(): LeakSnapshot {
    this.chunks.push(Buffer.alloc(this.chunkBytes, 'x'));
    this.retainedBytes += this.chunkBytes;
    return this.size();
  }

  size(): LeakSnapshot {
    return { chunks: this.chunks.length, retainedBytes: this.retainedBytes };
  }
}
