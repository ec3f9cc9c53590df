import type { BlobStore, BlobUpload } from '../../src/store/attachment-blobs.js';

export interface MemoryBlob {
  filename: string;
  chunks: Buffer[];
  state: 'open' | 'finished' | 'aborted';
}

/** BlobStore keeping uploads in a map, with every upload and delete recorded. */
export class MemoryBlobStore implements BlobStore {
  blobs = new Map<string, MemoryBlob>();
  deleted: string[] = [];
  /** Fail writes once this many bytes have gone into one upload. */
  failWritesAfter: number | null = null;
  private nextId = 1;

  openUpload(filename: string): BlobUpload {
    const id = String(this.nextId++).padStart(24, '0');
    const blob: MemoryBlob = { filename, chunks: [], state: 'open' };
    this.blobs.set(id, blob);
    return {
      id,
      write: async (chunk) => {
        const size = blob.chunks.reduce((n, c) => n + c.length, 0) + chunk.length;
        if (this.failWritesAfter !== null && size > this.failWritesAfter) throw new Error('blob write failed');
        blob.chunks.push(Buffer.from(chunk));
      },
      finish: async () => {
        blob.state = 'finished';
      },
      abort: async () => {
        blob.state = 'aborted';
      }
    };
  }

  async delete(id: string): Promise<void> {
    this.deleted.push(id);
    this.blobs.delete(id);
  }

  bytes(id: string): Buffer | null {
    const blob = this.blobs.get(id);
    return blob ? Buffer.concat(blob.chunks) : null;
  }
}
