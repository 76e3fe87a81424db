import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { dirname } from 'path';
import { ensureDir } from '../utils/filesystem.js';

export interface FileContent {
  path: string;
  size: number;
}

export type SinkContent = string | Buffer | FileContent;

/**
 * Destination for response bytes. `append` serves streamed single requests;
 * `allocate` + `writeAt` serve segmented downloads, where each segment owns a
 * disjoint offset range and no locking is needed.
 */
export interface Sink<T extends SinkContent> {
  append(chunk: Buffer): Promise<void>;
  writeAt(offset: number, chunk: Buffer): Promise<void>;
  /** Pre-size the store for `size` bytes. */
  allocate(size: number): Promise<void>;
  /** Highest byte offset written so far. */
  length(): number;
  /** Drop everything written; used before a retry attempt. */
  reset(): Promise<void>;
  close(): Promise<void>;
  content(): T;
}

abstract class MemorySink<T extends SinkContent> implements Sink<T> {
  protected buffer: Buffer = Buffer.alloc(0);
  protected size = 0;

  async append(chunk: Buffer): Promise<void> {
    this.write(this.size, chunk);
  }

  async writeAt(offset: number, chunk: Buffer): Promise<void> {
    this.write(offset, chunk);
  }

  async allocate(size: number): Promise<void> {
    this.ensureCapacity(size);
  }

  length(): number {
    return this.size;
  }

  async reset(): Promise<void> {
    this.buffer = Buffer.alloc(0);
    this.size = 0;
  }

  async close(): Promise<void> {
    // nothing to release
  }

  abstract content(): T;

  private write(offset: number, chunk: Buffer): void {
    const end = offset + chunk.length;
    this.ensureCapacity(end);
    chunk.copy(this.buffer, offset);
    this.size = Math.max(this.size, end);
  }

  private ensureCapacity(needed: number): void {
    if (needed <= this.buffer.length) {
      return;
    }
    const grown = Buffer.alloc(Math.max(needed, this.buffer.length * 2));
    this.buffer.copy(grown, 0, 0, this.size);
    this.buffer = grown;
  }
}

/** Collects bytes and decodes them as UTF-8 on read. */
export class TextSink extends MemorySink<string> {
  content(): string {
    return this.buffer.toString('utf-8', 0, this.size);
  }
}

export class BufferSink extends MemorySink<Buffer> {
  content(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.size));
  }
}

/**
 * Writes straight to disk. The file is created (or truncated) on first use,
 * at the latest by `close`, so an empty response leaves an empty file. The
 * handle is released by `close`; writing again after that starts a new file.
 */
export class FileSink implements Sink<FileContent> {
  private handle: Promise<FileHandle> | null = null;
  private opened = false;
  private size = 0;

  constructor(public readonly filePath: string) {}

  async append(chunk: Buffer): Promise<void> {
    await this.writeAt(this.size, chunk);
  }

  async writeAt(offset: number, chunk: Buffer): Promise<void> {
    const handle = await this.open();
    await handle.write(chunk, 0, chunk.length, offset);
    this.size = Math.max(this.size, offset + chunk.length);
  }

  async allocate(size: number): Promise<void> {
    const handle = await this.open();
    await handle.truncate(size);
  }

  length(): number {
    return this.size;
  }

  async reset(): Promise<void> {
    const handle = await this.open();
    await handle.truncate(0);
    this.size = 0;
  }

  async close(): Promise<void> {
    if (!this.handle && this.opened) {
      return;
    }
    const handle = await this.open();
    this.handle = null;
    await handle.close();
  }

  content(): FileContent {
    return { path: this.filePath, size: this.size };
  }

  // Concurrent segments share one pending open
  private open(): Promise<FileHandle> {
    if (!this.handle) {
      this.size = 0;
      this.handle = ensureDir(dirname(this.filePath))
        .then(() => fs.open(this.filePath, 'w+'))
        .then((handle) => {
          this.opened = true;
          return handle;
        })
        .catch((error: unknown) => {
          this.handle = null;
          throw error;
        });
    }
    return this.handle;
  }
}

export const textSink = (): TextSink => new TextSink();
export const bufferSink = (): BufferSink => new BufferSink();
export const fileSink = (filePath: string): FileSink => new FileSink(filePath);
