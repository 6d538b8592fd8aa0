import * as fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { RewindError, StreamUsageError } from '../../common/Errors';
import type { ILineSource } from './ILineSource';

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

interface ReaderState {
  position: number;
  partial: string;
  pending: string[];
  eof: boolean;
  decoder: StringDecoder;
}

function freshState(): ReaderState {
  return {
    position: 0,
    partial: '',
    pending: [],
    eof: false,
    decoder: new StringDecoder('utf8'),
  };
}

/**
 * Buffered synchronous line reader over a file descriptor.
 *
 * Reads chunkSize bytes at a time and keeps at most one chunk's worth of
 * decoded lines in memory.
 */
export class FileLineSource implements ILineSource {
  private readonly filePath: string;
  private readonly buffer: Buffer;
  private fd: number | null;
  private state: ReaderState = freshState();

  constructor(filePath: string, chunkSize: number = DEFAULT_CHUNK_SIZE) {
    if (chunkSize < 1) {
      throw new StreamUsageError(`FileLineSource: chunkSize must be >= 1, got ${chunkSize}`);
    }
    this.filePath = filePath;
    this.buffer = Buffer.allocUnsafe(chunkSize);
    this.fd = fs.openSync(filePath, 'r');
  }

  public static open(filePath: string, chunkSize?: number): FileLineSource {
    return new FileLineSource(filePath, chunkSize);
  }

  public readLine(): string | null {
    this.fill();
    const line = this.state.pending.shift();
    return line ?? null;
  }

  public isExhausted(): boolean {
    this.fill();
    return this.state.pending.length === 0;
  }

  public rewind(): void {
    if (this.fd === null) {
      throw new RewindError(this.describe());
    }
    this.state = freshState();
  }

  public close(): void {
    if (this.fd === null) {
      return;
    }
    fs.closeSync(this.fd);
    this.fd = null;
  }

  public isClosed(): boolean {
    return this.fd === null;
  }

  public describe(): string {
    return `FileLineSource(${this.filePath})`;
  }

  private fill(): void {
    const state = this.state;

    while (state.pending.length === 0 && !state.eof) {
      const fd = this.ensureOpen();
      const bytesRead = fs.readSync(fd, this.buffer, 0, this.buffer.length, state.position);

      if (bytesRead === 0) {
        state.eof = true;
        const tail = state.partial + state.decoder.end();
        state.partial = '';
        if (tail.length > 0) {
          state.pending.push(stripCarriageReturn(tail));
        }
        return;
      }

      state.position += bytesRead;
      const text = state.partial + state.decoder.write(this.buffer.subarray(0, bytesRead));
      const parts = text.split('\n');
      state.partial = parts.pop() ?? '';
      for (const part of parts) {
        state.pending.push(stripCarriageReturn(part));
      }
    }
  }

  private ensureOpen(): number {
    if (this.fd === null) {
      throw new StreamUsageError(`${this.describe()}: read after close`);
    }
    return this.fd;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Open a file source, run fn, and close the source on every exit path.
 */
export function withFileSource<T>(filePath: string, fn: (source: FileLineSource) => T): T {
  const source = FileLineSource.open(filePath);
  try {
    return fn(source);
  } finally {
    source.close();
  }
}

export function withFileSources<T>(filePaths: readonly string[], fn: (sources: FileLineSource[]) => T): T {
  const sources: FileLineSource[] = [];
  try {
    for (const filePath of filePaths) {
      sources.push(FileLineSource.open(filePath));
    }
    return fn(sources);
  } finally {
    for (const source of sources) {
      source.close();
    }
  }
}
