import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ArrayRecordStream, TextRecordStream, StringLineSource } from '../src/streams';
import type { ISortedStream, StreamKey, StreamRecord } from '../src/streams';
import type { ILogger } from '../src/common/Logger';

export function keyed<V>(...pairs: Array<[string, V]>): ArrayRecordStream<string, V> {
  return ArrayRecordStream.fromPairs(pairs);
}

export function numbered<V>(...pairs: Array<[number, V]>): ArrayRecordStream<number, V> {
  return ArrayRecordStream.fromPairs(pairs);
}

export function text(content: string, label?: string): TextRecordStream {
  return new TextRecordStream(new StringLineSource(content, label));
}

export function collect<K extends StreamKey, V>(stream: ISortedStream<K, V>): StreamRecord<K, V>[] {
  return [...stream.iterate()];
}

export class MemoryLogger implements ILogger {
  public readonly entries: Array<{ level: 'info' | 'warn' | 'error'; message: string }> = [];

  public info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  public warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  public error(message: string, err?: unknown): void {
    const detail = err instanceof Error ? ` ${err.message}` : '';
    this.entries.push({ level: 'error', message: `${message}${detail}` });
  }
}

export class MemoryWriter {
  private readonly chunks: string[] = [];

  public write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  public text(): string {
    return this.chunks.join('');
  }
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'sorted-kv-streams-'));
}

export function writeFile(dir: string, name: string, content: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content, 'utf8');
  return filePath;
}
