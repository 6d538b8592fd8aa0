import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import { RewindError, StreamUsageError } from '../src/common/Errors';
import { FileLineSource, withFileSource, withFileSources } from '../src/streams/source/FileLineSource';
import { TextRecordStream } from '../src/streams/TextRecordStream';
import { tempDir, writeFile, collect } from './helpers';

function readAll(source: FileLineSource): string[] {
  const lines: string[] = [];
  for (let line = source.readLine(); line !== null; line = source.readLine()) {
    lines.push(line);
  }
  return lines;
}

describe('FileLineSource', () => {
  let dir: string;

  beforeAll(() => {
    dir = tempDir();
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should assemble lines that span several chunks', () => {
    const filePath = writeFile(dir, 'chunks.txt', 'alpha 1 2\nbeta 3\n');
    const source = new FileLineSource(filePath, 4);

    expect(readAll(source)).toEqual(['alpha 1 2', 'beta 3']);
    expect(source.isExhausted()).toBe(true);
    source.close();
  });

  it('should decode multi-byte characters split across chunks', () => {
    const filePath = writeFile(dir, 'utf8.txt', 'ключ значение\nb 2\n');
    const source = new FileLineSource(filePath, 3);

    expect(readAll(source)).toEqual(['ключ значение', 'b 2']);
    source.close();
  });

  it('should return a final line without a trailing newline', () => {
    const filePath = writeFile(dir, 'no-newline.txt', 'a 1\nb 2');
    const source = FileLineSource.open(filePath);

    expect(readAll(source)).toEqual(['a 1', 'b 2']);
    source.close();
  });

  it('should strip carriage returns', () => {
    const filePath = writeFile(dir, 'crlf.txt', 'a 1\r\nb 2\r\n');
    const source = FileLineSource.open(filePath);

    expect(readAll(source)).toEqual(['a 1', 'b 2']);
    source.close();
  });

  it('should be exhausted straight away for an empty file', () => {
    const filePath = writeFile(dir, 'empty.txt', '');
    const source = FileLineSource.open(filePath);

    expect(source.isExhausted()).toBe(true);
    expect(source.readLine()).toBeNull();
    source.close();
  });

  it('should start over after a rewind', () => {
    const filePath = writeFile(dir, 'rewind.txt', 'a 1\nb 2\n');
    const source = new FileLineSource(filePath, 2);

    expect(readAll(source)).toEqual(['a 1', 'b 2']);
    source.rewind();
    expect(readAll(source)).toEqual(['a 1', 'b 2']);
    source.close();
  });

  it('should refuse to rewind or read once closed', () => {
    const filePath = writeFile(dir, 'closed.txt', 'a 1\n');
    const source = FileLineSource.open(filePath);
    source.close();
    source.close();

    expect(source.isClosed()).toBe(true);
    expect(() => source.rewind()).toThrow(RewindError);
    expect(() => source.readLine()).toThrow(StreamUsageError);
  });

  it('should reject a chunk size below one', () => {
    const filePath = writeFile(dir, 'chunk.txt', 'a 1\n');

    expect(() => new FileLineSource(filePath, 0)).toThrow(/chunkSize must be >= 1/);
  });

  it('should feed a TextRecordStream', () => {
    const filePath = writeFile(dir, 'records.txt', 'alpha 1 2\nbeta 3\n');

    const records = withFileSource(filePath, source => collect(new TextRecordStream(source)));

    expect(records).toEqual([
      { key: 'alpha', value: { kind: 'sequence', values: ['1', '2'] } },
      { key: 'beta', value: { kind: 'scalar', value: '3' } },
    ]);
  });

  it('should close the source when the callback throws', () => {
    const filePath = writeFile(dir, 'throws.txt', 'a 1\n');
    const captured: { source?: FileLineSource } = {};

    expect(() => withFileSource(filePath, source => {
      captured.source = source;
      throw new Error('boom');
    })).toThrow('boom');
    expect(captured.source?.isClosed()).toBe(true);
  });

  it('should close every source opened for several files', () => {
    const first = writeFile(dir, 'first.txt', 'a 1\n');
    const second = writeFile(dir, 'second.txt', 'b 2\n');
    let captured: FileLineSource[] = [];

    const count = withFileSources([first, second], sources => {
      captured = sources;
      return sources.length;
    });

    expect(count).toBe(2);
    expect(captured.map(source => source.isClosed())).toEqual([true, true]);
  });
});
