import { describe, it, expect } from 'vitest';
import { UniqueStream } from '../src/streams/UniqueStream';
import { keyed, text, collect } from './helpers';

describe('UniqueStream', () => {
  it('should keep the first record for each repeated key', () => {
    const stream = new UniqueStream(keyed(['a', 1], ['a', 2], ['b', 3], ['b', 4], ['c', 5]));

    expect(collect(stream)).toEqual([
      { key: 'a', value: 1 },
      { key: 'b', value: 3 },
      { key: 'c', value: 5 },
    ]);
  });

  it('should leave an already unique stream unchanged', () => {
    const records = [['a', 'x'], ['b', 'y'], ['c', 'z']] satisfies Array<[string, string]>;

    expect(collect(new UniqueStream(keyed(...records)))).toEqual(collect(keyed(...records)));
  });

  it('should keep skipping a repeated key across a blank line', () => {
    expect(collect(new UniqueStream(text('k a\n\nk b\nm 1\n')))).toEqual([
      { key: 'k', value: { kind: 'scalar', value: 'a' } },
      { key: 'm', value: { kind: 'scalar', value: '1' } },
    ]);
  });

  it('should yield nothing for an empty stream', () => {
    const stream = new UniqueStream(keyed<number>());

    expect(stream.atEnd()).toBe(true);
    expect(collect(stream)).toEqual([]);
  });

  it('should support its own pushback on top of the inner one', () => {
    const stream = new UniqueStream(keyed(['a', 1], ['a', 2], ['b', 3]));

    expect(stream.pull()).toEqual({ key: 'a', value: 1 });
    stream.pushback();
    expect(stream.pull()).toEqual({ key: 'a', value: 1 });
    expect(stream.pull()).toEqual({ key: 'b', value: 3 });
    expect(stream.atEnd()).toBe(true);
    expect(stream.pull()).toBeNull();
  });

  it('should apply its own filters to de-duplicated records', () => {
    const stream = new UniqueStream(text('a 1\na 2\nb 3\n'));
    stream.addFilter(key => key === 'a');

    expect(collect(stream)).toEqual([{ key: 'a', value: { kind: 'scalar', value: '1' } }]);
  });

  it('should rewind the wrapped stream', () => {
    const stream = new UniqueStream(keyed(['a', 1], ['a', 2]));
    collect(stream);

    expect(collect(stream.rewind())).toEqual([{ key: 'a', value: 1 }]);
  });
});
