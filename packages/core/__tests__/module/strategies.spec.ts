import { AccumulatingReadStrategy } from '../../src/strategy/AccumulatingReadStrategy.js';
import { SingleReadStrategy }       from '../../src/strategy/SingleReadStrategy.js';
import { SourceContractError }      from '../../src/errors/index.js';
import { createLogger }             from '../../src/util/logger.js';
import type { RangeByteSource, ReadStrategy } from '../../src/types/index.js';
import { ScriptedSource, sample }   from './_helper.js';

const quiet = createLogger(0, () => {});

describe('AccumulatingReadStrategy', () => {
  const strategy = new AccumulatingReadStrategy();

  it('asks only for the unfilled remainder at the right offset', () => {
    const src    = new ScriptedSource(sample(10), [3, 4]);
    const target = new Uint8Array(10);

    expect(strategy.fill(src, target, 0, 10, quiet)).toBe(10);
    expect(src.calls).toEqual([
      { offset: 0, count: 10 },
      { offset: 3, count: 7 },
      { offset: 7, count: 3 },
    ]);
    expect(Array.from(target)).toEqual(Array.from(sample(10)));
  });

  it('stops at the first empty read', () => {
    const src    = new ScriptedSource(sample(10), [4, 0, 6]);
    const target = new Uint8Array(10);

    expect(strategy.fill(src, target, 0, 10, quiet)).toBe(4);
    expect(src.calls).toHaveLength(2);
    expect(Array.from(target.subarray(4))).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it('issues no read for a zero count', () => {
    const src = new ScriptedSource(sample(4));
    expect(strategy.fill(src, new Uint8Array(0), 0, 0, quiet)).toBe(0);
    expect(src.calls).toHaveLength(0);
  });

  it('traces every physical read at level 4', () => {
    const sink: string[] = [];
    const src = new ScriptedSource(sample(6), [2, 4]);

    strategy.fill(src, new Uint8Array(6), 0, 6, createLogger(4, m => sink.push(m)));
    expect(sink).toEqual([
      '4| read #1: 2 bytes (2/6)',
      '4| read #2: 4 bytes (6/6)',
    ]);
  });
});

describe('SingleReadStrategy', () => {
  const strategy = new SingleReadStrategy();

  it('issues exactly one read and reports what it got', () => {
    const src = new ScriptedSource(sample(10), [3]);
    expect(strategy.fill(src, new Uint8Array(10), 0, 10, quiet)).toBe(3);
    expect(src.calls).toHaveLength(1);
  });
});

const STRATEGIES: Array<[string, ReadStrategy]> = [
  ['single',     new SingleReadStrategy()],
  ['accumulate', new AccumulatingReadStrategy()],
];

describe.each(STRATEGIES)('%s strategy - source contract', (_label, strategy) => {
  const rogue = (n: number): RangeByteSource => ({
    position  : 0,
    isReadable: true,
    read      : () => n,
  });

  it.each([-1, 1.5, 5])('rejects bytesRead=%s for a 4-byte request', n => {
    expect(() => strategy.fill(rogue(n), new Uint8Array(4), 0, 4, quiet))
      .toThrow(SourceContractError);
  });

  it('propagates source I/O errors unchanged', () => {
    const failure = new Error('EIO: i/o error, read');
    const broken: RangeByteSource = {
      position  : 0,
      isReadable: true,
      read      : () => { throw failure; },
    };

    let caught: unknown;
    try {
      strategy.fill(broken, new Uint8Array(4), 0, 4, quiet);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBe(failure);
  });
});
