import type { Logger } from '../util/logger.js';
import type { RangeByteSource, ReadStrategy } from '../types/index.js';
import { checkedRead } from './checkedRead.js';

/** Keeps reading until `count` bytes are filled or the source returns 0. */
export class AccumulatingReadStrategy implements ReadStrategy {
  readonly name = 'accumulate';

  fill(
    source: RangeByteSource,
    target: Uint8Array,
    offset: number,
    count : number,
    log   : Logger,
  ): number {
    let total = 0;
    let read  = 0;
    let calls = 0;

    do {
      if (total >= count) break;
      read = checkedRead(source, target, offset + total, count - total);
      total += read;
      calls++;
      log.log(4, `read #${calls}: ${read} bytes (${total}/${count})`);
    } while (read > 0);

    return total;
  }
}
