import type { Logger } from '../util/logger.js';
import type { RangeByteSource, ReadStrategy } from '../types/index.js';
import { checkedRead } from './checkedRead.js';

/**
 * One physical read per request. Only complete for sources that fill the
 * caller's buffer whenever data remains (e.g. in-memory sources).
 */
export class SingleReadStrategy implements ReadStrategy {
  readonly name = 'single';

  fill(
    source: RangeByteSource,
    target: Uint8Array,
    offset: number,
    count : number,
    log   : Logger,
  ): number {
    if (count === 0) return 0;
    const read = checkedRead(source, target, offset, count);
    log.log(4, `read ${read}/${count} at target offset ${offset}`);
    return read;
  }
}
