import { StrategyRegistry } from './StrategyRegistry.js';
import { SingleReadStrategy } from '../strategy/SingleReadStrategy.js';
import { AccumulatingReadStrategy } from '../strategy/AccumulatingReadStrategy.js';
import type { CompletionMode, StrategyName } from '../types/index.js';

StrategyRegistry.register(new SingleReadStrategy());
StrategyRegistry.register(new AccumulatingReadStrategy());

export const DEFAULT_STRATEGY  : StrategyName   = 'accumulate';
export const DEFAULT_COMPLETION: CompletionMode = 'strict';

/** Upper bound for a single CLI extraction (1 GiB) */
export const DEFAULT_MAX_EXTRACT_BYTES = 1024 * 1024 * 1024;

export const STRATEGY_NAMES   = ['single', 'accumulate'] as const satisfies readonly StrategyName[];
export const COMPLETION_MODES = ['strict', 'short'] as const satisfies readonly CompletionMode[];

export function isCompletionMode(v: string): v is CompletionMode {
  return COMPLETION_MODES.some(m => m === v);
}
