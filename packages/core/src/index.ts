// packages/core/src/index.ts

export { LazyRangeBuffer }          from './buffer/LazyRangeBuffer.js';
export { MemoryRangeSource, type MemoryRangeSourceOptions } from './source/MemoryRangeSource.js';
export { StrategyRegistry }         from './config/StrategyRegistry.js';
export { SingleReadStrategy }       from './strategy/SingleReadStrategy.js';
export { AccumulatingReadStrategy } from './strategy/AccumulatingReadStrategy.js';
export {
  DEFAULT_STRATEGY,
  DEFAULT_COMPLETION,
  DEFAULT_MAX_EXTRACT_BYTES,
  STRATEGY_NAMES,
  COMPLETION_MODES,
  isCompletionMode,
} from './config/defaults.js';

export type {
  RangeByteSource,
  ReadStrategy,
  StrategyName,
  CompletionMode,
  LazyRangeBufferOptions,
} from './types/index.js';

export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
export { base64Encode, hexEncode, concat } from './util/bytes.js';

export {
  ByteRangeError,
  SourceUnavailableError,
  IncompleteRangeError,
  InvalidRangeError,
  SourceContractError,
  StrategyError,
  ConfigurationError,
  FilesystemError,
  EncodingError,
} from './errors/index.js';
