const DISABLE_STACKTRACE : boolean = true;

export class ByteRangeError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export class SourceUnavailableError extends ByteRangeError {}
export class InvalidRangeError      extends ByteRangeError {}
export class SourceContractError    extends ByteRangeError {}
export class StrategyError          extends ByteRangeError {}
export class ConfigurationError     extends ByteRangeError {}
export class FilesystemError        extends ByteRangeError {}
export class EncodingError          extends ByteRangeError {}

/** Source ran dry before the range was filled. */
export class IncompleteRangeError extends ByteRangeError {
  constructor(
    readonly bytesRead: number,
    readonly expected : number,
  ) {
    super(`Incomplete range: got ${bytesRead} of ${expected} bytes`);
  }
}
