import type { Selector } from './selector';

/** Selector text that does not parse. Never reaches the message store. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** The selected window holds no messages. */
export class EmptyWindowError extends Error {
  constructor(
    public readonly selector: Selector,
    public readonly description: string,
  ) {
    super(`No messages in ${description}`);
    this.name = 'EmptyWindowError';
  }
}

export type SummarizationErrorCode =
  | 'TIMEOUT'
  | 'NETWORK'
  | 'RATE_LIMITED'
  | 'UPSTREAM'
  | 'AUTH'
  | 'MODEL_NOT_FOUND'
  | 'BAD_REQUEST'
  | 'EMPTY_RESPONSE'
  | 'BLOCKED'
  | 'UNAVAILABLE';

const TRANSIENT_CODES: ReadonlySet<SummarizationErrorCode> = new Set([
  'TIMEOUT',
  'NETWORK',
  'RATE_LIMITED',
  'UPSTREAM',
]);

/** Any failure of the external summarization call. */
export class SummarizationError extends Error {
  constructor(
    public readonly code: SummarizationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'SummarizationError';
  }

  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }
}
