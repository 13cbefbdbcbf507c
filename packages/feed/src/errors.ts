/**
 * - network: transport failure or timeout
 * - decode: body is not JSON or does not match the response schema
 * - upstream: the feed answered with a result other than "success"
 */
export type FeedErrorKind = 'network' | 'decode' | 'upstream';

export class FeedError extends Error {
  readonly kind: FeedErrorKind;
  readonly httpStatus?: number;

  constructor(kind: FeedErrorKind, message: string, httpStatus?: number) {
    super(message);
    this.name = 'FeedError';
    this.kind = kind;
    this.httpStatus = httpStatus;
  }

  /**
   * Whether a fresh request for the same page may succeed
   */
  get retryable(): boolean {
    return this.kind !== 'decode';
  }
}
