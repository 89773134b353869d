export type FeedFailurePhase = "connect" | "send" | "closed";

/** Fatal transport condition on the feed connection. The connector does not reconnect. */
export class FeedConnectionError extends Error {
  readonly phase: FeedFailurePhase;

  constructor(phase: FeedFailurePhase, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FeedConnectionError";
    this.phase = phase;
  }
}

export function isFeedConnectionError(err: unknown): err is FeedConnectionError {
  return err instanceof FeedConnectionError;
}
