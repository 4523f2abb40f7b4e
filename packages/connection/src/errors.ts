/**
 * Error thrown (or reported through a write result) when the transport
 * rejects a packet submission.
 */
export class TransportSubmitError extends Error {
  override readonly name = "TransportSubmitError"

  constructor(
    public readonly packetIndex: number,
    public override readonly cause: unknown,
  ) {
    super(
      `Transport rejected packet ${packetIndex}: ${cause instanceof Error ? cause.message : String(cause)}`,
    )
  }
}

/**
 * Error thrown when an operation is not allowed in the current state.
 */
export class InvalidStateError extends Error {
  override readonly name = "InvalidStateError"
}
