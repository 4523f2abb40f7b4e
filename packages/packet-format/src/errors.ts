/**
 * Error types for packet framing.
 */

/**
 * Protocol-level ordering violations detected during reassembly.
 */
export type FramingError =
  | { type: "unexpected_first_packet" }
  | { type: "unexpected_continuation"; counter: number }
  | { type: "sequence_gap"; expected: number; actual: number }
  | { type: "message_too_large"; limit: number; size: number }
  | { type: "malformed_packet"; code: MalformedPacketCode; message: string }

export type InvalidArgumentCode =
  | "payload_too_large"
  | "counter_out_of_range"
  | "chunk_size_too_small"
  | "invalid_format"
  | "invalid_max_packet_size"

export type MalformedPacketCode = "truncated_header" | "reserved_bits"

/**
 * Error thrown when a payload, counter or size cannot be framed.
 */
export class InvalidArgumentError extends Error {
  override readonly name = "InvalidArgumentError"

  constructor(
    public readonly code: InvalidArgumentCode,
    message: string,
  ) {
    super(message)
  }
}

/**
 * Error thrown when bytes from the transport cannot be decoded as a packet.
 */
export class MalformedPacketError extends Error {
  override readonly name = "MalformedPacketError"

  constructor(
    public readonly code: MalformedPacketCode,
    message: string,
  ) {
    super(message)
  }
}

/**
 * Error thrown when an outbound message needs more packets than allowed.
 */
export class MessageTooLargeError extends Error {
  override readonly name = "MessageTooLargeError"

  constructor(
    public readonly packetCount: number,
    public readonly limit: number,
  ) {
    super(
      `Message needs ${packetCount} packets, more than the limit of ${limit}`,
    )
  }
}

/**
 * Error thrown when a packet list does not reassemble into exactly one message.
 */
export class PacketReassembleError extends Error {
  override readonly name = "PacketReassembleError"

  constructor(
    public readonly code: "framing" | "incomplete" | "trailing_packets",
    message: string,
    public readonly framingError?: FramingError,
  ) {
    super(message)
  }
}

/**
 * Error thrown when a control payload cannot be decoded.
 */
export class ControlDecodeError extends Error {
  override readonly name = "ControlDecodeError"

  constructor(
    public readonly code:
      | "empty"
      | "unknown_command"
      | "truncated"
      | "trailing_bytes",
    message: string,
  ) {
    super(message)
  }
}

/**
 * Render a framing error as a log-friendly sentence.
 */
export function describeFramingError(error: FramingError): string {
  switch (error.type) {
    case "unexpected_first_packet":
      return "First packet received while a message was still in progress"
    case "unexpected_continuation":
      return `Continuation packet (counter ${error.counter}) received with no message in progress`
    case "sequence_gap":
      return `Expected counter ${error.expected}, got ${error.actual}`
    case "message_too_large":
      return `Message of ${error.size} bytes exceeds the limit of ${error.limit}`
    case "malformed_packet":
      return `Malformed packet (${error.code}): ${error.message}`
  }
}
