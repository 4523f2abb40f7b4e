/**
 * Stateful packet reassembly.
 *
 * One reassembler tracks one inbound stream. State exists only between a
 * first packet and its matching last packet. A framing violation clears it;
 * a first packet arriving mid-message also starts the next message.
 */

import {
  DEFAULT_MAX_MESSAGE_SIZE,
  DEFAULT_PACKET_FORMAT,
  type PacketFormat,
} from "./constants.js"
import { type FramingError, MalformedPacketError } from "./errors.js"
import {
  counterSpaceSize,
  decodePacket,
  type Packet,
  validatePacketFormat,
} from "./packet.js"

/**
 * Result of processing one packet.
 *
 * An `unexpected_first_packet` error still starts a new message from the
 * packet that raised it; when that packet is also a last packet, `data`
 * carries the completed message.
 */
export type ReassembleResult =
  | { status: "complete"; data: Uint8Array }
  | { status: "pending" }
  | { status: "error"; error: FramingError; data?: Uint8Array }

/**
 * Configuration for the packet reassembler.
 */
export interface ReassemblerConfig {
  /** Header layout of incoming packets (default: 1-byte header, 3-bit counter) */
  format: PacketFormat
  /** Largest message accepted, in bytes (default: 1MB) */
  maxMessageSize: number
}

/**
 * In-progress message state.
 */
interface MessageState {
  chunks: Uint8Array[]
  receivedBytes: number
  expectedCounter: number
}

const DEFAULT_CONFIG: ReassemblerConfig = {
  format: DEFAULT_PACKET_FORMAT,
  maxMessageSize: DEFAULT_MAX_MESSAGE_SIZE,
}

/**
 * Rebuilds messages from an ordered packet stream, checking the cyclic
 * counter on every continuation packet.
 */
export class PacketReassembler {
  private readonly config: ReassemblerConfig
  private readonly space: number
  private state: MessageState | undefined

  constructor(config?: Partial<ReassemblerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config }
    validatePacketFormat(this.config.format)
    this.space = counterSpaceSize(this.config.format)
  }

  /**
   * Process a decoded packet.
   */
  receive(packet: Packet): ReassembleResult {
    let state = this.state
    if (packet.isFirstPacket) {
      if (state) {
        this.reset()
        const error: FramingError = { type: "unexpected_first_packet" }
        const restarted = this.receive(packet)
        return restarted.status === "complete"
          ? { status: "error", error, data: restarted.data }
          : { status: "error", error }
      }

      state = {
        chunks: [],
        receivedBytes: 0,
        expectedCounter: packet.counter,
      }
      this.state = state
    } else if (!state) {
      return {
        status: "error",
        error: { type: "unexpected_continuation", counter: packet.counter },
      }
    }

    if (packet.counter !== state.expectedCounter) {
      this.reset()
      return {
        status: "error",
        error: {
          type: "sequence_gap",
          expected: state.expectedCounter,
          actual: packet.counter,
        },
      }
    }

    const size = state.receivedBytes + packet.payload.length
    if (size > this.config.maxMessageSize) {
      this.reset()
      return {
        status: "error",
        error: {
          type: "message_too_large",
          limit: this.config.maxMessageSize,
          size,
        },
      }
    }

    state.chunks.push(packet.payload)
    state.receivedBytes = size
    state.expectedCounter = (packet.counter + 1) % this.space

    if (!packet.isLastPacket) {
      return { status: "pending" }
    }

    this.reset()
    return { status: "complete", data: concatChunks(state.chunks, size) }
  }

  /**
   * Decode raw transport bytes and process the packet.
   * Undecodable bytes clear any in-progress message.
   */
  receiveRaw(data: Uint8Array): ReassembleResult {
    let packet: Packet
    try {
      packet = decodePacket(data, this.config.format)
    } catch (error) {
      if (!(error instanceof MalformedPacketError)) throw error
      this.reset()
      return {
        status: "error",
        error: {
          type: "malformed_packet",
          code: error.code,
          message: error.message,
        },
      }
    }
    return this.receive(packet)
  }

  /**
   * Drop any partially reassembled message.
   */
  reset(): void {
    this.state = undefined
  }

  /**
   * Whether a message has started but not finished.
   */
  get inProgress(): boolean {
    return this.state !== undefined
  }

  /**
   * Payload bytes held for the in-progress message.
   */
  get pendingBytes(): number {
    return this.state?.receivedBytes ?? 0
  }

  /**
   * Counter the next continuation packet must carry, if a message is in progress.
   */
  get expectedCounter(): number | undefined {
    return this.state?.expectedCounter
  }
}

function concatChunks(chunks: Uint8Array[], totalSize: number): Uint8Array {
  const result = new Uint8Array(totalSize)
  let offset = 0
  for (const chunk of chunks) {
    result.set(chunk, offset)
    offset += chunk.length
  }
  return result
}
