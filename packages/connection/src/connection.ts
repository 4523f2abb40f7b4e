/**
 * One logical connection over a packet transport.
 *
 * Owns the sequence number generator, one reassembler per packet kind, and
 * the outbound write queue. At most one write request is in flight at a time;
 * later sends wait in FIFO order, so fragments of two messages never
 * interleave on the wire and counters are drawn in transmission order.
 */

import { getLogger, type Logger } from "@logtape/logtape"
import {
  type ControlMessage,
  DEFAULT_MAX_MESSAGE_SIZE,
  DEFAULT_MAX_PACKET_COUNT,
  DEFAULT_PACKET_FORMAT,
  decodePacket,
  describeFramingError,
  encodeControlMessage,
  type FramingError,
  MalformedPacketError,
  type Packet,
  type PacketFormat,
  type PacketKind,
  PacketReassembler,
  PacketSequenceNumberGenerator,
  type ReassembleResult,
} from "@gattlink/packet-format"
import Emittery, {
  type OmnipresentEventData,
  type UnsubscribeFunction,
} from "emittery"
import { InvalidStateError } from "./errors.js"
import type { PacketTransport } from "./transport.js"
import { WriteRequest, type WriteResult } from "./write-request.js"

export interface ConnectionEvents {
  /** A data message was fully reassembled */
  "message-received": { data: Uint8Array }
  /** A control payload was fully reassembled */
  "control-received": { payload: Uint8Array }
  /**
   * Inbound framing failed. The affected message is dropped; the connection
   * stays usable. `kind` is undefined when the packet could not be decoded.
   */
  "framing-error": { kind: PacketKind | undefined; error: FramingError }
  /** A write request reached its terminal state */
  "write-settled": { request: WriteRequest; result: WriteResult }
}

/**
 * Configuration for a connection.
 */
export interface ConnectionConfig {
  /** Header layout used in both directions (default: 1-byte header, 3-bit counter) */
  format: PacketFormat
  /** Largest outbound message, in packets (default: 4096) */
  maxPacketCount: number
  /** Largest inbound message, in bytes (default: 1MB) */
  maxMessageSize: number
}

export interface ConnectionOptions extends Partial<ConnectionConfig> {
  transport: PacketTransport
  logger?: Logger
}

export interface SendOptions {
  /** Aborting the signal cancels the write request */
  signal?: AbortSignal
}

const DEFAULT_CONFIG: ConnectionConfig = {
  format: DEFAULT_PACKET_FORMAT,
  maxPacketCount: DEFAULT_MAX_PACKET_COUNT,
  maxMessageSize: DEFAULT_MAX_MESSAGE_SIZE,
}

/**
 * Message-level send and receive on top of a `PacketTransport`.
 *
 * @example
 * ```typescript
 * const connection = new Connection({ transport })
 * connection.on("message-received", ({ data }) => handle(data))
 * connection.start()
 *
 * const request = connection.sendMessage(payload)
 * const result = await request.result
 * if (result.status === "failed") {
 *   console.error(result.error.message)
 * }
 * ```
 */
export class Connection {
  readonly #emitter = new Emittery<ConnectionEvents>()
  readonly #transport: PacketTransport
  readonly #config: ConnectionConfig
  readonly #logger: Logger
  readonly #generator: PacketSequenceNumberGenerator
  readonly #reassemblers: Record<PacketKind, PacketReassembler>
  #queue: WriteRequest[] = []
  #active: WriteRequest | undefined
  #unsubscribe: (() => void) | undefined
  #closed = false

  constructor(options: ConnectionOptions) {
    const { transport, logger, ...config } = options
    this.#transport = transport
    this.#config = { ...DEFAULT_CONFIG, ...config }
    this.#logger = logger ?? getLogger(["gattlink", "connection"])
    this.#generator = new PacketSequenceNumberGenerator(this.#config.format)

    const reassemblerConfig = {
      format: this.#config.format,
      maxMessageSize: this.#config.maxMessageSize,
    }
    this.#reassemblers = {
      data: new PacketReassembler(reassemblerConfig),
      control: new PacketReassembler(reassemblerConfig),
    }
  }

  public on<Name extends keyof ConnectionEvents>(
    eventName: Name,
    listener: (
      eventData: (ConnectionEvents & OmnipresentEventData)[Name],
    ) => void | Promise<void>,
  ): UnsubscribeFunction {
    return this.#emitter.on(eventName, listener)
  }

  public off<Name extends keyof ConnectionEvents>(
    eventName: Name,
    listener: (
      eventData: (ConnectionEvents & OmnipresentEventData)[Name],
    ) => void | Promise<void>,
  ): void {
    this.#emitter.off(eventName, listener)
  }

  public once<Name extends keyof ConnectionEvents>(
    eventName: Name,
  ): Promise<(ConnectionEvents & OmnipresentEventData)[Name]> {
    return this.#emitter.once(eventName)
  }

  /**
   * Begin receiving packets from the transport.
   */
  start(): void {
    if (this.#closed) {
      throw new InvalidStateError("Cannot start a closed connection")
    }
    if (this.#unsubscribe) return

    this.#unsubscribe = this.#transport.onPacket(data => {
      this.receivePacket(data)
    })
    this.#logger.debug("connection started")
  }

  /**
   * Stop receiving and cancel every queued and in-flight write request.
   */
  close(): void {
    if (this.#closed) return
    this.#closed = true

    this.#unsubscribe?.()
    this.#unsubscribe = undefined
    this.#cancelAll()
    this.#resetInbound()
    this.#logger.debug("connection closed")
  }

  /**
   * Start a new logical connection on the same transport: cancel all write
   * requests, restart counters at 0 and drop partial inbound messages.
   */
  reset(): void {
    this.#cancelAll()
    this.#generator.reset()
    this.#resetInbound()
    this.#logger.debug("connection reset")
  }

  /**
   * Queue an application message.
   *
   * @throws InvalidArgumentError if the transport's max packet size cannot frame it
   * @throws MessageTooLargeError if it needs more than `maxPacketCount` packets
   */
  sendMessage(data: Uint8Array, options?: SendOptions): WriteRequest {
    return this.#enqueue("data", data, options)
  }

  /**
   * Queue a raw control payload.
   */
  sendControl(payload: Uint8Array, options?: SendOptions): WriteRequest {
    return this.#enqueue("control", payload, options)
  }

  /**
   * Encode and queue a control message.
   */
  sendControlMessage(
    message: ControlMessage,
    options?: SendOptions,
  ): WriteRequest {
    return this.#enqueue("control", encodeControlMessage(message), options)
  }

  /**
   * Cancel a queued or in-flight request.
   *
   * @returns true if the request was cancelled by this call
   */
  cancel(request: WriteRequest): boolean {
    return request.cancel()
  }

  /**
   * Process one raw packet from the transport.
   */
  receivePacket(data: Uint8Array): ReassembleResult {
    let packet: Packet
    try {
      packet = decodePacket(data, this.#config.format)
    } catch (error) {
      if (!(error instanceof MalformedPacketError)) throw error
      this.#resetInbound()
      return this.#framingError(undefined, {
        type: "malformed_packet",
        code: error.code,
        message: error.message,
      })
    }

    this.#logger.trace("received {kind} packet {counter} ({size} bytes)", {
      kind: packet.kind,
      counter: packet.counter,
      size: data.length,
    })

    const result = this.#reassemblers[packet.kind].receive(packet)
    switch (result.status) {
      case "pending":
        break
      case "error":
        this.#framingError(packet.kind, result.error)
        if (result.data) this.#deliver(packet.kind, result.data)
        break
      case "complete":
        this.#deliver(packet.kind, result.data)
        break
    }
    return result
  }

  /**
   * The write request currently in flight, if any.
   */
  get activeRequest(): WriteRequest | undefined {
    return this.#active
  }

  /**
   * Write requests waiting behind the active one.
   */
  get queuedCount(): number {
    return this.#queue.length
  }

  get isClosed(): boolean {
    return this.#closed
  }

  #enqueue(
    kind: PacketKind,
    payload: Uint8Array,
    options: SendOptions | undefined,
  ): WriteRequest {
    if (this.#closed) {
      throw new InvalidStateError("Cannot send on a closed connection")
    }

    const request = WriteRequest.create({
      kind,
      payload,
      maxPacketSize: this.#transport.maxPacketSize(),
      format: this.#config.format,
      maxPacketCount: this.#config.maxPacketCount,
      signal: options?.signal,
      logger: this.#logger.getChild("write-request"),
      onSettled: (settled, result) => this.#onSettled(settled, result),
    })

    this.#queue.push(request)
    this.#pump()
    return request
  }

  #pump(): void {
    while (!this.#active) {
      const next = this.#queue.shift()
      if (!next) return
      if (next.isSettled) continue

      this.#active = next
      next.start(data => this.#transport.submitPacket(data), this.#generator)
    }
  }

  #onSettled(request: WriteRequest, result: WriteResult): void {
    if (this.#active === request) {
      this.#active = undefined
    } else {
      this.#queue = this.#queue.filter(queued => queued !== request)
    }

    this.#emit("write-settled", { request, result })
    this.#pump()
  }

  #cancelAll(): void {
    const queued = this.#queue
    this.#queue = []
    for (const request of queued) {
      request.cancel()
    }
    this.#active?.cancel()
  }

  #deliver(kind: PacketKind, data: Uint8Array): void {
    if (kind === "data") {
      this.#emit("message-received", { data })
    } else {
      this.#emit("control-received", { payload: data })
    }
  }

  #resetInbound(): void {
    this.#reassemblers.data.reset()
    this.#reassemblers.control.reset()
  }

  #framingError(
    kind: PacketKind | undefined,
    error: FramingError,
  ): ReassembleResult {
    this.#logger.warn("framing error on {kind} stream: {reason}", {
      kind: kind ?? "unknown",
      reason: describeFramingError(error),
    })
    this.#emit("framing-error", { kind, error })
    return { status: "error", error }
  }

  #emit<Name extends keyof ConnectionEvents>(
    eventName: Name,
    eventData: ConnectionEvents[Name],
  ): void {
    this.#emitter.emit(eventName, eventData).catch((error: unknown) => {
      this.#logger.error("listener for {eventName} failed", {
        eventName,
        error,
      })
    })
  }
}
