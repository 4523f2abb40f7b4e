/**
 * One outbound message (or control payload) on its way through the link.
 *
 * A write request fragments its payload when it is created, then drives the
 * packets onto the transport one at a time: the next packet is stamped with
 * a counter and submitted only after the previous submission resolved.
 *
 * State machine:
 *
 *   pending -> in-flight -> completed | failed | cancelled
 *   pending -> cancelled
 *
 * Terminal states are final, and `result` resolves exactly once.
 */

import { getLogger, type Logger } from "@logtape/logtape"
import {
  countPackets,
  DEFAULT_MAX_PACKET_COUNT,
  DEFAULT_PACKET_FORMAT,
  encodePacket,
  InvalidArgumentError,
  MessageTooLargeError,
  type PacketFormat,
  type PacketKind,
  type PacketSequenceNumberGenerator,
  type PacketSpec,
  packetize,
  stampPacket,
} from "@gattlink/packet-format"
import { InvalidStateError, TransportSubmitError } from "./errors.js"

export type WriteRequestState =
  | "pending"
  | "in-flight"
  | "completed"
  | "failed"
  | "cancelled"

/**
 * The single terminal outcome of a write request.
 */
export type WriteResult =
  | { status: "completed"; packetCount: number }
  | {
      status: "failed"
      error: TransportSubmitError | InvalidArgumentError
      sentCount: number
    }
  | { status: "cancelled"; sentCount: number }

/**
 * Submits one encoded packet; rejects on failure.
 */
export type SubmitPacket = (data: Uint8Array) => Promise<void>

export interface WriteRequestOptions {
  kind: PacketKind
  payload: Uint8Array
  /** Largest packet the transport accepts, header included */
  maxPacketSize: number
  format?: PacketFormat
  /** Reject payloads needing more packets than this (default: 4096) */
  maxPacketCount?: number
  /** Aborting the signal cancels the request */
  signal?: AbortSignal
  logger?: Logger
  /** Called synchronously, exactly once, when the request settles */
  onSettled?: (request: WriteRequest, result: WriteResult) => void
}

type SubmitOutcome = { ok: true } | { ok: false; error: unknown }

let lastRequestId = 0

export class WriteRequest {
  readonly id: number
  readonly kind: PacketKind
  readonly packets: readonly PacketSpec[]
  readonly maxPacketSize: number
  readonly format: PacketFormat

  /**
   * Resolves with the terminal outcome. Never rejects.
   */
  readonly result: Promise<WriteResult>

  readonly #logger: Logger
  readonly #resolve: (result: WriteResult) => void
  readonly #onSettled: WriteRequestOptions["onSettled"]
  readonly #signal: AbortSignal | undefined
  #state: WriteRequestState = "pending"
  #sentCount = 0
  #submit: SubmitPacket | undefined
  #generator: PacketSequenceNumberGenerator | undefined

  /**
   * Fragment a payload into a new pending write request.
   *
   * @throws InvalidArgumentError if `maxPacketSize` leaves no room for payload
   * @throws MessageTooLargeError if the payload needs more than `maxPacketCount` packets
   */
  static create(options: WriteRequestOptions): WriteRequest {
    const format = options.format ?? DEFAULT_PACKET_FORMAT
    const limit = options.maxPacketCount ?? DEFAULT_MAX_PACKET_COUNT

    const packetCount = countPackets(
      options.payload.length,
      options.maxPacketSize,
      format,
    )
    if (packetCount > limit) {
      throw new MessageTooLargeError(packetCount, limit)
    }

    return new WriteRequest(
      options,
      format,
      packetize(options.kind, options.payload, options.maxPacketSize, format),
    )
  }

  private constructor(
    options: WriteRequestOptions,
    format: PacketFormat,
    packets: PacketSpec[],
  ) {
    this.id = ++lastRequestId
    this.kind = options.kind
    this.packets = packets
    this.maxPacketSize = options.maxPacketSize
    this.format = format
    this.#onSettled = options.onSettled
    this.#signal = options.signal
    this.#logger = (
      options.logger ?? getLogger(["gattlink", "write-request"])
    ).with({ requestId: this.id, kind: this.kind })

    let resolveResult: (result: WriteResult) => void = () => {}
    this.result = new Promise<WriteResult>(resolve => {
      resolveResult = resolve
    })
    this.#resolve = resolveResult

    if (this.#signal?.aborted) {
      this.cancel()
    } else {
      this.#signal?.addEventListener("abort", this.#onAbort, { once: true })
    }
  }

  get state(): WriteRequestState {
    return this.#state
  }

  /**
   * Packets the transport has accepted so far.
   */
  get sentCount(): number {
    return this.#sentCount
  }

  get isSettled(): boolean {
    return (
      this.#state === "completed" ||
      this.#state === "failed" ||
      this.#state === "cancelled"
    )
  }

  /**
   * Begin transmission: stamp the first packet and submit it.
   *
   * @throws InvalidStateError unless the request is pending
   */
  start(submit: SubmitPacket, generator: PacketSequenceNumberGenerator): void {
    if (this.#state !== "pending") {
      throw new InvalidStateError(
        `Cannot start write request ${this.id} in state ${this.#state}`,
      )
    }

    this.#submit = submit
    this.#generator = generator
    this.#state = "in-flight"
    this.#logger.debug("write request {requestId} started: {count} packets", {
      count: this.packets.length,
    })
    this.#submitNext()
  }

  /**
   * Cancel a pending or in-flight request. A submission already handed to
   * the transport is not retracted; its outcome is ignored.
   *
   * @returns true if this call cancelled the request
   */
  cancel(): boolean {
    if (this.isSettled) return false

    this.#settle("cancelled", {
      status: "cancelled",
      sentCount: this.#sentCount,
    })
    return true
  }

  #onAbort = (): void => {
    this.cancel()
  }

  #submitNext(): void {
    const submit = this.#submit
    const generator = this.#generator
    if (!submit || !generator) return

    const index = this.#sentCount
    const counter = generator.next()

    let data: Uint8Array
    try {
      data = encodePacket(
        stampPacket(this.packets[index], counter),
        this.maxPacketSize,
        this.format,
      )
    } catch (error) {
      if (!(error instanceof InvalidArgumentError)) throw error
      this.#logger.warn("write request {requestId} cannot encode packet {index}", {
        index,
        error,
      })
      this.#settle("failed", {
        status: "failed",
        error,
        sentCount: this.#sentCount,
      })
      return
    }

    this.#logger.trace("submit packet {index} (counter {counter}, {size} bytes)", {
      index,
      counter,
      size: data.length,
    })

    let submission: Promise<void>
    try {
      submission = submit(data)
    } catch (error) {
      submission = Promise.reject(error)
    }

    void submission.then(
      () => this.#onSubmitResult(index, { ok: true }),
      (error: unknown) => this.#onSubmitResult(index, { ok: false, error }),
    )
  }

  #onSubmitResult(index: number, outcome: SubmitOutcome): void {
    if (this.#state !== "in-flight") {
      this.#logger.debug(
        "ignoring submission result for packet {index} after {state}",
        { index, state: this.#state },
      )
      return
    }

    if (!outcome.ok) {
      const error = new TransportSubmitError(index, outcome.error)
      this.#logger.warn("write request {requestId} failed at packet {index}", {
        index,
        error,
      })
      this.#settle("failed", {
        status: "failed",
        error,
        sentCount: this.#sentCount,
      })
      return
    }

    this.#sentCount++
    if (this.#sentCount === this.packets.length) {
      this.#settle("completed", {
        status: "completed",
        packetCount: this.packets.length,
      })
      return
    }

    this.#submitNext()
  }

  #settle(state: WriteRequestState, result: WriteResult): void {
    this.#state = state
    this.#submit = undefined
    this.#generator = undefined
    this.#signal?.removeEventListener("abort", this.#onAbort)

    this.#logger.debug("write request {requestId} {state} after {sent} packets", {
      state,
      sent: this.#sentCount,
    })

    this.#resolve(result)
    this.#onSettled?.(this, result)
  }
}
