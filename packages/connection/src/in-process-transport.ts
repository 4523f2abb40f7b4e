/**
 * A pair of in-process packet transports wired back to back.
 *
 * Packets submitted on one endpoint are delivered to the other on a
 * microtask. Test controls let a caller fail, drop or hold submissions to
 * drive the one-write-in-flight timeline by hand.
 *
 * @example
 * ```typescript
 * const [central, peripheral] = createInProcessLink({ maxPacketSize: 20 })
 * const sender = new Connection({ transport: central })
 * const receiver = new Connection({ transport: peripheral })
 * receiver.start()
 *
 * await sender.sendMessage(payload).result
 * ```
 */

import type { PacketTransport } from "./transport.js"

export interface InProcessLinkOptions {
  /** Largest packet either endpoint accepts, header included */
  maxPacketSize: number
}

interface HeldSubmission {
  data: Uint8Array
  resolve: () => void
  reject: (error: Error) => void
}

export class InProcessEndpoint implements PacketTransport {
  readonly #handlers = new Set<(data: Uint8Array) => void>()
  readonly #failures: Error[] = []
  readonly #held: HeldSubmission[] = []
  #peer: InProcessEndpoint | undefined
  #maxPacketSize: number
  #holding = false

  /**
   * Copies of every packet submitted on this endpoint, in order.
   */
  readonly submitted: Uint8Array[] = []

  /**
   * Return true to accept a submission without delivering it to the peer.
   */
  drop?: (data: Uint8Array) => boolean

  /**
   * @param peer - endpoint that receives this endpoint's packets; when
   *   given, this endpoint also becomes the peer's peer
   */
  constructor(maxPacketSize: number, peer?: InProcessEndpoint) {
    this.#maxPacketSize = maxPacketSize
    if (peer) {
      this.#peer = peer
      peer.#peer = this
    }
  }

  maxPacketSize(): number {
    return this.#maxPacketSize
  }

  /**
   * Change the packet size seen by write requests created from now on.
   */
  setMaxPacketSize(size: number): void {
    this.#maxPacketSize = size
  }

  async submitPacket(data: Uint8Array): Promise<void> {
    if (data.length > this.#maxPacketSize) {
      throw new Error(
        `Packet of ${data.length} bytes exceeds max packet size ${this.#maxPacketSize}`,
      )
    }

    this.submitted.push(data.slice())

    const failure = this.#failures.shift()
    if (failure) throw failure

    if (this.#holding) {
      await new Promise<void>((resolve, reject) => {
        this.#held.push({ data, resolve, reject })
      })
      return
    }

    await Promise.resolve()
    this.#deliver(data)
  }

  onPacket(handler: (data: Uint8Array) => void): () => void {
    this.#handlers.add(handler)
    return () => {
      this.#handlers.delete(handler)
    }
  }

  /**
   * Make the next submission reject with `error`.
   */
  failNextSubmit(error: Error = new Error("Simulated write failure")): void {
    this.#failures.push(error)
  }

  /**
   * Park submissions until `releaseSubmission()` is called.
   */
  holdSubmissions(): void {
    this.#holding = true
  }

  /**
   * Complete the oldest held submission: deliver and resolve it, or reject it
   * with `error` without delivering.
   *
   * @returns false if nothing was held
   */
  releaseSubmission(error?: Error): boolean {
    const next = this.#held.shift()
    if (!next) return false

    if (error) {
      next.reject(error)
    } else {
      this.#deliver(next.data)
      next.resolve()
    }
    return true
  }

  /**
   * Stop holding and release everything parked so far.
   */
  resumeSubmissions(): void {
    this.#holding = false
    while (this.releaseSubmission()) {
      // drain
    }
  }

  /**
   * Number of submissions waiting for `releaseSubmission()`.
   */
  get heldCount(): number {
    return this.#held.length
  }

  #deliver(data: Uint8Array): void {
    if (this.drop?.(data)) return
    const peer = this.#peer
    if (peer) peer.#receive(data.slice())
  }

  #receive(data: Uint8Array): void {
    for (const handler of this.#handlers) {
      handler(data)
    }
  }
}

/**
 * Create two endpoints connected to each other.
 */
export function createInProcessLink(
  options: InProcessLinkOptions,
): [InProcessEndpoint, InProcessEndpoint] {
  const a = new InProcessEndpoint(options.maxPacketSize)
  const b = new InProcessEndpoint(options.maxPacketSize, a)
  return [a, b]
}
