import { DEFAULT_PACKET_FORMAT, type PacketFormat } from "./constants.js"
import { counterSpaceSize, validatePacketFormat } from "./packet.js"

/**
 * Cyclic per-connection packet counter.
 *
 * `next()` must be called in transmission order. The generator does no
 * locking: one write request at a time owns it.
 */
export class PacketSequenceNumberGenerator {
  readonly #size: number
  #nextValue = 0

  constructor(format: PacketFormat = DEFAULT_PACKET_FORMAT) {
    validatePacketFormat(format)
    this.#size = counterSpaceSize(format)
  }

  /**
   * Return the current value and advance with wraparound.
   */
  next(): number {
    const value = this.#nextValue
    this.#nextValue = (value + 1) % this.#size
    return value
  }

  /**
   * The value the next call to `next()` will return.
   */
  peek(): number {
    return this.#nextValue
  }

  /**
   * Start over at 0, for a new logical connection.
   */
  reset(): void {
    this.#nextValue = 0
  }

  /**
   * Number of distinct counter values.
   */
  get size(): number {
    return this.#size
  }
}
