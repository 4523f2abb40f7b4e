/**
 * Packet format constants.
 *
 * Every packet starts with a single big-endian header unit. From the most
 * significant bit: kind (1 = control), is-first, is-last, the counter, and
 * reserved bits that must be zero.
 */

/** Discriminates the two packet streams sharing a link. */
export type PacketKind = "data" | "control"

/** Header unit width and counter width for a link. */
export interface PacketFormat {
  /** Header size in bytes */
  readonly headerSize: 1 | 2
  /** Width of the cyclic counter in bits */
  readonly counterBits: number
}

/** Bits used by kind, is-first and is-last */
export const FLAG_BITS = 3

/** Single header byte with a 3-bit counter */
export const DEFAULT_PACKET_FORMAT: PacketFormat = Object.freeze({
  headerSize: 1,
  counterBits: 3,
})

/** Upper bound on packets per outbound message (default) */
export const DEFAULT_MAX_PACKET_COUNT = 4096

/** Upper bound on a reassembled message in bytes (default: 1MB) */
export const DEFAULT_MAX_MESSAGE_SIZE = 1024 * 1024

/** Control command discriminators (first byte of a control payload) */
export const ControlCommand = {
  ConnectionRequest: 0x00,
  ConnectionConfirm: 0x01,
  Error: 0x02,
  Disconnect: 0x03,
} as const

export type ControlCommand = (typeof ControlCommand)[keyof typeof ControlCommand]
