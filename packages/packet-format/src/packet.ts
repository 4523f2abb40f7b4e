/**
 * Wire representation of a single packet.
 *
 * Pure encode/decode functions. A packet is a frozen value; use
 * `withCounter()` (or `createPacket()`) to derive a new one.
 */

import {
  DEFAULT_PACKET_FORMAT,
  FLAG_BITS,
  type PacketFormat,
  type PacketKind,
} from "./constants.js"
import { InvalidArgumentError, MalformedPacketError } from "./errors.js"

/**
 * One wire fragment: header fields plus a payload slice.
 */
export interface Packet {
  readonly kind: PacketKind
  readonly isFirstPacket: boolean
  readonly isLastPacket: boolean
  readonly counter: number
  readonly payload: Uint8Array
}

/**
 * Bit positions derived from a format, computed once per call.
 */
interface HeaderLayout {
  kindMask: number
  firstMask: number
  lastMask: number
  counterShift: number
  counterMask: number
  reservedMask: number
}

/**
 * Throw unless the format describes a header that can hold all fields.
 */
export function validatePacketFormat(format: PacketFormat): void {
  if (format.headerSize !== 1 && format.headerSize !== 2) {
    throw new InvalidArgumentError(
      "invalid_format",
      `Header size must be 1 or 2 bytes, got ${format.headerSize}`,
    )
  }

  const maxCounterBits = format.headerSize * 8 - FLAG_BITS
  if (
    !Number.isInteger(format.counterBits) ||
    format.counterBits < 1 ||
    format.counterBits > maxCounterBits
  ) {
    throw new InvalidArgumentError(
      "invalid_format",
      `Counter width must be between 1 and ${maxCounterBits} bits, got ${format.counterBits}`,
    )
  }
}

/**
 * Number of distinct counter values for a format.
 */
export function counterSpaceSize(
  format: PacketFormat = DEFAULT_PACKET_FORMAT,
): number {
  return 1 << format.counterBits
}

function headerLayout(format: PacketFormat): HeaderLayout {
  validatePacketFormat(format)

  const width = format.headerSize * 8
  const counterShift = width - FLAG_BITS - format.counterBits
  return {
    kindMask: 1 << (width - 1),
    firstMask: 1 << (width - 2),
    lastMask: 1 << (width - 3),
    counterShift,
    counterMask: ((1 << format.counterBits) - 1) << counterShift,
    reservedMask: (1 << counterShift) - 1,
  }
}

/**
 * Build a frozen packet from its fields.
 */
export function createPacket(fields: Packet): Packet {
  return Object.freeze({
    kind: fields.kind,
    isFirstPacket: fields.isFirstPacket,
    isLastPacket: fields.isLastPacket,
    counter: fields.counter,
    payload: fields.payload,
  })
}

/**
 * Return a copy of the packet carrying a different counter.
 */
export function withCounter(packet: Packet, counter: number): Packet {
  return createPacket({ ...packet, counter })
}

/**
 * Encode a packet into its wire representation.
 *
 * @throws InvalidArgumentError if the payload does not fit in `maxPacketSize`
 *   or the counter is outside the cyclic space
 */
export function encodePacket(
  packet: Packet,
  maxPacketSize: number,
  format: PacketFormat = DEFAULT_PACKET_FORMAT,
): Uint8Array {
  const layout = headerLayout(format)

  if (packet.payload.length + format.headerSize > maxPacketSize) {
    throw new InvalidArgumentError(
      "payload_too_large",
      `Packet of ${packet.payload.length + format.headerSize} bytes exceeds max packet size ${maxPacketSize}`,
    )
  }

  const space = counterSpaceSize(format)
  if (
    !Number.isInteger(packet.counter) ||
    packet.counter < 0 ||
    packet.counter >= space
  ) {
    throw new InvalidArgumentError(
      "counter_out_of_range",
      `Counter ${packet.counter} is outside [0, ${space - 1}]`,
    )
  }

  let header = packet.counter << layout.counterShift
  if (packet.kind === "control") header |= layout.kindMask
  if (packet.isFirstPacket) header |= layout.firstMask
  if (packet.isLastPacket) header |= layout.lastMask

  const result = new Uint8Array(format.headerSize + packet.payload.length)
  const view = new DataView(result.buffer)
  if (format.headerSize === 2) {
    view.setUint16(0, header, false) // big-endian
  } else {
    view.setUint8(0, header)
  }
  result.set(packet.payload, format.headerSize)

  return result
}

/**
 * Decode a packet from raw transport bytes.
 *
 * @throws MalformedPacketError if the header is truncated or a reserved bit is set
 */
export function decodePacket(
  data: Uint8Array,
  format: PacketFormat = DEFAULT_PACKET_FORMAT,
): Packet {
  const layout = headerLayout(format)

  if (data.length < format.headerSize) {
    throw new MalformedPacketError(
      "truncated_header",
      `Packet too short: expected at least ${format.headerSize} bytes, got ${data.length}`,
    )
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  const header =
    format.headerSize === 2 ? view.getUint16(0, false) : view.getUint8(0)

  if ((header & layout.reservedMask) !== 0) {
    throw new MalformedPacketError(
      "reserved_bits",
      `Reserved header bits set: 0x${header.toString(16).padStart(format.headerSize * 2, "0")}`,
    )
  }

  return createPacket({
    kind: (header & layout.kindMask) !== 0 ? "control" : "data",
    isFirstPacket: (header & layout.firstMask) !== 0,
    isLastPacket: (header & layout.lastMask) !== 0,
    counter: (header & layout.counterMask) >>> layout.counterShift,
    payload: data.slice(format.headerSize),
  })
}
