/**
 * Fragmentation of outbound payloads into packets.
 *
 * Pure functions only. Counters are not assigned here: the write request
 * stamps each packet from the connection's sequence number generator right
 * before submitting it. Stateful reassembly lives in `reassembler.ts`.
 */

import {
  DEFAULT_PACKET_FORMAT,
  type PacketFormat,
  type PacketKind,
} from "./constants.js"
import { InvalidArgumentError, PacketReassembleError } from "./errors.js"
import { createPacket, type Packet, validatePacketFormat } from "./packet.js"
import { PacketReassembler } from "./reassembler.js"

/**
 * A packet before a counter has been assigned.
 */
export type PacketSpec = Omit<Packet, "counter">

/**
 * Payload bytes available per packet.
 *
 * @throws InvalidArgumentError if the header leaves no room for payload
 */
export function calculateChunkSize(
  maxPacketSize: number,
  format: PacketFormat = DEFAULT_PACKET_FORMAT,
): number {
  validatePacketFormat(format)

  if (!Number.isInteger(maxPacketSize)) {
    throw new InvalidArgumentError(
      "invalid_max_packet_size",
      `Max packet size must be an integer, got ${maxPacketSize}`,
    )
  }

  const chunkSize = maxPacketSize - format.headerSize
  if (chunkSize <= 0) {
    throw new InvalidArgumentError(
      "chunk_size_too_small",
      `Max packet size ${maxPacketSize} leaves no room for payload after a ${format.headerSize}-byte header`,
    )
  }
  return chunkSize
}

/**
 * Number of packets `packetize()` would produce for a payload length.
 * An empty payload still takes one packet.
 */
export function countPackets(
  payloadLength: number,
  maxPacketSize: number,
  format: PacketFormat = DEFAULT_PACKET_FORMAT,
): number {
  const chunkSize = calculateChunkSize(maxPacketSize, format)
  return Math.max(1, Math.ceil(payloadLength / chunkSize))
}

/**
 * Split a payload into ordered packet specs bounded by `maxPacketSize`.
 *
 * The first spec has `isFirstPacket`, the last has `isLastPacket`; a payload
 * that fits in one packet has both.
 */
export function packetize(
  kind: PacketKind,
  payload: Uint8Array,
  maxPacketSize: number,
  format: PacketFormat = DEFAULT_PACKET_FORMAT,
): PacketSpec[] {
  const chunkSize = calculateChunkSize(maxPacketSize, format)
  const count = Math.max(1, Math.ceil(payload.length / chunkSize))
  const result: PacketSpec[] = []

  for (let i = 0; i < count; i++) {
    const start = i * chunkSize
    const end = Math.min(start + chunkSize, payload.length)
    result.push(
      Object.freeze({
        kind,
        isFirstPacket: i === 0,
        isLastPacket: i === count - 1,
        payload: payload.slice(start, end),
      }),
    )
  }

  return result
}

/**
 * Attach a counter to a packet spec.
 */
export function stampPacket(spec: PacketSpec, counter: number): Packet {
  return createPacket({ ...spec, counter })
}

/**
 * Reassemble a complete, ordered packet list into the original payload.
 *
 * Use PacketReassembler for packets arriving one at a time.
 *
 * @throws PacketReassembleError if the list is not exactly one well-framed message
 */
export function reassemblePackets(
  packets: readonly Packet[],
  format: PacketFormat = DEFAULT_PACKET_FORMAT,
): Uint8Array {
  const reassembler = new PacketReassembler({ format })

  for (let i = 0; i < packets.length; i++) {
    const result = reassembler.receive(packets[i])
    switch (result.status) {
      case "pending":
        break
      case "error":
        throw new PacketReassembleError(
          "framing",
          `Packet ${i} broke framing: ${result.error.type}`,
          result.error,
        )
      case "complete":
        if (i !== packets.length - 1) {
          throw new PacketReassembleError(
            "trailing_packets",
            `${packets.length - i - 1} packets follow the last packet`,
          )
        }
        return result.data
    }
  }

  throw new PacketReassembleError(
    "incomplete",
    `No last packet among ${packets.length} packets`,
  )
}
