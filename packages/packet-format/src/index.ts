/**
 * @gattlink/packet-format
 *
 * Segmentation and reassembly framing for links that only take small,
 * size-bounded writes (e.g. a GATT characteristic write):
 *
 * - One header unit per packet: kind, first/last markers, cyclic counter
 * - Pure fragmentation of messages into packets
 * - Stateful reassembly that detects loss, duplication and bad ordering
 * - A small control-message codec for connection setup and teardown
 *
 * @example
 * ```typescript
 * import {
 *   encodePacket,
 *   PacketReassembler,
 *   PacketSequenceNumberGenerator,
 *   packetize,
 *   stampPacket,
 * } from "@gattlink/packet-format"
 *
 * const generator = new PacketSequenceNumberGenerator()
 * for (const spec of packetize("data", message, 20)) {
 *   write(encodePacket(stampPacket(spec, generator.next()), 20))
 * }
 *
 * // Reassemble on receive
 * const reassembler = new PacketReassembler()
 * const result = reassembler.receiveRaw(bytes)
 * if (result.status === "complete") {
 *   process(result.data)
 * }
 * ```
 */

// Constants
export {
  ControlCommand,
  DEFAULT_MAX_MESSAGE_SIZE,
  DEFAULT_MAX_PACKET_COUNT,
  DEFAULT_PACKET_FORMAT,
  FLAG_BITS,
  type PacketFormat,
  type PacketKind,
} from "./constants.js"
// Control messages
export {
  type ConnectionCapabilities,
  type ControlMessage,
  decodeControlMessage,
  encodeControlMessage,
  negotiateConnection,
} from "./control.js"
// Errors
export {
  ControlDecodeError,
  describeFramingError,
  type FramingError,
  type InvalidArgumentCode,
  InvalidArgumentError,
  type MalformedPacketCode,
  MalformedPacketError,
  MessageTooLargeError,
  PacketReassembleError,
} from "./errors.js"
// Packets
export {
  counterSpaceSize,
  createPacket,
  decodePacket,
  encodePacket,
  type Packet,
  validatePacketFormat,
  withCounter,
} from "./packet.js"
// Fragmentation
export {
  calculateChunkSize,
  countPackets,
  type PacketSpec,
  packetize,
  reassemblePackets,
  stampPacket,
} from "./packetizer.js"
// Reassembler
export {
  PacketReassembler,
  type ReassembleResult,
  type ReassemblerConfig,
} from "./reassembler.js"
// Sequence numbers
export { PacketSequenceNumberGenerator } from "./sequence-number-generator.js"
