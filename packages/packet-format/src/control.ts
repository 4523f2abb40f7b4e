/**
 * Control stream messages: connection setup, teardown and error signalling.
 *
 * The first payload byte selects the command; fixed-size big-endian fields
 * follow.
 */

import { ControlCommand } from "./constants.js"
import { ControlDecodeError } from "./errors.js"

export type ControlMessage =
  | {
      type: "connection-request"
      minVersion: number
      maxVersion: number
      maxPacketSize: number
    }
  | { type: "connection-confirm"; version: number; packetSize: number }
  | { type: "error" }
  | { type: "disconnect" }

/**
 * What a peer is able to speak, for answering a connection request.
 */
export interface ConnectionCapabilities {
  minVersion: number
  maxVersion: number
  maxPacketSize: number
}

/** Body length after the command byte */
const BODY_SIZE: Record<ControlMessage["type"], number> = {
  "connection-request": 6,
  "connection-confirm": 4,
  error: 0,
  disconnect: 0,
}

function writeUint16(view: DataView, offset: number, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new RangeError(`Control field ${value} does not fit in 16 bits`)
  }
  view.setUint16(offset, value, false) // big-endian
}

/**
 * Encode a control message into a control payload.
 */
export function encodeControlMessage(message: ControlMessage): Uint8Array {
  const result = new Uint8Array(1 + BODY_SIZE[message.type])
  const view = new DataView(result.buffer)

  switch (message.type) {
    case "connection-request":
      result[0] = ControlCommand.ConnectionRequest
      writeUint16(view, 1, message.minVersion)
      writeUint16(view, 3, message.maxVersion)
      writeUint16(view, 5, message.maxPacketSize)
      break
    case "connection-confirm":
      result[0] = ControlCommand.ConnectionConfirm
      writeUint16(view, 1, message.version)
      writeUint16(view, 3, message.packetSize)
      break
    case "error":
      result[0] = ControlCommand.Error
      break
    case "disconnect":
      result[0] = ControlCommand.Disconnect
      break
  }

  return result
}

function commandType(command: number): ControlMessage["type"] {
  switch (command) {
    case ControlCommand.ConnectionRequest:
      return "connection-request"
    case ControlCommand.ConnectionConfirm:
      return "connection-confirm"
    case ControlCommand.Error:
      return "error"
    case ControlCommand.Disconnect:
      return "disconnect"
    default:
      throw new ControlDecodeError(
        "unknown_command",
        `Unknown control command: 0x${command.toString(16).padStart(2, "0")}`,
      )
  }
}

/**
 * Decode a reassembled control payload.
 *
 * @throws ControlDecodeError if the payload is empty, unknown or mis-sized
 */
export function decodeControlMessage(data: Uint8Array): ControlMessage {
  if (data.length < 1) {
    throw new ControlDecodeError("empty", "Empty control payload")
  }

  const type = commandType(data[0])
  const expected = 1 + BODY_SIZE[type]
  if (data.length < expected) {
    throw new ControlDecodeError(
      "truncated",
      `${type} too short: expected ${expected} bytes, got ${data.length}`,
    )
  }
  if (data.length > expected) {
    throw new ControlDecodeError(
      "trailing_bytes",
      `${type} has ${data.length - expected} unexpected trailing bytes`,
    )
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
  switch (type) {
    case "connection-request":
      return {
        type,
        minVersion: view.getUint16(1, false),
        maxVersion: view.getUint16(3, false),
        maxPacketSize: view.getUint16(5, false),
      }
    case "connection-confirm":
      return {
        type,
        version: view.getUint16(1, false),
        packetSize: view.getUint16(3, false),
      }
    case "error":
    case "disconnect":
      return { type }
  }
}

/**
 * Answer a connection request: the highest version both sides speak and the
 * smaller of the two packet sizes.
 *
 * @returns the confirm message, or undefined when the version ranges do not overlap
 */
export function negotiateConnection(
  request: ConnectionCapabilities,
  supported: ConnectionCapabilities,
):
  | Extract<ControlMessage, { type: "connection-confirm" }>
  | undefined {
  const version = Math.min(request.maxVersion, supported.maxVersion)
  if (version < Math.max(request.minVersion, supported.minVersion)) {
    return undefined
  }

  return {
    type: "connection-confirm",
    version,
    packetSize: Math.min(request.maxPacketSize, supported.maxPacketSize),
  }
}
