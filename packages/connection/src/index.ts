/**
 * @gattlink/connection
 *
 * Drives messages over a `PacketTransport` one packet at a time and turns
 * inbound packets back into messages.
 */

export {
  Connection,
  type ConnectionConfig,
  type ConnectionEvents,
  type ConnectionOptions,
  type SendOptions,
} from "./connection.js"
export { InvalidStateError, TransportSubmitError } from "./errors.js"
export {
  createInProcessLink,
  InProcessEndpoint,
  type InProcessLinkOptions,
} from "./in-process-transport.js"
export type { PacketTransport } from "./transport.js"
export {
  type SubmitPacket,
  WriteRequest,
  type WriteRequestOptions,
  type WriteRequestState,
  type WriteResult,
} from "./write-request.js"
