/**
 * What the protocol needs from the link underneath it.
 *
 * Implementations wrap a GATT characteristic, a socket, or an in-process
 * pipe. The protocol keeps at most one `submitPacket()` outstanding per
 * connection.
 */
export interface PacketTransport {
  /**
   * Largest packet the link accepts, header included. Read when a write
   * request is created; it must not change in the middle of a message.
   */
  maxPacketSize(): number

  /**
   * Hand one encoded packet to the link. Resolves once the link accepted it
   * and rejects on failure (including a link-level timeout).
   */
  submitPacket(data: Uint8Array): Promise<void>

  /**
   * Register a handler for raw inbound packets, delivered one packet per call.
   *
   * @returns a function that removes the handler
   */
  onPacket(handler: (data: Uint8Array) => void): () => void
}
