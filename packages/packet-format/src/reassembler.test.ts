import { describe, expect, it } from "vitest"
import { createPacket, encodePacket, type Packet } from "./packet.js"
import { PacketReassembler } from "./reassembler.js"

function packet(
  counter: number,
  isFirstPacket: boolean,
  isLastPacket: boolean,
  bytes: number[],
): Packet {
  return createPacket({
    kind: "data",
    isFirstPacket,
    isLastPacket,
    counter,
    payload: new Uint8Array(bytes),
  })
}

describe("PacketReassembler", () => {
  describe("complete messages", () => {
    it("should emit a single-packet message immediately", () => {
      const reassembler = new PacketReassembler()
      const result = reassembler.receive(packet(4, true, true, [1, 2, 3]))

      expect(result).toEqual({
        status: "complete",
        data: new Uint8Array([1, 2, 3]),
      })
      expect(reassembler.inProgress).toBe(false)
    })

    it("should emit an empty message", () => {
      const reassembler = new PacketReassembler()
      const result = reassembler.receive(packet(0, true, true, []))

      expect(result).toEqual({ status: "complete", data: new Uint8Array(0) })
    })

    it("should concatenate continuation payloads in order", () => {
      const reassembler = new PacketReassembler()

      expect(reassembler.receive(packet(6, true, false, [1, 2]))).toEqual({
        status: "pending",
      })
      expect(reassembler.inProgress).toBe(true)
      expect(reassembler.pendingBytes).toBe(2)
      expect(reassembler.expectedCounter).toBe(7)

      expect(reassembler.receive(packet(7, false, false, [3]))).toEqual({
        status: "pending",
      })
      // wraps to 0 with a 3-bit counter
      expect(reassembler.expectedCounter).toBe(0)

      expect(reassembler.receive(packet(0, false, true, [4, 5]))).toEqual({
        status: "complete",
        data: new Uint8Array([1, 2, 3, 4, 5]),
      })
      expect(reassembler.inProgress).toBe(false)
      expect(reassembler.pendingBytes).toBe(0)
      expect(reassembler.expectedCounter).toBeUndefined()
    })
  })

  describe("framing errors", () => {
    it("should report a continuation with no message in progress", () => {
      const reassembler = new PacketReassembler()
      const result = reassembler.receive(packet(3, false, true, [1]))

      expect(result).toEqual({
        status: "error",
        error: { type: "unexpected_continuation", counter: 3 },
      })
    })

    it("should report a first packet while a message is in progress", () => {
      const reassembler = new PacketReassembler()
      reassembler.receive(packet(0, true, false, [1]))

      const result = reassembler.receive(packet(1, true, false, [2]))
      expect(result).toEqual({
        status: "error",
        error: { type: "unexpected_first_packet" },
      })
      // the new first packet starts the next message
      expect(reassembler.inProgress).toBe(true)
      expect(reassembler.pendingBytes).toBe(1)
      expect(reassembler.expectedCounter).toBe(2)
    })

    it("should reassemble the message that interrupted an abandoned one", () => {
      const reassembler = new PacketReassembler()
      reassembler.receive(packet(0, true, false, [1]))

      expect(reassembler.receive(packet(2, true, false, [5]))).toEqual({
        status: "error",
        error: { type: "unexpected_first_packet" },
      })
      expect(reassembler.receive(packet(3, false, false, [6]))).toEqual({
        status: "pending",
      })
      expect(reassembler.receive(packet(4, false, true, [7]))).toEqual({
        status: "complete",
        data: new Uint8Array([5, 6, 7]),
      })
      expect(reassembler.inProgress).toBe(false)
    })

    it("should return a single-packet message alongside the framing error", () => {
      const reassembler = new PacketReassembler()
      reassembler.receive(packet(0, true, false, [1]))

      expect(reassembler.receive(packet(3, true, true, [4]))).toEqual({
        status: "error",
        error: { type: "unexpected_first_packet" },
        data: new Uint8Array([4]),
      })
      expect(reassembler.inProgress).toBe(false)
    })

    it("should detect a gap and recover on the next message", () => {
      const reassembler = new PacketReassembler()
      reassembler.receive(packet(0, true, false, [1]))

      expect(reassembler.receive(packet(2, false, false, [3]))).toEqual({
        status: "error",
        error: { type: "sequence_gap", expected: 1, actual: 2 },
      })
      expect(reassembler.inProgress).toBe(false)

      expect(reassembler.receive(packet(3, true, false, [7]))).toEqual({
        status: "pending",
      })
      expect(reassembler.receive(packet(4, false, true, [8]))).toEqual({
        status: "complete",
        data: new Uint8Array([7, 8]),
      })
    })

    it("should detect a duplicated continuation", () => {
      const reassembler = new PacketReassembler()
      const continuation = packet(1, false, false, [2])
      reassembler.receive(packet(0, true, false, [1]))

      expect(reassembler.receive(continuation)).toEqual({ status: "pending" })
      expect(reassembler.receive(continuation)).toEqual({
        status: "error",
        error: { type: "sequence_gap", expected: 2, actual: 1 },
      })
    })

    it("should abandon a message over the size limit", () => {
      const reassembler = new PacketReassembler({ maxMessageSize: 4 })
      reassembler.receive(packet(0, true, false, [1, 2, 3]))

      expect(reassembler.receive(packet(1, false, true, [4, 5]))).toEqual({
        status: "error",
        error: { type: "message_too_large", limit: 4, size: 5 },
      })
      expect(reassembler.inProgress).toBe(false)
    })
  })

  describe("receiveRaw", () => {
    it("should decode and reassemble wire bytes", () => {
      const reassembler = new PacketReassembler()
      const first = encodePacket(packet(0, true, false, [1, 2]), 20)
      const last = encodePacket(packet(1, false, true, [3]), 20)

      expect(reassembler.receiveRaw(first)).toEqual({ status: "pending" })
      expect(reassembler.receiveRaw(last)).toEqual({
        status: "complete",
        data: new Uint8Array([1, 2, 3]),
      })
    })

    it("should turn malformed bytes into a framing error and reset", () => {
      const reassembler = new PacketReassembler()
      reassembler.receive(packet(0, true, false, [1]))

      const result = reassembler.receiveRaw(new Uint8Array([0x43]))
      expect(result).toEqual({
        status: "error",
        error: {
          type: "malformed_packet",
          code: "reserved_bits",
          message: "Reserved header bits set: 0x43",
        },
      })
      expect(reassembler.inProgress).toBe(false)
    })

    it("should honour a 2-byte header format", () => {
      const format = { headerSize: 2, counterBits: 4 } as const
      const reassembler = new PacketReassembler({ format })
      const bytes = encodePacket(packet(15, true, true, [9]), 20, format)

      expect(reassembler.receiveRaw(bytes)).toEqual({
        status: "complete",
        data: new Uint8Array([9]),
      })
    })
  })

  describe("reset", () => {
    it("should drop a partial message", () => {
      const reassembler = new PacketReassembler()
      reassembler.receive(packet(0, true, false, [1]))
      reassembler.reset()

      expect(reassembler.inProgress).toBe(false)
      expect(reassembler.receive(packet(1, false, true, [2])).status).toBe(
        "error",
      )
    })
  })
})
