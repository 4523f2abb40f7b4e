import { describe, expect, it, vi } from "vitest"
import {
  createInProcessLink,
  InProcessEndpoint,
} from "./in-process-transport.js"

describe("createInProcessLink", () => {
  it("should deliver submitted packets to the peer", async () => {
    const [a, b] = createInProcessLink({ maxPacketSize: 20 })
    const handler = vi.fn()
    b.onPacket(handler)

    await a.submitPacket(new Uint8Array([1, 2, 3]))

    expect(handler).toHaveBeenCalledTimes(1)
    expect(handler).toHaveBeenCalledWith(new Uint8Array([1, 2, 3]))
    expect(a.submitted).toEqual([new Uint8Array([1, 2, 3])])
  })

  it("should not echo packets back to the sender", async () => {
    const [a] = createInProcessLink({ maxPacketSize: 20 })
    const handler = vi.fn()
    a.onPacket(handler)

    await a.submitPacket(new Uint8Array([1]))

    expect(handler).not.toHaveBeenCalled()
  })

  it("should reject packets over the max size", async () => {
    const [a] = createInProcessLink({ maxPacketSize: 4 })

    await expect(a.submitPacket(new Uint8Array(5))).rejects.toThrow(
      "Packet of 5 bytes exceeds max packet size 4",
    )
    expect(a.submitted).toHaveLength(0)
  })

  it("should fail the next submission on request", async () => {
    const [a, b] = createInProcessLink({ maxPacketSize: 20 })
    const handler = vi.fn()
    b.onPacket(handler)

    a.failNextSubmit(new Error("boom"))
    await expect(a.submitPacket(new Uint8Array([1]))).rejects.toThrow("boom")
    await a.submitPacket(new Uint8Array([2]))

    expect(handler).toHaveBeenCalledTimes(1)
    expect(handler).toHaveBeenCalledWith(new Uint8Array([2]))
  })

  it("should hold submissions until released", async () => {
    const [a, b] = createInProcessLink({ maxPacketSize: 20 })
    const handler = vi.fn()
    b.onPacket(handler)
    a.holdSubmissions()

    const settled = vi.fn()
    const submission = a.submitPacket(new Uint8Array([7])).then(settled)
    await Promise.resolve()

    expect(a.heldCount).toBe(1)
    expect(handler).not.toHaveBeenCalled()
    expect(settled).not.toHaveBeenCalled()

    expect(a.releaseSubmission()).toBe(true)
    await submission

    expect(handler).toHaveBeenCalledWith(new Uint8Array([7]))
    expect(settled).toHaveBeenCalledTimes(1)
    expect(a.releaseSubmission()).toBe(false)
  })

  it("should reject a held submission without delivering it", async () => {
    const [a, b] = createInProcessLink({ maxPacketSize: 20 })
    const handler = vi.fn()
    b.onPacket(handler)
    a.holdSubmissions()

    const submission = a.submitPacket(new Uint8Array([7]))
    await Promise.resolve()
    a.releaseSubmission(new Error("timed out"))

    await expect(submission).rejects.toThrow("timed out")
    expect(handler).not.toHaveBeenCalled()
  })

  it("should drop packets matching the drop predicate", async () => {
    const [a, b] = createInProcessLink({ maxPacketSize: 20 })
    const handler = vi.fn()
    b.onPacket(handler)
    a.drop = data => data[0] === 0xff

    await a.submitPacket(new Uint8Array([0xff]))
    await a.submitPacket(new Uint8Array([0x01]))

    expect(handler).toHaveBeenCalledTimes(1)
    expect(handler).toHaveBeenCalledWith(new Uint8Array([0x01]))
  })

  it("should stop delivering after unsubscribe", async () => {
    const [a, b] = createInProcessLink({ maxPacketSize: 20 })
    const handler = vi.fn()
    const unsubscribe = b.onPacket(handler)
    unsubscribe()

    await a.submitPacket(new Uint8Array([1]))

    expect(handler).not.toHaveBeenCalled()
  })

  it("should wire a peer given to the constructor in both directions", async () => {
    const a = new InProcessEndpoint(20)
    const b = new InProcessEndpoint(20, a)
    const atA = vi.fn()
    const atB = vi.fn()
    a.onPacket(atA)
    b.onPacket(atB)

    await a.submitPacket(new Uint8Array([1]))
    await b.submitPacket(new Uint8Array([2]))

    expect(atB).toHaveBeenCalledWith(new Uint8Array([1]))
    expect(atA).toHaveBeenCalledWith(new Uint8Array([2]))
    expect("_setPeer" in a).toBe(false)
  })

  it("should accept submissions without a peer", async () => {
    const lone = new InProcessEndpoint(20)

    await lone.submitPacket(new Uint8Array([1]))

    expect(lone.submitted).toEqual([new Uint8Array([1])])
  })
})
