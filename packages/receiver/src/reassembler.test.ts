import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type ChannelCodec, createChannelCodec } from "@rgbd/common/src/codec";
import { encodeDatagram } from "@rgbd/common/src/rgbd";
import { ChannelType, HEADER_SIZE } from "@rgbd/common/src/types";
import { type AcceptResult, Reassembler } from "./reassembler";

const BAD = 0xff;

// Payloads starting with 0xff fail to decode; anything else decodes to a blank image.
const fakeCodec: ChannelCodec = {
  encodeColor: () => new Uint8Array(0),
  encodeDepth: () => new Uint8Array(0),
  decodeColor(bytes, width, height) {
    if (bytes[0] === BAD) throw new Error("corrupt color");
    return { width, height, data: new Uint8Array(width * height * 3).fill(bytes[0] ?? 0) };
  },
  decodeDepth(bytes, width, height) {
    if (bytes[0] === BAD) throw new Error("corrupt depth");
    return { width, height, data: new Uint16Array(width * height).fill(bytes[0] ?? 0) };
  }
};

function datagram(frameId: number, channel: ChannelType, payload: number[] = [1, 2, 3]): Buffer {
  return encodeDatagram({ frameId, channel, timestampUs: BigInt(frameId) * 33_000n, width: 2, height: 2 }, Uint8Array.from(payload));
}

const color = (id: number, payload?: number[]) => datagram(id, ChannelType.Color, payload);
const depth = (id: number, payload?: number[]) => datagram(id, ChannelType.Depth, payload);

function displayedIds(results: AcceptResult[]): number[] {
  return results.flatMap((r) => (r.kind === "displayed" ? [r.pair.frameId] : []));
}

describe("Reassembler", () => {
  let reassembler: Reassembler;

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    reassembler = new Reassembler({ codec: fakeCodec });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("holds a single channel without displaying it", () => {
    expect(reassembler.accept(color(7))).toEqual({ kind: "partial", frameId: 7 });
    expect(reassembler.lastDisplayedFrameId).toBeNull();
    expect(reassembler.inFlightFrameIds).toEqual([7]);
  });

  it("displays once both channels are stored", () => {
    reassembler.accept(depth(7, [9]));
    const result = reassembler.accept(color(7, [4]));

    expect(result.kind).toBe("displayed");
    if (result.kind !== "displayed") return;
    expect(result.pair).toMatchObject({ frameId: 7, timestampUs: 231_000n, width: 2, height: 2 });
    expect(result.pair.color?.data[0]).toBe(4);
    expect(result.pair.depth?.data[0]).toBe(9);
    expect(reassembler.lastDisplayedFrameId).toBe(7);
    expect(reassembler.inFlightFrameIds).toEqual([]);
  });

  it("pairs frames whose datagrams interleave", () => {
    const results = [color(1), color(2), depth(2), depth(1), color(3), depth(3)].map((d) => reassembler.accept(d));
    expect(displayedIds(results)).toEqual([2, 3]);
  });

  it("keeps the last write for a repeated channel and never displays twice", () => {
    reassembler.accept(color(5, [1]));
    reassembler.accept(color(5, [2]));
    expect(reassembler.inFlightFrameIds).toEqual([5]);
    expect(reassembler.stats.duplicates).toBe(1);

    const shown = reassembler.accept(depth(5));
    expect(shown.kind === "displayed" && shown.pair.color?.data[0]).toBe(2);

    expect(reassembler.accept(depth(5))).toEqual({ kind: "stale", frameId: 5 });
    expect(reassembler.accept(color(5))).toEqual({ kind: "stale", frameId: 5 });
    expect(reassembler.stats.displayed).toBe(1);
  });

  it("drops a late completion for an id older than the last display", () => {
    reassembler.accept(depth(9));
    reassembler.accept(color(10));
    reassembler.accept(depth(10));

    expect(reassembler.accept(color(9))).toEqual({ kind: "stale", frameId: 9 });
    expect(reassembler.lastDisplayedFrameId).toBe(10);
    expect(reassembler.stats.displayed).toBe(1);
  });

  it("displays ids in strictly increasing order", () => {
    const order = [3, 1, 4, 2, 6, 5, 8, 7];
    const results = order.flatMap((id) => [reassembler.accept(color(id)), reassembler.accept(depth(id))]);
    const ids = displayedIds(results);

    expect(ids).toEqual([3, 4, 6, 8]);
    for (let i = 1; i < ids.length; i++) expect(ids[i]).toBeGreaterThan(ids[i - 1]);
  });

  it("evicts entries ten or more ids behind the displayed frame", () => {
    for (const id of [5, 10, 11, 14, 19]) reassembler.accept(color(id));
    reassembler.accept(color(20));
    reassembler.accept(depth(20));

    expect(reassembler.inFlightFrameIds.sort((a, b) => a - b)).toEqual([11, 14, 19]);
    expect(reassembler.stats.evicted).toBe(2);
  });

  it("keeps in-flight ids ahead of the display", () => {
    reassembler.accept(color(30));
    reassembler.accept(color(12));
    reassembler.accept(depth(12));
    expect(reassembler.inFlightFrameIds).toEqual([30]);
  });

  it("leaves the buffer untouched when a datagram is truncated", () => {
    reassembler.accept(color(3));
    const full = datagram(3, ChannelType.Depth, new Array<number>(100).fill(1));
    const truncated = full.subarray(0, HEADER_SIZE + 40);

    expect(reassembler.accept(truncated)).toEqual({ kind: "rejected", reason: "length_mismatch" });
    expect(reassembler.inFlightFrameIds).toEqual([3]);
    expect(reassembler.lastDisplayedFrameId).toBeNull();
  });

  it("rejects datagrams shorter than the header", () => {
    expect(reassembler.accept(Buffer.alloc(10))).toEqual({ kind: "rejected", reason: "too_short" });
    expect(reassembler.stats.rejected).toBe(1);
    expect(reassembler.inFlightFrameIds).toEqual([]);
  });

  it("displays a pair with a null channel when decoding fails", () => {
    reassembler.accept(color(4, [BAD]));
    const result = reassembler.accept(depth(4, [7]));

    expect(result.kind).toBe("displayed");
    if (result.kind !== "displayed") return;
    expect(result.pair.color).toBeNull();
    expect(result.pair.depth?.data[0]).toBe(7);
    expect(reassembler.stats.decodeFailures).toBe(1);
  });

  it("continues across frame id wraparound", () => {
    reassembler.accept(color(0xffffffff));
    reassembler.accept(depth(0xffffffff));
    reassembler.accept(color(0xfffffffa));
    reassembler.accept(color(0));
    const result = reassembler.accept(depth(0));

    expect(result.kind === "displayed" && result.pair.frameId).toBe(0);
    expect(reassembler.lastDisplayedFrameId).toBe(0);
    expect(reassembler.accept(color(0xfffffffe))).toEqual({ kind: "stale", frameId: 0xfffffffe });
  });

  it("evicts across the wrap", () => {
    reassembler.accept(color(0xfffffffa));
    reassembler.accept(color(3));
    reassembler.accept(color(4));
    reassembler.accept(depth(4));

    // 0xfffffffa is 10 ids behind 4
    expect(reassembler.inFlightFrameIds).toEqual([3]);
  });

  it("caps the number of in-flight frames", () => {
    const small = new Reassembler({ codec: fakeCodec, maxInFlight: 4 });
    for (const id of [10, 11, 12, 13, 14]) small.accept(color(id));

    expect(small.inFlightFrameIds.sort((a, b) => a - b)).toEqual([11, 12, 13, 14]);
    expect(small.stats.evicted).toBe(1);
  });

  it("drops an id older than every in-flight frame when full", () => {
    const small = new Reassembler({ codec: fakeCodec, maxInFlight: 4 });
    for (const id of [10, 11, 12, 13]) small.accept(color(id));

    expect(small.accept(color(9))).toEqual({ kind: "stale", frameId: 9 });
    expect(small.inFlightFrameIds.sort((a, b) => a - b)).toEqual([10, 11, 12, 13]);
    expect(small.stats.evicted).toBe(0);
  });

  it("never redisplays a pair replayed long after it was shown", () => {
    const results = [color(4900), depth(4900), color(5000), depth(5000), color(5001), color(4900), depth(4900), depth(5001)].map((d) =>
      reassembler.accept(d)
    );

    expect(displayedIds(results)).toEqual([4900, 5000, 5001]);
    expect(results[5]).toEqual({ kind: "stale", frameId: 4900 });
    expect(results[6]).toEqual({ kind: "stale", frameId: 4900 });
    expect(reassembler.stats.resyncs).toBe(0);
  });

  it("keeps the partial frame while far-behind datagrams trickle in", () => {
    reassembler.accept(color(5000));
    reassembler.accept(depth(5000));
    reassembler.accept(color(5001));
    for (const d of [color(0), depth(0), color(1)]) reassembler.accept(d);

    expect(reassembler.inFlightFrameIds).toEqual([5001]);
    expect(reassembler.lastDisplayedFrameId).toBe(5000);
  });

  it("resynchronizes when the sender restarts its ids", () => {
    reassembler.accept(color(5000));
    reassembler.accept(depth(5000));

    expect(reassembler.accept(color(4950)).kind).toBe("stale");
    for (const d of [color(0), depth(0), color(1), depth(1), color(2)]) {
      expect(reassembler.accept(d).kind).toBe("stale");
    }
    expect(reassembler.accept(depth(2))).toEqual({ kind: "partial", frameId: 2 });
    expect(reassembler.lastDisplayedFrameId).toBeNull();
    expect(reassembler.stats.resyncs).toBe(1);

    const shown = reassembler.accept(color(2));
    expect(shown.kind === "displayed" && shown.pair.frameId).toBe(2);
  });

  it("starts the restart count over when the old stream is heard again", () => {
    reassembler.accept(color(5000));
    reassembler.accept(depth(5000));
    for (const d of [color(0), depth(0), color(1), depth(1), color(2)]) reassembler.accept(d);
    reassembler.accept(color(5001));

    expect(reassembler.accept(depth(2))).toEqual({ kind: "stale", frameId: 2 });
    expect(reassembler.stats.resyncs).toBe(0);
    expect(reassembler.inFlightFrameIds).toEqual([5001]);
  });

  it("does not count scattered far-behind ids as a restart", () => {
    reassembler.accept(color(5000));
    reassembler.accept(depth(5000));
    for (const id of [0, 100, 200, 300, 400, 500]) {
      expect(reassembler.accept(color(id)).kind).toBe("stale");
    }
    expect(reassembler.stats.resyncs).toBe(0);
    expect(reassembler.lastDisplayedFrameId).toBe(5000);
  });

  it("rejects settings that would evict before resyncing", () => {
    expect(() => new Reassembler({ codec: fakeCodec, resyncWindow: 10 })).toThrow(RangeError);
    expect(() => new Reassembler({ codec: fakeCodec, maxInFlight: 1 })).toThrow(RangeError);
    expect(() => new Reassembler({ codec: fakeCodec, resyncAfter: 1 })).toThrow(RangeError);
  });

  it("pairs real encoded channels at the declared size", () => {
    const codec = createChannelCodec();
    const real = new Reassembler({ codec });
    const header = { frameId: 1, timestampUs: 1n, width: 16, height: 8 };
    const rgb = new Uint8Array(16 * 8 * 3).fill(90);
    const z = new Uint16Array(16 * 8).fill(1234);

    real.accept(encodeDatagram({ ...header, channel: ChannelType.Color }, codec.encodeColor({ width: 16, height: 8, data: rgb })));
    const result = real.accept(encodeDatagram({ ...header, channel: ChannelType.Depth }, codec.encodeDepth({ width: 16, height: 8, data: z })));

    expect(result.kind).toBe("displayed");
    if (result.kind !== "displayed") return;
    expect(result.pair.color?.width).toBe(16);
    expect(result.pair.color?.height).toBe(8);
    expect(result.pair.depth?.data[0]).toBe(1234);
  });
});
