import type { ChannelCodec } from "@rgbd/common/src/codec";
import { errorMessage, FramingError, type FramingRejectReason } from "@rgbd/common/src/errors";
import { decodeDatagram, frameIdDistance, isNewerFrameId } from "@rgbd/common/src/rgbd";
import {
  ChannelType,
  channelName,
  type ColorImage,
  type DepthImage,
  type FramePair,
  LAG_WINDOW,
  type RGBDDatagram
} from "@rgbd/common/src/types";

/** `image: null` means the payload arrived but did not decode. */
type Slot<T> = { present: false } | { present: true; image: T | null };

interface InFlightEntry {
  frameId: number;
  timestampUs: bigint;
  width: number;
  height: number;
  color: Slot<ColorImage>;
  depth: Slot<DepthImage>;
}

export type AcceptResult =
  | { kind: "rejected"; reason: FramingRejectReason }
  | { kind: "stale"; frameId: number }
  | { kind: "partial"; frameId: number }
  | { kind: "displayed"; pair: FramePair };

export interface ReassemblerStats {
  datagrams: number;
  rejected: number;
  stale: number;
  duplicates: number;
  decodeFailures: number;
  displayed: number;
  evicted: number;
  resyncs: number;
}

export interface ReassemblerOptions {
  codec: ChannelCodec;
  lagWindow?: number;
  maxInFlight?: number;
  /** A backward jump further than this may be a sender restart. */
  resyncWindow?: number;
  /**
   * Consecutive far-behind datagrams, close to each other in id, needed
   * before the reassembler believes the sender restarted.
   */
  resyncAfter?: number;
}

/** A run of far-behind datagrams that may be a restarted sender. */
interface RestartRun {
  latest: number;
  count: number;
}

const EMPTY: { present: false } = { present: false };

function shouldLog(count: number): boolean {
  return count === 1 || count % 50 === 0;
}

/**
 * Receiver-side frame buffer. Pairs color and depth datagrams by frame id,
 * displays each id at most once and in increasing order, and evicts ids
 * that fall a lag window behind the last display.
 *
 * `accept` is synchronous end to end, so storing a channel, the completeness
 * check and the eviction sweep never interleave with another datagram.
 */
export class Reassembler {
  readonly stats: ReassemblerStats = {
    datagrams: 0,
    rejected: 0,
    stale: 0,
    duplicates: 0,
    decodeFailures: 0,
    displayed: 0,
    evicted: 0,
    resyncs: 0
  };

  private readonly codec: ChannelCodec;
  private readonly lagWindow: number;
  private readonly maxInFlight: number;
  private readonly resyncWindow: number;
  private readonly resyncAfter: number;
  private readonly entries = new Map<number, InFlightEntry>();
  private lastDisplayed: number | null = null;
  private restartRun: RestartRun | null = null;

  constructor(options: ReassemblerOptions) {
    this.codec = options.codec;
    this.lagWindow = options.lagWindow ?? LAG_WINDOW;
    this.maxInFlight = options.maxInFlight ?? 32;
    this.resyncWindow = options.resyncWindow ?? 90;
    this.resyncAfter = options.resyncAfter ?? 6;
    if (this.maxInFlight < 2) throw new RangeError("maxInFlight must be at least 2");
    if (this.resyncWindow <= this.lagWindow) throw new RangeError("resyncWindow must exceed the lag window");
    if (this.resyncAfter < 2) throw new RangeError("resyncAfter must be at least 2");
  }

  get lastDisplayedFrameId(): number | null {
    return this.lastDisplayed;
  }

  get inFlightFrameIds(): number[] {
    return [...this.entries.keys()];
  }

  accept(buf: Buffer): AcceptResult {
    this.stats.datagrams++;

    let datagram: RGBDDatagram;
    try {
      datagram = decodeDatagram(buf);
    } catch (err) {
      if (!(err instanceof FramingError)) throw err;
      this.stats.rejected++;
      if (shouldLog(this.stats.rejected)) {
        console.warn(`[receiver] Dropped malformed datagram (${this.stats.rejected} total): ${err.message}`);
      }
      return { kind: "rejected", reason: err.reason };
    }

    const { frameId } = datagram;
    if (this.lastDisplayed !== null && !isNewerFrameId(frameId, this.lastDisplayed)) {
      const behind = frameIdDistance(this.lastDisplayed, frameId);
      if (behind <= this.resyncWindow) {
        this.restartRun = null;
        this.stats.stale++;
        return { kind: "stale", frameId };
      }
      if (!this.extendRestartRun(frameId)) {
        this.stats.stale++;
        return { kind: "stale", frameId };
      }
      this.stats.resyncs++;
      console.warn(`[receiver] ${this.resyncAfter} datagrams in a row far behind ${this.lastDisplayed}, assuming the sender restarted at ${frameId}`);
      this.reset();
    }
    this.restartRun = null;

    let entry = this.entries.get(frameId);
    if (!entry) {
      if (this.entries.size >= this.maxInFlight) {
        const oldest = this.oldestInFlight();
        if (oldest !== null && isNewerFrameId(oldest, frameId)) {
          this.stats.stale++;
          return { kind: "stale", frameId };
        }
        this.evict(oldest);
      }
      entry = this.createEntry(datagram);
    }
    if (datagram.channel === ChannelType.Color) {
      if (entry.color.present) this.stats.duplicates++;
      entry.color = { present: true, image: this.decode(datagram, (d) => this.codec.decodeColor(d.payload, d.width, d.height)) };
    } else {
      if (entry.depth.present) this.stats.duplicates++;
      entry.depth = { present: true, image: this.decode(datagram, (d) => this.codec.decodeDepth(d.payload, d.width, d.height)) };
    }

    if (!entry.color.present || !entry.depth.present) {
      return { kind: "partial", frameId };
    }

    const pair: FramePair = {
      frameId,
      timestampUs: entry.timestampUs,
      width: entry.width,
      height: entry.height,
      color: entry.color.image,
      depth: entry.depth.image
    };
    this.entries.delete(frameId);
    this.lastDisplayed = frameId;
    this.stats.displayed++;
    this.evictBehind(frameId);
    return { kind: "displayed", pair };
  }

  /** Forgets every in-flight frame and the display history. */
  reset(): void {
    this.entries.clear();
    this.lastDisplayed = null;
    this.restartRun = null;
  }

  /**
   * Counts a far-behind datagram towards a restart. Only datagrams within a
   * lag window of each other extend the run; any other arrival starts over.
   * True once the run is long enough to resync on.
   */
  private extendRestartRun(frameId: number): boolean {
    const run = this.restartRun;
    if (run !== null) {
      const gap = isNewerFrameId(frameId, run.latest)
        ? frameIdDistance(frameId, run.latest)
        : frameIdDistance(run.latest, frameId);
      if (gap < this.lagWindow) {
        run.count++;
        if (isNewerFrameId(frameId, run.latest)) run.latest = frameId;
        return run.count >= this.resyncAfter;
      }
    }
    this.restartRun = { latest: frameId, count: 1 };
    return false;
  }

  private decode<T>(datagram: RGBDDatagram, fn: (d: RGBDDatagram) => T): T | null {
    try {
      return fn(datagram);
    } catch (err) {
      this.stats.decodeFailures++;
      if (shouldLog(this.stats.decodeFailures)) {
        console.warn(`[receiver] Frame ${datagram.frameId}: ${channelName(datagram.channel)} decode failed: ${errorMessage(err)}`);
      }
      return null;
    }
  }

  private createEntry(datagram: RGBDDatagram): InFlightEntry {
    const entry: InFlightEntry = {
      frameId: datagram.frameId,
      timestampUs: datagram.timestampUs,
      width: datagram.width,
      height: datagram.height,
      color: EMPTY,
      depth: EMPTY
    };
    this.entries.set(datagram.frameId, entry);
    return entry;
  }

  private oldestInFlight(): number | null {
    let oldest: number | null = null;
    for (const id of this.entries.keys()) {
      if (oldest === null || isNewerFrameId(oldest, id)) oldest = id;
    }
    return oldest;
  }

  private evict(frameId: number | null): void {
    if (frameId !== null && this.entries.delete(frameId)) {
      this.stats.evicted++;
    }
  }

  private evictBehind(displayed: number): void {
    for (const id of [...this.entries.keys()]) {
      if (!isNewerFrameId(id, displayed) && frameIdDistance(displayed, id) >= this.lagWindow) {
        this.entries.delete(id);
        this.stats.evicted++;
      }
    }
  }
}
