import type { ChannelCodec } from "@rgbd/common/src/codec";
import { errorMessage } from "@rgbd/common/src/errors";
import { encodeDatagram, nextFrameId } from "@rgbd/common/src/rgbd";
import {
  type CapturedFrame,
  ChannelType,
  HEADER_SIZE,
  UDP_MAX_PAYLOAD,
  channelName
} from "@rgbd/common/src/types";
import type { FrameSource } from "./source";
import type { DatagramTransport } from "./transport";

export interface SenderStats {
  frames: number;
  datagramsSent: number;
  bytesSent: number;
  oversized: number;
  encodeFailures: number;
  sendErrors: number;
}

export interface SendReport {
  frameId: number;
  sent: ChannelType[];
  oversized: ChannelType[];
  encodeFailed: ChannelType[];
}

export function createSenderStats(): SenderStats {
  return { frames: 0, datagramsSent: 0, bytesSent: 0, oversized: 0, encodeFailures: 0, sendErrors: 0 };
}

export interface RgbdSenderOptions {
  transport: DatagramTransport;
  codec: ChannelCodec;
  stats?: SenderStats;
  initialFrameId?: number;
}

// Rate-limits repeated warnings: first occurrence, then every 50th.
function shouldLog(count: number): boolean {
  return count === 1 || count % 50 === 0;
}

/**
 * Packetizer: one datagram per channel per frame, never fragmented. A channel
 * that fails to encode or does not fit under the UDP ceiling is dropped for
 * that frame; the frame id advances either way.
 */
export class RgbdSender {
  readonly stats: SenderStats;
  private readonly transport: DatagramTransport;
  private readonly codec: ChannelCodec;
  private frameId: number;

  constructor(options: RgbdSenderOptions) {
    this.transport = options.transport;
    this.codec = options.codec;
    this.stats = options.stats ?? createSenderStats();
    this.frameId = (options.initialFrameId ?? 0) >>> 0;
  }

  get nextFrameId(): number {
    return this.frameId;
  }

  sendFrame(frame: CapturedFrame): SendReport {
    const frameId = this.frameId;
    const report: SendReport = { frameId, sent: [], oversized: [], encodeFailed: [] };

    const channels: Array<{ channel: ChannelType; width: number; height: number; encode: () => Uint8Array }> = [
      { channel: ChannelType.Color, width: frame.color.width, height: frame.color.height, encode: () => this.codec.encodeColor(frame.color) },
      { channel: ChannelType.Depth, width: frame.depth.width, height: frame.depth.height, encode: () => this.codec.encodeDepth(frame.depth) }
    ];

    for (const { channel, width, height, encode } of channels) {
      let payload: Uint8Array;
      try {
        payload = encode();
      } catch (err) {
        this.stats.encodeFailures++;
        report.encodeFailed.push(channel);
        if (shouldLog(this.stats.encodeFailures)) {
          console.warn(`[sender] Frame ${frameId}: ${channelName(channel)} encode failed: ${errorMessage(err)}`);
        }
        continue;
      }

      const size = HEADER_SIZE + payload.length;
      if (size > UDP_MAX_PAYLOAD) {
        this.stats.oversized++;
        report.oversized.push(channel);
        if (shouldLog(this.stats.oversized)) {
          console.warn(`[sender] Frame ${frameId}: ${channelName(channel)} datagram too large (${size} > ${UDP_MAX_PAYLOAD} bytes), dropped`);
        }
        continue;
      }

      const packet = encodeDatagram(
        { frameId, channel, timestampUs: frame.timestampUs, width, height },
        payload
      );
      this.transport.send(packet);
      this.stats.datagramsSent++;
      this.stats.bytesSent += packet.length;
      report.sent.push(channel);
    }

    this.stats.frames++;
    this.frameId = nextFrameId(frameId);
    return report;
  }

  recordSendError(err: Error): void {
    this.stats.sendErrors++;
    if (shouldLog(this.stats.sendErrors)) {
      console.warn(`[sender] Send failed (${this.stats.sendErrors} total): ${err.message}`);
    }
  }
}

export interface RunSenderOptions {
  source: FrameSource;
  sender: RgbdSender;
  warmupFrames: number;
  statsIntervalMs: number;
  signal?: AbortSignal;
  now?: () => number;
}

function logStats(stats: SenderStats, previous: SenderStats, elapsedMs: number): void {
  const sec = Math.max(0.001, elapsedMs / 1000);
  const fps = (stats.frames - previous.frames) / sec;
  const kbps = ((stats.bytesSent - previous.bytesSent) * 8) / 1000 / sec;
  console.log(
    `📊 [sender] fps=${fps.toFixed(1)} kbps=${kbps.toFixed(0)} frames=${stats.frames} ` +
      `datagrams=${stats.datagramsSent} oversized=${stats.oversized} ` +
      `encodeFailures=${stats.encodeFailures} sendErrors=${stats.sendErrors}`
  );
}

/**
 * Capture loop. Discards the warm-up frames, then sends every frame the
 * source yields until it runs dry or the signal aborts. Closes the source on
 * every exit path; the transport belongs to the caller.
 */
export async function runSender(options: RunSenderOptions): Promise<SenderStats> {
  const { source, sender, warmupFrames, statsIntervalMs, signal } = options;
  const now = options.now ?? Date.now;

  try {
    for (let i = 0; i < warmupFrames && !signal?.aborted; i++) {
      if ((await source.next()) === null) return sender.stats;
    }

    let lastLogMs = now();
    let previous = { ...sender.stats };
    while (!signal?.aborted) {
      const frame = await source.next();
      if (frame === null || signal?.aborted) break;

      sender.sendFrame(frame);

      const t = now();
      if (t - lastLogMs >= statsIntervalMs) {
        logStats(sender.stats, previous, t - lastLogMs);
        previous = { ...sender.stats };
        lastLogMs = t;
      }
    }
  } finally {
    await source.close();
  }
  return sender.stats;
}
