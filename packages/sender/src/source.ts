import { setTimeout as sleep } from "timers/promises";
import type { CapturedFrame, ColorImage, DepthImage } from "@rgbd/common/src/types";

/** Camera boundary. `next` resolves with null once the source is exhausted or closed. */
export interface FrameSource {
  next(): Promise<CapturedFrame | null>;
  close(): Promise<void>;
}

export interface SyntheticSourceOptions {
  width: number;
  height: number;
  fps: number;
  /** Stop after this many frames. Unbounded when omitted. */
  frameLimit?: number;
  now?: () => number;
}

const NEAR_MM = 500;
const FAR_MM = 4500;

export function makeColorFrame(width: number, height: number, frameIndex: number): ColorImage {
  const data = new Uint8Array(width * height * 3);
  const shift = frameIndex % 255;
  let offset = 0;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data[offset] = (x + shift) & 0xff;
      data[offset + 1] = (y + shift * 2) & 0xff;
      data[offset + 2] = (x + y + shift * 3) & 0xff;
      offset += 3;
    }
  }

  const boxW = Math.max(4, Math.trunc(width * 0.12));
  const boxH = Math.max(4, Math.trunc(height * 0.12));
  const left = (frameIndex * 9) % Math.max(1, width - boxW);
  const top = (frameIndex * 6) % Math.max(1, height - boxH);
  for (let y = top; y < top + boxH; y++) {
    data.fill(220, (y * width + left) * 3, (y * width + left + boxW) * 3);
  }
  return { width, height, data };
}

/** A far-to-near ramp across the width with a near box tracking the color box. */
export function makeDepthFrame(width: number, height: number, frameIndex: number): DepthImage {
  const data = new Uint16Array(width * height);
  const span = FAR_MM - NEAR_MM;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data[y * width + x] = FAR_MM - Math.round((x / Math.max(1, width - 1)) * span);
    }
  }

  const boxW = Math.max(4, Math.trunc(width * 0.12));
  const boxH = Math.max(4, Math.trunc(height * 0.12));
  const left = (frameIndex * 9) % Math.max(1, width - boxW);
  const top = (frameIndex * 6) % Math.max(1, height - boxH);
  for (let y = top; y < top + boxH; y++) {
    data.fill(NEAR_MM, y * width + left, y * width + left + boxW);
  }
  return { width, height, data };
}

/**
 * Test-pattern stand-in for a depth camera, paced at the nominal fps.
 * Frames are timestamped in microseconds of the sender's wall clock.
 */
export class SyntheticSource implements FrameSource {
  private readonly now: () => number;
  private readonly frameIntervalMs: number;
  private startMs: number | null = null;
  private frameIndex = 0;
  private closed = false;

  constructor(private readonly options: SyntheticSourceOptions) {
    this.now = options.now ?? Date.now;
    this.frameIntervalMs = 1000 / options.fps;
  }

  async next(): Promise<CapturedFrame | null> {
    const { width, height, frameLimit } = this.options;
    if (this.closed) return null;
    if (frameLimit !== undefined && this.frameIndex >= frameLimit) return null;

    if (this.startMs === null) this.startMs = this.now();
    const dueMs = this.startMs + this.frameIndex * this.frameIntervalMs;
    const waitMs = dueMs - this.now();
    if (waitMs > 0) await sleep(waitMs);
    if (this.closed) return null;

    const index = this.frameIndex++;
    return {
      color: makeColorFrame(width, height, index),
      depth: makeDepthFrame(width, height, index),
      timestampUs: BigInt(Math.trunc(this.now())) * 1000n
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
