import type { DepthImage, FramePair } from "@rgbd/common/src/types";

/** Render boundary. Must tolerate a null channel. */
export interface FrameSink {
  readonly name: string;
  render(pair: FramePair): void;
  close?(): Promise<void>;
}

export interface DepthSummary {
  minMm: number;
  maxMm: number;
  centreMm: number;
  validRatio: number;
}

/** Zero marks a pixel with no depth reading and is left out of min/max. */
export function summarizeDepth(depth: DepthImage): DepthSummary | null {
  let min = Infinity;
  let max = 0;
  let valid = 0;
  for (const v of depth.data) {
    if (v === 0) continue;
    valid++;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (valid === 0) return null;

  const centre = depth.data[Math.trunc(depth.height / 2) * depth.width + Math.trunc(depth.width / 2)];
  return {
    minMm: min,
    maxMm: max,
    centreMm: centre,
    validRatio: valid / depth.data.length
  };
}

export function describePair(pair: FramePair): string {
  const colorPart = pair.color ? "color=ok" : "color=missing";
  const summary = pair.depth ? summarizeDepth(pair.depth) : null;
  const depthPart = !pair.depth
    ? "depth=missing"
    : summary
      ? `depth=${summary.minMm}..${summary.maxMm}mm centre=${summary.centreMm}mm valid=${(summary.validRatio * 100).toFixed(0)}%`
      : "depth=empty";
  return `Frame ${pair.frameId} ${pair.width}x${pair.height} ${colorPart} ${depthPart}`;
}

export class ConsoleSink implements FrameSink {
  readonly name = "console";
  private rendered = 0;

  constructor(private readonly logEvery: number) {}

  render(pair: FramePair): void {
    this.rendered++;
    if (this.rendered === 1 || this.rendered % this.logEvery === 0) {
      console.log(`🖼️ [receiver] ${describePair(pair)}`);
    }
  }
}
