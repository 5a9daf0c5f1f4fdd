import jpeg from "jpeg-js";
import pako from "pako";
import { CodecError, errorMessage } from "./errors";
import type { ColorImage, DepthImage } from "./types";

export interface ChannelCodec {
  encodeColor(image: ColorImage): Uint8Array;
  encodeDepth(image: DepthImage): Uint8Array;
  decodeColor(bytes: Uint8Array, width: number, height: number): ColorImage;
  decodeDepth(bytes: Uint8Array, width: number, height: number): DepthImage;
}

export interface CodecOptions {
  jpegQuality: number;
  depthLevel: number;
}

export const DEFAULT_CODEC_OPTIONS: CodecOptions = {
  jpegQuality: 80,
  depthLevel: 6
};

const DEFLATE_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;
type DeflateLevel = (typeof DEFLATE_LEVELS)[number] | -1;

function toDeflateLevel(level: number): DeflateLevel {
  return DEFLATE_LEVELS.find((l) => l === level) ?? -1;
}

const INFLATE_CHUNK_BYTES = 16 * 1024;

/** Inflates `bytes`, giving up as soon as the output passes `limit` bytes. */
function inflateBounded(bytes: Uint8Array, limit: number): Buffer {
  const inflator = new pako.Inflate({ chunkSize: INFLATE_CHUNK_BYTES });
  const chunks: Buffer[] = [];
  let total = 0;
  inflator.onData = (chunk) => {
    total += chunk.byteLength;
    if (total > limit) {
      throw new CodecError(`Depth payload inflates past ${limit} bytes`);
    }
    chunks.push(Buffer.from(chunk instanceof ArrayBuffer ? new Uint8Array(chunk) : chunk));
  };
  inflator.push(bytes, true);
  if (inflator.err) {
    throw new CodecError(`Depth inflate failed: ${inflator.msg || `zlib error ${inflator.err}`}`);
  }
  return Buffer.concat(chunks, total);
}

function rgbToRgba(rgb: Uint8Array, pixels: number): Buffer {
  const rgba = Buffer.allocUnsafe(pixels * 4);
  for (let i = 0, j = 0; i < pixels; i++, j += 3) {
    rgba[i * 4] = rgb[j];
    rgba[i * 4 + 1] = rgb[j + 1];
    rgba[i * 4 + 2] = rgb[j + 2];
    rgba[i * 4 + 3] = 0xff;
  }
  return rgba;
}

function rgbaToRgb(rgba: Uint8Array, pixels: number): Uint8Array {
  const rgb = new Uint8Array(pixels * 3);
  for (let i = 0, j = 0; i < pixels; i++, j += 3) {
    rgb[j] = rgba[i * 4];
    rgb[j + 1] = rgba[i * 4 + 1];
    rgb[j + 2] = rgba[i * 4 + 2];
  }
  return rgb;
}

/**
 * Color goes out as baseline JPEG; depth as little-endian Z16 through zlib.
 * Every decode checks the result against the dimensions the header declared.
 */
export function createChannelCodec(options: Partial<CodecOptions> = {}): ChannelCodec {
  const { jpegQuality, depthLevel } = { ...DEFAULT_CODEC_OPTIONS, ...options };
  const level = toDeflateLevel(depthLevel);

  return {
    encodeColor(image) {
      const pixels = image.width * image.height;
      if (image.data.length !== pixels * 3) {
        throw new CodecError(`Color buffer holds ${image.data.length} bytes, expected ${pixels * 3}`);
      }
      const encoded = jpeg.encode(
        { width: image.width, height: image.height, data: rgbToRgba(image.data, pixels) },
        jpegQuality
      );
      return encoded.data;
    },

    encodeDepth(image) {
      const pixels = image.width * image.height;
      if (image.data.length !== pixels) {
        throw new CodecError(`Depth buffer holds ${image.data.length} samples, expected ${pixels}`);
      }
      const raw = Buffer.allocUnsafe(pixels * 2);
      for (let i = 0; i < pixels; i++) {
        raw.writeUInt16LE(image.data[i], i * 2);
      }
      return pako.deflate(raw, { level });
    },

    decodeColor(bytes, width, height) {
      const pixels = width * height;
      let decoded: { width: number; height: number; data: Uint8Array };
      try {
        // Bound the decoder by the header's size before it allocates anything.
        decoded = jpeg.decode(bytes, {
          useTArray: true,
          maxResolutionInMP: (pixels + 1) / 1e6,
          maxMemoryUsageInMB: Math.max(8, Math.ceil((pixels * 16) / (1024 * 1024)))
        });
      } catch (err) {
        throw new CodecError(`JPEG decode failed: ${errorMessage(err)}`, { cause: err });
      }
      if (decoded.width !== width || decoded.height !== height) {
        throw new CodecError(
          `JPEG is ${decoded.width}x${decoded.height}, header says ${width}x${height}`
        );
      }
      return { width, height, data: rgbaToRgb(decoded.data, pixels) };
    },

    decodeDepth(bytes, width, height) {
      const pixels = width * height;
      let raw: Buffer;
      try {
        raw = inflateBounded(bytes, pixels * 2);
      } catch (err) {
        if (err instanceof CodecError) throw err;
        throw new CodecError(`Depth inflate failed: ${errorMessage(err)}`, { cause: err });
      }
      if (raw.length !== pixels * 2) {
        throw new CodecError(`Depth payload inflates to ${raw.length} bytes, expected ${pixels * 2}`);
      }
      const data = new Uint16Array(pixels);
      for (let i = 0; i < pixels; i++) {
        data[i] = raw.readUInt16LE(i * 2);
      }
      return { width, height, data };
    }
  };
}
