import { FramingError, ProtocolMismatchError } from "./errors";
import {
  ChannelType,
  type DatagramHeader,
  FRAME_ID_SPACE,
  HEADER_SIZE,
  type RGBDDatagram
} from "./types";

/**
 * Layout (little-endian, packed, one datagram per channel):
 * u32 frameId
 * u8  channel      0 = color, 1 = depth
 * u64 timestampUs
 * u16 width
 * u16 height
 * u32 payloadLen
 * [payloadLen] payload
 */
const HEADER_FIELDS = [
  ["frameId", 4],
  ["channel", 1],
  ["timestampUs", 8],
  ["width", 2],
  ["height", 2],
  ["payloadLen", 4]
] as const;

export function headerLayoutSize(): number {
  return HEADER_FIELDS.reduce((sum, [, size]) => sum + size, 0);
}

/**
 * Both ends call this before touching a socket. A build whose field layout
 * does not add up to HEADER_SIZE cannot talk to its peer.
 */
export function assertHeaderLayout(expected = HEADER_SIZE): void {
  const actual = headerLayoutSize();
  if (actual !== expected) {
    throw new ProtocolMismatchError(
      `Header layout is ${actual} bytes but the protocol expects ${expected}`
    );
  }
}

export function encodeDatagram(header: DatagramHeader, payload: Uint8Array): Buffer {
  const payloadLen = payload.length;
  const buf = Buffer.allocUnsafe(HEADER_SIZE + payloadLen);
  let offset = 0;

  buf.writeUInt32LE(header.frameId >>> 0, offset); offset += 4;
  buf.writeUInt8(header.channel, offset); offset += 1;
  buf.writeBigUInt64LE(header.timestampUs, offset); offset += 8;
  buf.writeUInt16LE(header.width, offset); offset += 2;
  buf.writeUInt16LE(header.height, offset); offset += 2;
  buf.writeUInt32LE(payloadLen, offset); offset += 4;

  buf.set(payload, offset);
  return buf;
}

function isChannelType(value: number): value is ChannelType {
  return value === ChannelType.Color || value === ChannelType.Depth;
}

export function decodeDatagram(buf: Buffer): RGBDDatagram {
  if (buf.length < HEADER_SIZE) {
    throw new FramingError("too_short", `Datagram of ${buf.length} bytes is shorter than the ${HEADER_SIZE}-byte header`);
  }
  let offset = 0;

  const frameId = buf.readUInt32LE(offset); offset += 4;
  const channel = buf.readUInt8(offset); offset += 1;
  const timestampUs = buf.readBigUInt64LE(offset); offset += 8;
  const width = buf.readUInt16LE(offset); offset += 2;
  const height = buf.readUInt16LE(offset); offset += 2;
  const payloadLength = buf.readUInt32LE(offset); offset += 4;

  if (buf.length !== HEADER_SIZE + payloadLength) {
    throw new FramingError(
      "length_mismatch",
      `Header declares ${payloadLength} payload bytes but ${buf.length - HEADER_SIZE} follow`
    );
  }
  if (!isChannelType(channel)) {
    throw new FramingError("unknown_channel", `Unknown channel type ${channel}`);
  }

  return {
    frameId,
    channel,
    timestampUs,
    width,
    height,
    payloadLength,
    payload: buf.subarray(offset, offset + payloadLength)
  };
}

export function nextFrameId(frameId: number): number {
  return (frameId + 1) % FRAME_ID_SPACE;
}

/** How many ids `a` is ahead of `b`, modulo 2^32. */
export function frameIdDistance(a: number, b: number): number {
  return (a - b) >>> 0;
}

/** Serial-number comparison: true when `a` comes after `b` within half the id space. */
export function isNewerFrameId(a: number, b: number): boolean {
  const d = frameIdDistance(a, b);
  return d !== 0 && d < FRAME_ID_SPACE / 2;
}
