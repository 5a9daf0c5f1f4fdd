export const HEADER_SIZE = 21;
export const UDP_MAX_PAYLOAD = 65507;
export const FRAME_ID_SPACE = 0x1_0000_0000; // 2^32
export const LAG_WINDOW = 10;
export const DEFAULT_PORT = 9999;

export const ChannelType = {
  Color: 0,
  Depth: 1
} as const;

export type ChannelType = (typeof ChannelType)[keyof typeof ChannelType];

export interface DatagramHeader {
  frameId: number;      // u32
  channel: ChannelType; // u8
  timestampUs: bigint;  // u64, sender clock
  width: number;        // u16
  height: number;       // u16
}

export interface RGBDDatagram extends DatagramHeader {
  payloadLength: number; // u32
  payload: Buffer;
}

/** Packed RGB8, `data.length === width * height * 3`. */
export interface ColorImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Z16 in millimetres, `data.length === width * height`. */
export interface DepthImage {
  width: number;
  height: number;
  data: Uint16Array;
}

export interface CapturedFrame {
  color: ColorImage;
  depth: DepthImage;
  timestampUs: bigint;
}

/**
 * A matched pair handed to sinks. Either image is null when its payload
 * arrived but could not be decoded.
 */
export interface FramePair {
  frameId: number;
  timestampUs: bigint;
  width: number;
  height: number;
  color: ColorImage | null;
  depth: DepthImage | null;
}

export function channelName(channel: ChannelType): "color" | "depth" {
  return channel === ChannelType.Color ? "color" : "depth";
}
