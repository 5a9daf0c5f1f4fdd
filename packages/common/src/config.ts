import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_PORT } from "./types";

dotenv.config();

type Env = Record<string, string | undefined>;

const port = z.coerce.number().int().min(1).max(65535);
const intervalMs = z.coerce.number().int().min(100).max(60_000);

const codecSchema = z.object({
  RGBD_JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(80),
  RGBD_DEPTH_LEVEL: z.coerce.number().int().min(0).max(9).default(6)
});

const senderSchema = codecSchema.extend({
  RGBD_PORT: port.default(DEFAULT_PORT),
  RGBD_WIDTH: z.coerce.number().int().min(16).max(4096).default(424),
  RGBD_HEIGHT: z.coerce.number().int().min(16).max(4096).default(240),
  RGBD_FPS: z.coerce.number().int().min(1).max(120).default(30),
  RGBD_WARMUP_FRAMES: z.coerce.number().int().min(0).max(1000).default(30),
  RGBD_STATS_INTERVAL_MS: intervalMs.default(1000)
});

const receiverSchema = codecSchema.extend({
  RGBD_PORT: port.default(DEFAULT_PORT),
  RGBD_BIND_HOST: z.string().min(1).default("0.0.0.0"),
  RGBD_MAX_IN_FLIGHT: z.coerce.number().int().min(2).max(1024).default(32),
  RGBD_RESYNC_WINDOW: z.coerce.number().int().min(11).max(1_000_000).default(90),
  RGBD_PREVIEW_PORT: port.optional(),
  RGBD_LOG_EVERY: z.coerce.number().int().min(1).default(30),
  RGBD_STATS_INTERVAL_MS: intervalMs.default(1000)
});

export interface Destination {
  host: string;
  port: number;
}

export interface SenderConfig {
  destination: Destination;
  width: number;
  height: number;
  fps: number;
  warmupFrames: number;
  jpegQuality: number;
  depthLevel: number;
  statsIntervalMs: number;
}

export interface ReceiverConfig {
  port: number;
  bindHost: string;
  maxInFlight: number;
  resyncWindow: number;
  previewPort: number | null;
  logEvery: number;
  jpegQuality: number;
  depthLevel: number;
  statsIntervalMs: number;
}

// Blank values in .env mean "use the default".
function withoutBlanks(env: Env): Env {
  const out: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.infer<T> {
  const result = schema.safeParse(withoutBlanks(env));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/** Accepts `host` or `host:port`; IPv6 literals go in brackets. */
export function parseDestination(arg: string | undefined, defaultPort = DEFAULT_PORT): Destination {
  const raw = (arg ?? "").trim();
  if (!raw) {
    throw new ConfigError("Receiver address is required");
  }

  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(raw);
  if (bracketed) {
    return { host: bracketed[1], port: parsePort(bracketed[2], defaultPort) };
  }

  const colon = raw.lastIndexOf(":");
  if (colon !== raw.indexOf(":")) {
    throw new ConfigError(`Wrap IPv6 addresses in brackets, e.g. "[${raw}]" or "[${raw}]:${defaultPort}"`);
  }
  if (colon === -1) {
    return { host: raw, port: defaultPort };
  }
  const host = raw.slice(0, colon);
  if (!host) {
    throw new ConfigError(`Missing host in "${raw}"`);
  }
  return { host, port: parsePort(raw.slice(colon + 1), defaultPort) };
}

function parsePort(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const result = port.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid port "${raw}"`);
  }
  return result.data;
}

export function loadSenderConfig(argv: string[], env: Env = process.env): SenderConfig {
  const parsed = parseEnv(senderSchema, env);
  return {
    destination: parseDestination(argv[0], parsed.RGBD_PORT),
    width: parsed.RGBD_WIDTH,
    height: parsed.RGBD_HEIGHT,
    fps: parsed.RGBD_FPS,
    warmupFrames: parsed.RGBD_WARMUP_FRAMES,
    jpegQuality: parsed.RGBD_JPEG_QUALITY,
    depthLevel: parsed.RGBD_DEPTH_LEVEL,
    statsIntervalMs: parsed.RGBD_STATS_INTERVAL_MS
  };
}

export function loadReceiverConfig(env: Env = process.env): ReceiverConfig {
  const parsed = parseEnv(receiverSchema, env);
  return {
    port: parsed.RGBD_PORT,
    bindHost: parsed.RGBD_BIND_HOST,
    maxInFlight: parsed.RGBD_MAX_IN_FLIGHT,
    resyncWindow: parsed.RGBD_RESYNC_WINDOW,
    previewPort: parsed.RGBD_PREVIEW_PORT ?? null,
    logEvery: parsed.RGBD_LOG_EVERY,
    jpegQuality: parsed.RGBD_JPEG_QUALITY,
    depthLevel: parsed.RGBD_DEPTH_LEVEL,
    statsIntervalMs: parsed.RGBD_STATS_INTERVAL_MS
  };
}
