import { createChannelCodec } from "@rgbd/common/src/codec";
import { loadSenderConfig, type SenderConfig } from "@rgbd/common/src/config";
import { ConfigError } from "@rgbd/common/src/errors";
import { assertHeaderLayout } from "@rgbd/common/src/rgbd";
import { createSenderStats, RgbdSender, runSender } from "./sender";
import { SyntheticSource } from "./source";
import { UdpTransport } from "./transport";

function readConfig(): SenderConfig {
  try {
    return loadSenderConfig(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      console.error("Usage: npm run sender -- <receiver_host>[:port]");
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const config = readConfig();
  assertHeaderLayout();

  const { destination } = config;
  const stats = createSenderStats();
  const abort = new AbortController();
  const failure: { error?: Error } = {};

  let sender: RgbdSender | null = null;
  const transport = await UdpTransport.open({
    destination,
    onSendError: (err) => sender?.recordSendError(err),
    onSocketError: (err) => {
      console.error("❌ [sender] Socket error:", err);
      failure.error = err;
      abort.abort();
    }
  });
  sender = new RgbdSender({
    transport,
    codec: createChannelCodec({ jpegQuality: config.jpegQuality, depthLevel: config.depthLevel }),
    stats
  });
  const source = new SyntheticSource({ width: config.width, height: config.height, fps: config.fps });

  const stop = (sig: string) => {
    console.log(`📴 [sender] ${sig} received, stopping...`);
    abort.abort();
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));

  console.log(`🚀 [sender] Streaming ${config.width}x${config.height}@${config.fps} to ${destination.host}:${destination.port}`);
  try {
    await runSender({
      source,
      sender,
      warmupFrames: config.warmupFrames,
      statsIntervalMs: config.statsIntervalMs,
      signal: abort.signal
    });
  } finally {
    await transport.close();
  }

  console.log(`✅ [sender] Stopped after ${stats.frames} frames (${stats.datagramsSent} datagrams, ${stats.oversized} oversized)`);
  if (failure.error) process.exit(1);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
