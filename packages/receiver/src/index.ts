import { createChannelCodec } from "@rgbd/common/src/codec";
import { loadReceiverConfig } from "@rgbd/common/src/config";
import { assertHeaderLayout } from "@rgbd/common/src/rgbd";
import { PreviewServer } from "./preview";
import { Reassembler } from "./reassembler";
import { RgbdReceiver } from "./receiver";
import { ConsoleSink, type FrameSink } from "./sinks";

async function main() {
  const config = loadReceiverConfig();
  assertHeaderLayout();

  const codec = createChannelCodec({ jpegQuality: config.jpegQuality, depthLevel: config.depthLevel });
  const reassembler = new Reassembler({
    codec,
    maxInFlight: config.maxInFlight,
    resyncWindow: config.resyncWindow
  });

  const sinks: FrameSink[] = [new ConsoleSink(config.logEvery)];
  if (config.previewPort !== null) {
    const preview = new PreviewServer({ codec, stats: () => reassembler.stats });
    sinks.push(preview);
    try {
      await preview.listen(config.previewPort, config.bindHost);
    } catch (err) {
      await preview.close();
      throw err;
    }
  }

  let shuttingDown = false;
  let receiver: RgbdReceiver | null = null;
  const shutdown = async (reason: string, code: number) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`📴 [receiver] ${reason}, shutting down...`);
    try {
      if (receiver) {
        await receiver.close();
      } else {
        await Promise.all(sinks.map((sink) => sink.close?.()));
      }
      receiver?.logStats();
      console.log("✅ [receiver] Closed");
    } finally {
      process.exit(code);
    }
  };

  receiver = await RgbdReceiver.start({
    port: config.port,
    host: config.bindHost,
    reassembler,
    sinks,
    statsIntervalMs: config.statsIntervalMs,
    onFatal: (err) => {
      console.error("❌ [receiver] Socket error:", err);
      void shutdown("Socket error", 1);
    }
  }).catch(async (err: unknown) => {
    await Promise.all(sinks.map((sink) => sink.close?.()));
    throw err;
  });

  process.on("SIGINT", () => void shutdown("SIGINT received", 0));
  process.on("SIGTERM", () => void shutdown("SIGTERM received", 0));
}

main().catch((err) => {
  console.error("❌ [receiver] Failed to start:", err);
  process.exit(1);
});
