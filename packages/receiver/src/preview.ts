import http from "http";
import { WebSocket, WebSocketServer } from "ws";
import type { ChannelCodec } from "@rgbd/common/src/codec";
import { errorMessage } from "@rgbd/common/src/errors";
import { encodeDatagram } from "@rgbd/common/src/rgbd";
import { ChannelType, type FramePair } from "@rgbd/common/src/types";
import type { FrameSink } from "./sinks";

export interface PreviewServerOptions {
  codec: ChannelCodec;
  /** Snapshot served at /health. */
  stats: () => object;
  /** A viewer with more than this queued skips frames until it drains. */
  maxBufferedBytes?: number;
}

/**
 * Browser-facing view of the displayed stream. Each displayed pair goes out
 * to every connected WebSocket viewer as one binary message per present
 * channel, framed exactly like the UDP datagrams.
 */
export class PreviewServer implements FrameSink {
  readonly name = "preview";
  private readonly httpServer: http.Server;
  private readonly wss: WebSocketServer;
  private readonly maxBufferedBytes: number;
  skipped = 0;

  constructor(private readonly options: PreviewServerOptions) {
    this.maxBufferedBytes = options.maxBufferedBytes ?? 4 * 1024 * 1024;

    this.httpServer = http.createServer((req, res) => {
      const origin = req.headers.origin;
      if (origin) {
        res.setHeader("Access-Control-Allow-Origin", origin);
        res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
      }
      if (req.method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }
      if (req.url === "/health" || req.url === "/") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(JSON.stringify({
          status: "ok",
          service: "receiver",
          uptime: process.uptime(),
          viewers: this.wss.clients.size,
          skippedFrames: this.skipped,
          stats: this.options.stats()
        }));
        return;
      }
      res.writeHead(404);
      res.end("Not found");
    });

    this.wss = new WebSocketServer({ server: this.httpServer });
    this.wss.on("connection", (ws) => {
      console.log(`[preview] Viewer connected (${this.wss.clients.size} total)`);
      ws.on("close", () => {
        console.log(`[preview] Viewer disconnected (${this.wss.clients.size} remaining)`);
      });
      ws.on("error", (err) => {
        console.error("[preview] Viewer socket error:", err);
      });
    });
  }

  listen(port: number, host = "0.0.0.0"): Promise<number> {
    return new Promise((resolve, reject) => {
      this.httpServer.once("error", reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off("error", reject);
        const address = this.httpServer.address();
        const bound = address !== null && typeof address === "object" ? address.port : port;
        console.log(`🌐 [preview] Listening on http://${host}:${bound} (WebSocket on the same port)`);
        resolve(bound);
      });
    });
  }

  render(pair: FramePair): void {
    const viewers = [...this.wss.clients].filter((ws) => ws.readyState === WebSocket.OPEN);
    if (viewers.length === 0) return;

    const messages = this.encodePair(pair);
    for (const ws of viewers) {
      if (ws.bufferedAmount > this.maxBufferedBytes) {
        this.skipped++;
        continue;
      }
      for (const message of messages) {
        ws.send(message, { binary: true });
      }
    }
  }

  private encodePair(pair: FramePair): Buffer[] {
    const { frameId, timestampUs, width, height } = pair;
    const messages: Buffer[] = [];
    try {
      if (pair.color) {
        messages.push(encodeDatagram(
          { frameId, channel: ChannelType.Color, timestampUs, width, height },
          this.options.codec.encodeColor(pair.color)
        ));
      }
      if (pair.depth) {
        messages.push(encodeDatagram(
          { frameId, channel: ChannelType.Depth, timestampUs, width, height },
          this.options.codec.encodeDepth(pair.depth)
        ));
      }
    } catch (err) {
      console.warn(`[preview] Frame ${frameId} re-encode failed: ${errorMessage(err)}`);
    }
    return messages;
  }

  close(): Promise<void> {
    for (const ws of this.wss.clients) {
      ws.terminate();
    }
    return new Promise((resolve, reject) => {
      this.wss.close(() => {
        if (!this.httpServer.listening) {
          resolve();
          return;
        }
        this.httpServer.close((err) => (err ? reject(err) : resolve()));
      });
    });
  }
}
