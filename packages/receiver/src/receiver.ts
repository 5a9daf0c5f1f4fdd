import dgram from "dgram";
import { errorMessage } from "@rgbd/common/src/errors";
import type { FramePair } from "@rgbd/common/src/types";
import type { Reassembler } from "./reassembler";
import type { FrameSink } from "./sinks";

const RECV_BUFFER_BYTES = 4 * 1024 * 1024;

export interface RgbdReceiverOptions {
  port: number;
  host: string;
  reassembler: Reassembler;
  sinks: FrameSink[];
  statsIntervalMs: number;
  /** Socket-level failure after bind. The receiver is unusable afterwards. */
  onFatal(err: Error): void;
}

/**
 * Owns the UDP socket and the sinks. Every datagram runs through the
 * reassembler inside the socket's message handler; displayed pairs are
 * handed to each sink in turn.
 */
export class RgbdReceiver {
  private statsTimer: NodeJS.Timeout | null = null;
  private closed = false;

  private constructor(
    private readonly socket: dgram.Socket,
    private readonly options: RgbdReceiverOptions
  ) {}

  static async start(options: RgbdReceiverOptions): Promise<RgbdReceiver> {
    const socket = dgram.createSocket({ type: options.host.includes(":") ? "udp6" : "udp4", recvBufferSize: RECV_BUFFER_BYTES });
    await new Promise<void>((resolve, reject) => {
      socket.once("error", reject);
      socket.bind(options.port, options.host, () => {
        socket.off("error", reject);
        resolve();
      });
    });

    const receiver = new RgbdReceiver(socket, options);
    socket.on("message", (msg) => receiver.handleDatagram(msg));
    socket.on("error", (err) => options.onFatal(err));
    receiver.statsTimer = setInterval(() => receiver.logStats(), options.statsIntervalMs);
    receiver.statsTimer.unref();

    const { address, port } = socket.address();
    console.log(`📡 [receiver] Listening on udp://${address}:${port}`);
    return receiver;
  }

  get port(): number {
    return this.socket.address().port;
  }

  handleDatagram(msg: Buffer): void {
    const result = this.options.reassembler.accept(msg);
    if (result.kind === "displayed") {
      this.dispatch(result.pair);
    }
  }

  private dispatch(pair: FramePair): void {
    for (const sink of this.options.sinks) {
      try {
        sink.render(pair);
      } catch (err) {
        console.error(`[receiver] Sink "${sink.name}" failed on frame ${pair.frameId}: ${errorMessage(err)}`);
      }
    }
  }

  logStats(): void {
    const s = this.options.reassembler.stats;
    console.log(
      `📊 [receiver] datagrams=${s.datagrams} displayed=${s.displayed} rejected=${s.rejected} ` +
        `stale=${s.stale} duplicates=${s.duplicates} decodeFailures=${s.decodeFailures} ` +
        `evicted=${s.evicted} resyncs=${s.resyncs}`
    );
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.statsTimer) clearInterval(this.statsTimer);
    try {
      await new Promise<void>((resolve) => this.socket.close(() => resolve()));
    } finally {
      for (const sink of this.options.sinks) {
        try {
          await sink.close?.();
        } catch (err) {
          console.error(`[receiver] Closing sink "${sink.name}" failed: ${errorMessage(err)}`);
        }
      }
    }
  }
}
