import dgram from "dgram";
import type { Destination } from "@rgbd/common/src/config";

export interface DatagramTransport {
  /** Queues one datagram. Returns immediately; failures go to `onSendError`. */
  send(packet: Buffer): void;
  close(): Promise<void>;
}

export interface UdpTransportOptions {
  destination: Destination;
  /** A single datagram could not be sent. The stream goes on. */
  onSendError(err: Error): void;
  /** The socket itself failed. */
  onSocketError(err: Error): void;
  sendBufferBytes?: number;
}

export class UdpTransport implements DatagramTransport {
  private closed = false;

  private constructor(
    private readonly socket: dgram.Socket,
    private readonly options: UdpTransportOptions
  ) {}

  static async open(options: UdpTransportOptions): Promise<UdpTransport> {
    const socket = dgram.createSocket(options.destination.host.includes(":") ? "udp6" : "udp4");
    await new Promise<void>((resolve, reject) => {
      socket.once("error", reject);
      socket.bind(0, () => {
        socket.off("error", reject);
        resolve();
      });
    });
    socket.setSendBufferSize(options.sendBufferBytes ?? 1024 * 1024);
    socket.on("error", options.onSocketError);
    return new UdpTransport(socket, options);
  }

  send(packet: Buffer): void {
    if (this.closed) return;
    const { host, port } = this.options.destination;
    this.socket.send(packet, port, host, (err) => {
      if (err) this.options.onSendError(err);
    });
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return new Promise((resolve) => this.socket.close(() => resolve()));
  }
}
