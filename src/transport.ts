/**
 * Byte-stream transport to the inverter.
 *
 * `receive` may hand back fewer bytes than asked for, the same way a socket
 * read does; `readExactly` accumulates chunks until the full amount is in.
 */

import net from "node:net";
import { once } from "node:events";
import { ConnectionError } from "./errors.js";
import type { Logger } from "./logger.js";
import { nullLogger } from "./logger.js";

export interface Transport {
  /** Write every byte or reject with a ConnectionError. */
  send(data: Buffer): Promise<void>;
  /** Resolve with 1..max bytes; reject with a ConnectionError once closed. */
  receive(max: number): Promise<Buffer>;
}

/** Read exactly `size` bytes, looping over partial receives. */
export async function readExactly(transport: Transport, size: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let received = 0;
  while (received < size) {
    const chunk = await transport.receive(size - received);
    chunks.push(chunk);
    received += chunk.length;
  }
  return Buffer.concat(chunks, size);
}

interface PendingReceive {
  max: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
}

/**
 * Transport over a connected `net.Socket`.
 *
 * Incoming data is queued until asked for, so nothing is lost between
 * transactions. No socket timeout is set.
 */
export class SocketTransport implements Transport {
  private readonly socket: net.Socket;
  private readonly label: string;
  private readonly log: Logger;
  private chunks: Buffer[] = [];
  private pending: PendingReceive | null = null;
  private closedError: ConnectionError | null = null;

  private constructor(socket: net.Socket, label: string, log: Logger) {
    this.socket = socket;
    this.label = label;
    this.log = log;

    socket.on("data", (data: Buffer) => {
      this.chunks.push(data);
      this.flush();
    });

    socket.on("error", (err: Error) => {
      this.log.debug(`Socket error: ${err.message}`);
      this.fail(new ConnectionError(`Socket error on ${label}: ${err.message}`));
    });

    socket.on("close", () => {
      this.log.debug("Socket closed");
      this.fail(new ConnectionError(`Connection to ${label} closed`));
    });
  }

  /** Open a TCP connection to the inverter. */
  static async connect(
    host: string,
    port: number,
    log: Logger = nullLogger
  ): Promise<SocketTransport> {
    return new Promise<SocketTransport>((resolve, reject) => {
      const socket = new net.Socket();

      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(
          new ConnectionError(
            `Cannot open connection to ${host}:${port}: ${err.message}`,
            host,
            port
          )
        );
      };

      const onConnect = () => {
        cleanup();
        log.debug(`Connected to ${host}:${port}`);
        resolve(new SocketTransport(socket, `${host}:${port}`, log));
      };

      const cleanup = () => {
        socket.removeListener("error", onError);
        socket.removeListener("connect", onConnect);
      };

      socket.once("error", onError);
      socket.once("connect", onConnect);
      socket.connect(port, host);
    });
  }

  get closed(): boolean {
    return this.closedError !== null;
  }

  async send(data: Buffer): Promise<void> {
    if (this.closedError) {
      throw this.closedError;
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(new ConnectionError(`Write to ${this.label} failed: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  async receive(max: number): Promise<Buffer> {
    if (this.pending) {
      throw new ConnectionError(`Concurrent receive on ${this.label}`);
    }
    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { max, resolve, reject };
      this.flush();
    });
  }

  /** Close the socket and wait for it to finish. */
  async close(): Promise<void> {
    if (this.socket.destroyed) {
      return;
    }
    const closed = once(this.socket, "close");
    this.socket.destroy();
    await closed;
  }

  private flush(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    if (this.chunks.length > 0) {
      this.pending = null;
      pending.resolve(this.take(pending.max));
    } else if (this.closedError) {
      this.pending = null;
      pending.reject(this.closedError);
    }
  }

  private take(max: number): Buffer {
    const head = this.chunks[0];
    if (head.length <= max) {
      this.chunks.shift();
      return head;
    }
    this.chunks[0] = head.subarray(max);
    return head.subarray(0, max);
  }

  private fail(err: ConnectionError): void {
    if (!this.closedError) {
      this.closedError = err;
    }
    this.flush();
  }
}
