import net from "node:net";
import { createReadRequest, encodeHeader } from "../src/frame.js";
import type { ReadRequest } from "../src/frame.js";
import { ConnectionError } from "../src/errors.js";
import type { Transport } from "../src/transport.js";

export interface ResponseFields {
  functionCode: number;
  baseRegister: number;
  values: number[];
  registerCount?: number;
  error?: boolean;
  inverterSerial?: string;
  checksum?: number;
}

/** Build a response payload the way the inverter lays it out. */
export function buildResponsePayload(fields: ResponseFields): Buffer {
  const {
    functionCode,
    baseRegister,
    values,
    registerCount = values.length,
    error = false,
    inverterSerial = "SA1234G567",
    checksum = 0xbeef,
  } = fields;

  const payload = Buffer.alloc(34 + values.length * 2 + 2);
  let offset = payload.write("AB1234G567", 0, 10, "ascii");
  offset = payload.writeBigUInt64BE(8n, offset);
  offset = payload.writeUInt8(0x32, offset);
  offset = payload.writeUInt8(error ? functionCode | 0x80 : functionCode, offset);
  offset += payload.write(inverterSerial, offset, 10, "ascii");
  offset = payload.writeUInt16BE(baseRegister, offset);
  offset = payload.writeUInt16BE(registerCount, offset);
  for (const value of values) {
    offset = payload.writeUInt16BE(value, offset);
  }
  payload.writeUInt16BE(checksum, offset);
  return payload;
}

export function buildResponseFrame(fields: ResponseFields): Buffer {
  const payload = buildResponsePayload(fields);
  return Buffer.concat([encodeHeader(payload.length), payload]);
}

/**
 * Transport that hands back a canned response at most `chunkSize` bytes at a
 * time, then reports the connection closed.
 */
export class ChunkedTransport implements Transport {
  public readonly sent: Buffer[] = [];
  public readonly receiveSizes: number[] = [];
  private offset = 0;

  constructor(
    private readonly response: Buffer,
    private readonly chunkSize: number
  ) {}

  async send(data: Buffer): Promise<void> {
    this.sent.push(Buffer.from(data));
  }

  async receive(max: number): Promise<Buffer> {
    if (this.offset >= this.response.length) {
      throw new ConnectionError("closed");
    }
    const size = Math.min(max, this.chunkSize, this.response.length - this.offset);
    const chunk = this.response.subarray(this.offset, this.offset + size);
    this.offset += size;
    this.receiveSizes.push(chunk.length);
    return chunk;
  }
}

const REQUEST_FRAME_SIZE = 34;

export interface MockInverterOptions {
  /** Register value to report. Default: 100 + address */
  value?: (functionCode: number, address: number) => number;
  /** Answer with the error flag set for requests whose base is at or above this. */
  errorFrom?: number;
  /** Send only this many bytes of each response, then close. */
  truncateAt?: number;
}

export interface MockInverter {
  port: number;
  requests: ReadRequest[];
  close(): Promise<void>;
}

/**
 * In-process stand-in for the inverter's data adapter on 127.0.0.1.
 * Each response is written in two parts.
 */
export async function startMockInverter(options: MockInverterOptions = {}): Promise<MockInverter> {
  const value = options.value ?? ((_fc: number, address: number) => 100 + address);
  const requests: ReadRequest[] = [];
  const sockets = new Set<net.Socket>();

  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));

    let pending = Buffer.alloc(0);
    socket.on("data", (data: Buffer) => {
      pending = Buffer.concat([pending, data]);
      while (pending.length >= REQUEST_FRAME_SIZE) {
        const frame = pending.subarray(0, REQUEST_FRAME_SIZE);
        pending = pending.subarray(REQUEST_FRAME_SIZE);

        const functionCode = frame[27];
        const baseRegister = frame.readUInt16BE(28);
        const registerCount = frame.readUInt16BE(30);
        requests.push(createReadRequest(functionCode, baseRegister, registerCount));

        const error = options.errorFrom !== undefined && baseRegister >= options.errorFrom;
        const values = error
          ? []
          : Array.from({ length: registerCount }, (_, i) => value(functionCode, baseRegister + i));
        const response = buildResponseFrame({
          functionCode,
          baseRegister,
          registerCount,
          values,
          error,
        });

        if (options.truncateAt !== undefined) {
          socket.end(response.subarray(0, options.truncateAt));
          return;
        }
        socket.write(response.subarray(0, 5));
        socket.write(response.subarray(5));
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("mock inverter is not listening on a TCP port");
  }

  return {
    port: address.port,
    requests,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) {
          socket.destroy();
        }
        server.close(() => resolve());
      }),
  };
}

/** A port with nothing listening on it. */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  if (address === null || typeof address === "string") {
    throw new Error("no TCP port allocated");
  }
  return address.port;
}
