/**
 * GivEnergy inverter client.
 *
 * Opens a TCP connection to the inverter's data adapter and runs read
 * transactions over it, one at a time: each response is fully drained before
 * the next request goes out, since responses carry no transaction id that
 * would let them be matched out of order.
 */

import { ConnectionError } from "./errors.js";
import { hexString } from "./decoder.js";
import {
  FunctionCode,
  HEADER_LENGTH_ADJUST,
  HEADER_SIZE,
  createReadRequest,
  decodeHeader,
  decodePayload,
  encodeRequest,
} from "./frame.js";
import type { ReadRequest, ResponsePayload } from "./frame.js";
import type { Logger, LoggerOptions } from "./logger.js";
import { nullLogger, resolveLogger } from "./logger.js";
import { SocketTransport, readExactly } from "./transport.js";
import type { Transport } from "./transport.js";

/** Default TCP port of the GivEnergy data adapter. */
export const DEFAULT_PORT = 8899;

// ---------- Options ----------

export interface GivEnergyOptions extends LoggerOptions {
  /** TCP port to connect to the inverter. Default: 8899 */
  port?: number;
}

/** Anything that can run a read transaction. */
export interface RegisterReader {
  transact(request: ReadRequest): Promise<ResponsePayload>;
}

function requestLabel(request: ReadRequest): string {
  return request.functionCode === FunctionCode.READ_INPUT_REGISTERS ? "input" : "holding";
}

/**
 * Run one request/response exchange over a connected transport.
 *
 * Reads the 8-byte header, then `length - 2` payload bytes (the header's
 * length also counts its own uid and fid bytes).
 */
export async function transact(
  transport: Transport,
  request: ReadRequest,
  log: Logger = nullLogger
): Promise<ResponsePayload> {
  const label = requestLabel(request);
  const msg = encodeRequest(request);
  log.debug(`transaction: request ${label} ${hexString(msg, 4)}`);

  await transport.send(msg);
  const headerBytes = await readExactly(transport, HEADER_SIZE);
  log.debug(`transaction ${label} header ${hexString(headerBytes)}`);

  const header = decodeHeader(headerBytes);
  log.debug(
    `transaction ${label} header fields tid=0x${header.transactionId.toString(16).padStart(4, "0")}, ` +
      `pid=${header.protocolId}, len=${header.length}, uid=${header.unitId}, fid=${header.functionId}`
  );

  const payloadSize = Math.max(header.length - HEADER_LENGTH_ADJUST, 0);
  const payload = await readExactly(transport, payloadSize);
  log.debug(`transaction ${label} payload len=${payload.length} ${hexString(payload)}`);

  const response = decodePayload(payload);
  log.debug(`transaction ${label} ${response.inverterSerial} error=${response.error}`);
  for (const [address, value] of response.registers.entries()) {
    log.debug(
      `transaction ${label} register ${address}: 0x${value.toString(16).padStart(4, "0")} (${value})`
    );
  }

  return response;
}

// ---------- Main class ----------

export class GivEnergyClient implements RegisterReader {
  public readonly address: string;
  public readonly port: number;

  private log: Logger;
  private transport: SocketTransport | null = null;
  private busy = false;

  constructor(address: string, options: GivEnergyOptions = {}) {
    this.address = address;
    this.port = options.port ?? DEFAULT_PORT;
    this.log = resolveLogger(options);
    this.log.debug(`GivEnergyClient: host=${address} port=${this.port}`);
  }

  get connected(): boolean {
    return this.transport !== null && !this.transport.closed;
  }

  // ---------- Connection management ----------

  /** Connect to the inverter */
  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    this.transport = await SocketTransport.connect(this.address, this.port, this.log);
  }

  /** Disconnect from the inverter */
  async disconnect(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      await transport.close();
    }
  }

  // ---------- Transactions ----------

  /** Send a read request and wait for its response. */
  async transact(request: ReadRequest): Promise<ResponsePayload> {
    const transport = this.transport;
    if (!transport || transport.closed) {
      throw new ConnectionError("Connection already closed.", this.address, this.port);
    }
    if (this.busy) {
      throw new ConnectionError(
        "Transaction already in progress on this connection",
        this.address,
        this.port
      );
    }

    this.busy = true;
    try {
      return await transact(transport, request, this.log);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Read input registers (function code 4)
   *
   * @param baseRegister   First register address
   * @param registerCount  Number of registers to query
   */
  async readInputRegisters(
    baseRegister: number,
    registerCount: number
  ): Promise<ResponsePayload> {
    return this.transact(
      createReadRequest(FunctionCode.READ_INPUT_REGISTERS, baseRegister, registerCount)
    );
  }

  /**
   * Read holding registers (function code 3)
   *
   * @param baseRegister   First register address
   * @param registerCount  Number of registers to query
   */
  async readHoldingRegisters(
    baseRegister: number,
    registerCount: number
  ): Promise<ResponsePayload> {
    return this.transact(
      createReadRequest(FunctionCode.READ_HOLDING_REGISTERS, baseRegister, registerCount)
    );
  }
}
