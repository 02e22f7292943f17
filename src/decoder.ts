/**
 * GivEnergy frame decoder utility.
 *
 * Parses and displays the contents of a captured frame in human-readable
 * format.
 */

import {
  ADAPTER_SERIAL,
  FUNCTION_ID,
  HEADER_LENGTH_ADJUST,
  HEADER_SIZE,
  PROTOCOL_ID,
  TRANSACTION_ID,
  UNIT_ID,
  crc16,
  decodeHeader,
  decodePayload,
} from "./frame.js";
import type { FrameHeader, ResponsePayload } from "./frame.js";

const REQUEST_PAYLOAD_SIZE = 26;

const FUNCTION_NAMES: Record<number, string> = {
  0x03: "ReadHoldingRegisters",
  0x04: "ReadInputRegisters",
};

// ---------- Helper functions ----------

/**
 * Render bytes as space separated hex groups of `grouping` digits,
 * e.g. `hexString(buf, 4)` gives "5959 0001 001c ...".
 */
export function hexString(data: Uint8Array, grouping = 2): string {
  const hex = Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("hex");
  const groups: string[] = [];
  for (let i = 0; i < hex.length; i += grouping) {
    groups.push(hex.slice(i, i + grouping));
  }
  return groups.join(" ");
}

function hex4(value: number): string {
  return value.toString(16).padStart(4, "0");
}

// ---------- GivEnergyFrame class ----------

export type FrameKind = "Request" | "Response";

export class GivEnergyFrame {
  private readonly frame: Buffer;

  constructor(hexString: string) {
    this.frame = Buffer.from(hexString.replace(/\s+/g, ""), "hex");
  }

  get header(): FrameHeader {
    return decodeHeader(this.frame);
  }

  get headerValid(): boolean {
    const h = this.header;
    return (
      h.transactionId === TRANSACTION_ID &&
      h.protocolId === PROTOCOL_ID &&
      h.unitId === UNIT_ID &&
      h.functionId === FUNCTION_ID
    );
  }

  get payload(): Buffer {
    return this.frame.subarray(HEADER_SIZE);
  }

  /** Header length matches the payload bytes actually captured. */
  get lengthValid(): boolean {
    return this.header.length - HEADER_LENGTH_ADJUST === this.payload.length;
  }

  get kind(): FrameKind {
    return this.payload.length === REQUEST_PAYLOAD_SIZE ? "Request" : "Response";
  }

  get adapterSerial(): string {
    return this.payload.toString("latin1", 0, 10);
  }

  get slaveAddress(): number {
    return this.payload[18];
  }

  get functionCode(): number {
    return this.payload[19] & 0x7f;
  }

  get functionName(): string {
    return FUNCTION_NAMES[this.functionCode] ?? "Unknown";
  }

  get requestBase(): number {
    return this.payload.readUInt16BE(20);
  }

  get requestCount(): number {
    return this.payload.readUInt16BE(22);
  }

  get requestCrc(): number {
    return this.payload.readUInt16BE(24);
  }

  get calculatedCrc(): number {
    return crc16(this.payload.subarray(19, 24));
  }

  get crcValid(): boolean {
    return this.requestCrc === this.calculatedCrc;
  }

  get response(): ResponsePayload {
    return decodePayload(this.payload);
  }

  payloadString(): string {
    const lines: string[] = [];
    lines.push(`${"=".repeat(10)} Payload - [${this.kind}] ${"=".repeat(10)}`);
    lines.push(
      `  Adapter serial: ${this.adapterSerial}` +
        (this.adapterSerial === ADAPTER_SERIAL ? "" : " (non-default)")
    );
    lines.push(`  Slave address: 0x${this.slaveAddress.toString(16)}`);

    if (this.kind === "Request") {
      lines.push(`  Function code: ${this.functionCode} (${this.functionName})`);
      lines.push(`  Request Start Addr: ${this.requestBase}`);
      lines.push(`  Request Quantity: ${this.requestCount}`);
      lines.push(`  CRC: ${hex4(this.requestCrc)} (valid: ${this.crcValid})`);
      return lines.join("\n");
    }

    const response = this.response;
    lines.push(
      `  Function code: ${response.functionCode} (${this.functionName})` +
        (response.error ? " ERROR" : "")
    );
    lines.push(`  Inverter serial: ${response.inverterSerial}`);
    lines.push(`  Base register: ${response.baseRegister}`);
    lines.push(`  Register count: ${response.registerCount}`);
    for (const [address, value] of response.registers.entries()) {
      lines.push(`  Register ${address}: 0x${hex4(value)} (${value})`);
    }
    lines.push(`  Checksum: ${hex4(response.checksum)} (not verified)`);
    return lines.join("\n");
  }
}

/**
 * Decode a frame and return a human-readable string.
 *
 * @param hexBytes  Array of hex byte strings (e.g. ["59", "59", "00", ...])
 *                  or a single hex string
 */
export function decode(hexBytes: string | string[]): string {
  const hexInput = Array.isArray(hexBytes) ? hexBytes.join("") : hexBytes;
  const frame = new GivEnergyFrame(hexInput);
  const header = frame.header;

  const lines: string[] = [];
  lines.push(
    `Transaction id: ${hex4(header.transactionId)} (valid: ${header.transactionId === TRANSACTION_ID})`
  );
  lines.push(`Protocol id: ${header.protocolId}`);
  lines.push(`Length: ${header.length} (valid: ${frame.lengthValid})`);
  lines.push(`Unit id: ${header.unitId}`);
  lines.push(`Function id: ${header.functionId}`);
  lines.push(`Header valid: ${frame.headerValid}`);
  lines.push(frame.payloadString());

  return lines.join("\n");
}
