/**
 * GivEnergy frame construction and parsing.
 *
 * The inverter speaks a Modbus-TCP look-alike: an 8-byte big-endian header
 * followed by a payload that carries a data adapter serial, a fixed padding
 * word, the Modbus slave address and a read request or response.
 *
 *   header:   u16 tid | u16 pid | u16 length | u8 uid | u8 fid
 *   request:  ascii[10] adapter | u64 padding | u8 slave | u8 fc
 *             | u16 base | u16 count | u16 crc
 *   response: ascii[10] adapter | u64 padding | u8 slave | u8 fc
 *             | ascii[10] inverter | u16 base | u16 count
 *             | u16[count] registers | u16 checksum
 */

import { DecodeError, FrameError } from "./errors.js";

// ---------- Constants ----------

export const FunctionCode = {
  READ_HOLDING_REGISTERS: 0x03,
  READ_INPUT_REGISTERS: 0x04,
} as const;

export type FunctionCodeValue = (typeof FunctionCode)[keyof typeof FunctionCode];

export const TRANSACTION_ID = 0x5959;
export const PROTOCOL_ID = 0x0001;
export const UNIT_ID = 0x01;
export const FUNCTION_ID = 0x02;

/** Must be exactly 10 ASCII characters. */
export const ADAPTER_SERIAL = "AB1234G567";
export const PADDING = 8n;
// 0x11 is the inverter itself, but cloud polling interferes with it.
export const SLAVE_ADDRESS = 0x32;

export const HEADER_SIZE = 8;
/** Header `length` counts the uid and fid bytes that are read with the header. */
export const HEADER_LENGTH_ADJUST = 2;
/** Response bytes before the first register: adapter..count. */
export const RESPONSE_PREFIX_SIZE = 10 + 8 + 1 + 1 + 10 + 2 + 2;

const SERIAL_SIZE = 10;
const MAX_REGISTER = 255;
const ERROR_FLAG = 0x80;

// ---------- CRC-16/Modbus lookup table ----------

const CRC_TABLE = new Uint16Array(256);
for (let i = 0; i < 256; i++) {
  let crc = i;
  for (let j = 0; j < 8; j++) {
    crc = crc & 1 ? (crc >>> 1) ^ 0xa001 : crc >>> 1;
  }
  CRC_TABLE[i] = crc;
}

/** Calculate CRC-16/Modbus over the given bytes. */
export function crc16(data: Uint8Array): number {
  let crc = 0xffff;
  for (let i = 0; i < data.length; i++) {
    crc = (crc >>> 8) ^ CRC_TABLE[(crc ^ data[i]) & 0xff];
  }
  return crc;
}

// ---------- Types ----------

export interface ReadRequest {
  readonly functionCode: FunctionCodeValue;
  readonly baseRegister: number;
  readonly registerCount: number;
}

export interface FrameHeader {
  transactionId: number;
  protocolId: number;
  length: number;
  unitId: number;
  functionId: number;
}

export interface ResponsePayload {
  adapterSerial: string;
  padding: bigint;
  slaveAddress: number;
  /** Function code with the error flag masked off. */
  functionCode: number;
  error: boolean;
  inverterSerial: string;
  baseRegister: number;
  registerCount: number;
  /** Empty for an error response. */
  registers: RegisterBlock;
  /** Decoded but not verified. */
  checksum: number;
}

/**
 * Register values of one response, indexed by absolute register address.
 */
export class RegisterBlock {
  private readonly values: readonly number[];

  constructor(
    public readonly baseRegister: number,
    values: readonly number[]
  ) {
    this.values = Object.freeze([...values]);
  }

  static empty(baseRegister: number): RegisterBlock {
    return new RegisterBlock(baseRegister, []);
  }

  get size(): number {
    return this.values.length;
  }

  has(address: number): boolean {
    const offset = address - this.baseRegister;
    return Number.isInteger(offset) && offset >= 0 && offset < this.values.length;
  }

  get(address: number): number {
    if (!this.has(address)) {
      throw new DecodeError(
        address,
        `not present in block ${this.baseRegister}+${this.values.length}`
      );
    }
    return this.values[address - this.baseRegister];
  }

  *entries(): IterableIterator<[number, number]> {
    for (let i = 0; i < this.values.length; i++) {
      yield [this.baseRegister + i, this.values[i]];
    }
  }
}

// ---------- Request encoding ----------

export function isReadFunctionCode(code: number): code is FunctionCodeValue {
  return (
    code === FunctionCode.READ_HOLDING_REGISTERS ||
    code === FunctionCode.READ_INPUT_REGISTERS
  );
}

/**
 * Build a validated read request.
 *
 * Registers are addressed 0..255 and a block holds at most 255 - base
 * registers.
 */
export function createReadRequest(
  functionCode: number,
  baseRegister: number,
  registerCount: number
): ReadRequest {
  if (!isReadFunctionCode(functionCode)) {
    throw new FrameError(`Unsupported function code: ${functionCode}`);
  }
  if (!Number.isInteger(baseRegister) || baseRegister < 0 || baseRegister > MAX_REGISTER) {
    throw new FrameError(`Base register ${baseRegister} out of range 0..${MAX_REGISTER}`);
  }
  const maxCount = MAX_REGISTER - baseRegister;
  if (!Number.isInteger(registerCount) || registerCount < 1 || registerCount > maxCount) {
    throw new FrameError(
      `Register count ${registerCount} out of range 1..${maxCount} for base ${baseRegister}`
    );
  }
  return { functionCode, baseRegister, registerCount };
}

/** CRC over fc | base | count only; adapter, padding and slave are not covered. */
export function requestCrc(request: ReadRequest): number {
  const block = Buffer.alloc(5);
  block[0] = request.functionCode;
  block.writeUInt16BE(request.baseRegister, 1);
  block.writeUInt16BE(request.registerCount, 3);
  return crc16(block);
}

/** Construct the 8-byte frame header for a payload of the given size. */
export function encodeHeader(payloadLength: number): Buffer {
  const header = Buffer.alloc(HEADER_SIZE);
  header.writeUInt16BE(TRANSACTION_ID, 0);
  header.writeUInt16BE(PROTOCOL_ID, 2);
  header.writeUInt16BE(payloadLength + HEADER_LENGTH_ADJUST, 4);
  header[6] = UNIT_ID;
  header[7] = FUNCTION_ID;
  return header;
}

/** Encode a read request as a complete wire frame. */
export function encodeRequest(request: ReadRequest): Buffer {
  const payload = Buffer.alloc(SERIAL_SIZE + 8 + 1 + 1 + 2 + 2 + 2);
  let offset = payload.write(ADAPTER_SERIAL, 0, SERIAL_SIZE, "ascii");
  offset = payload.writeBigUInt64BE(PADDING, offset);
  offset = payload.writeUInt8(SLAVE_ADDRESS, offset);
  offset = payload.writeUInt8(request.functionCode, offset);
  offset = payload.writeUInt16BE(request.baseRegister, offset);
  offset = payload.writeUInt16BE(request.registerCount, offset);
  payload.writeUInt16BE(requestCrc(request), offset);

  return Buffer.concat([encodeHeader(payload.length), payload]);
}

// ---------- Response decoding ----------

/** Unpack the fixed 8-byte header. */
export function decodeHeader(data: Uint8Array): FrameHeader {
  if (data.length < HEADER_SIZE) {
    throw new FrameError(
      `Frame header needs ${HEADER_SIZE} bytes, got ${data.length}`
    );
  }
  const buf = Buffer.from(data.buffer, data.byteOffset, HEADER_SIZE);
  return {
    transactionId: buf.readUInt16BE(0),
    protocolId: buf.readUInt16BE(2),
    length: buf.readUInt16BE(4),
    unitId: buf[6],
    functionId: buf[7],
  };
}

/** Sequential big-endian reader that reports truncation as a FrameError. */
class PayloadReader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  private take(size: number, field: string): number {
    if (this.offset + size > this.buf.length) {
      throw new FrameError(
        `Payload truncated reading ${field}: need ${this.offset + size} bytes, got ${this.buf.length}`
      );
    }
    const at = this.offset;
    this.offset += size;
    return at;
  }

  ascii(size: number, field: string): string {
    const at = this.take(size, field);
    return this.buf.toString("latin1", at, at + size);
  }

  u8(field: string): number {
    return this.buf[this.take(1, field)];
  }

  u16(field: string): number {
    return this.buf.readUInt16BE(this.take(2, field));
  }

  u64(field: string): bigint {
    return this.buf.readBigUInt64BE(this.take(8, field));
  }
}

/**
 * Decode a response payload (the bytes following the header).
 *
 * An error response has the function code's high bit set and carries no
 * register data; the trailing checksum is consumed either way.
 */
export function decodePayload(data: Uint8Array): ResponsePayload {
  if (data.length < RESPONSE_PREFIX_SIZE) {
    throw new FrameError(
      `Payload needs at least ${RESPONSE_PREFIX_SIZE} bytes, got ${data.length}`
    );
  }
  const reader = new PayloadReader(
    Buffer.from(data.buffer, data.byteOffset, data.byteLength)
  );

  const adapterSerial = reader.ascii(SERIAL_SIZE, "adapter serial");
  const padding = reader.u64("padding");
  const slaveAddress = reader.u8("slave address");
  let functionCode = reader.u8("function code");
  const error = functionCode >= ERROR_FLAG;
  if (error) {
    functionCode &= 0x7f;
  }

  const inverterSerial = reader.ascii(SERIAL_SIZE, "inverter serial");
  const baseRegister = reader.u16("base register");
  const registerCount = reader.u16("register count");

  const values: number[] = [];
  if (!error) {
    for (let i = 0; i < registerCount; i++) {
      values.push(reader.u16(`register ${baseRegister + i}`));
    }
  }

  const checksum = reader.u16("checksum");

  return {
    adapterSerial,
    padding,
    slaveAddress,
    functionCode,
    error,
    inverterSerial,
    baseRegister,
    registerCount,
    registers: new RegisterBlock(baseRegister, values),
    checksum,
  };
}
