/**
 * givenergy-exporter – poll GivEnergy inverters over their TCP Modbus
 * variant and publish the registers as Prometheus metrics.
 */

// Errors
export { FrameError, ConnectionError, DecodeError } from "./errors.js";

// Logging
export { nullLogger, createConsoleLogger, resolveLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

// Frame encoding/decoding
export {
  FunctionCode,
  RegisterBlock,
  crc16,
  requestCrc,
  createReadRequest,
  isReadFunctionCode,
  encodeHeader,
  encodeRequest,
  decodeHeader,
  decodePayload,
} from "./frame.js";
export type {
  FunctionCodeValue,
  ReadRequest,
  FrameHeader,
  ResponsePayload,
} from "./frame.js";

// Transport and client
export { SocketTransport, readExactly } from "./transport.js";
export type { Transport } from "./transport.js";
export { GivEnergyClient, DEFAULT_PORT, transact } from "./givenergy.js";
export type { GivEnergyOptions, RegisterReader } from "./givenergy.js";

// Register definitions and conversion
export {
  RegisterTable,
  Scale,
  Unit,
  isPrimary,
  getHoldingRegisters,
  getInputRegisters,
  getRegisterTables,
} from "./registers.js";
export type {
  RegisterDefinition,
  RegisterDefinitionInput,
  PrimaryDefinition,
  Encoding,
  PrometheusKind,
  RegisterSpace,
  RegisterTables,
  UnitValue,
} from "./registers.js";
export { convertRegister, convertBlock, sortMetrics, twosComplement } from "./converter.js";
export type { Metric } from "./converter.js";

// Exporter
export {
  GivEnergyExporter,
  POLL_PLAN,
  DEFAULT_PROM_FILE,
  fetchMetrics,
  renderMetrics,
  metricName,
  writeReport,
} from "./exporter.js";
export type { ExporterOptions, PollBlock } from "./exporter.js";

// Decoder utilities
export { GivEnergyFrame, decode, hexString } from "./decoder.js";
export type { FrameKind } from "./decoder.js";
