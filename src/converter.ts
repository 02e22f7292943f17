/**
 * Register to metric conversion.
 *
 * Walks a decoded register block and turns each primary register into typed,
 * unit-scaled metrics according to its definition. Any value that does not
 * fit its definition raises a DecodeError, which aborts the poll.
 */

import { DecodeError } from "./errors.js";
import type { RegisterBlock, ResponsePayload } from "./frame.js";
import { isPrimary } from "./registers.js";
import type {
  PrimaryDefinition,
  PrometheusKind,
  RegisterDefinition,
  RegisterTable,
  UnitValue,
} from "./registers.js";

export interface Metric {
  readonly name: string;
  readonly value: number | string;
  readonly unit: UnitValue;
  readonly prometheus: PrometheusKind;
}

// ---------- Helpers ----------

/** Calculate 2s complement */
export function twosComplement(val: number, numBits: number): number {
  if (val < 0) {
    val = (1 << numBits) + val;
  } else {
    if (val & (1 << (numBits - 1))) {
      val = val - (1 << numBits);
    }
  }
  return val;
}

function metric(definition: PrimaryDefinition, name: string, value: number | string): Metric {
  return { name, value, unit: definition.unit, prometheus: definition.prometheus };
}

/** Look up a companion and check that it is marked as a continuation. */
function companionValue(
  table: RegisterTable,
  definition: PrimaryDefinition,
  companion: number,
  store: RegisterBlock
): number {
  const continuation: RegisterDefinition = table.get(companion);
  if (continuation.encoding !== "CONTINUATION") {
    throw new DecodeError(
      definition.address,
      `companion ${companion} of "${definition.name}" is not a continuation register`
    );
  }
  return store.get(companion);
}

function decodeAscii(address: number, value: number): string {
  const high = value >> 8;
  const low = value & 0xff;
  if (high > 0x7f || low > 0x7f) {
    throw new DecodeError(
      address,
      `value 0x${value.toString(16).padStart(4, "0")} is not ASCII`
    );
  }
  return String.fromCharCode(high, low);
}

// ---------- Conversion ----------

/**
 * Convert the register at `address` into zero, one or two metrics.
 *
 * Unknown and continuation registers produce nothing; DUINT8 registers
 * produce one metric per byte.
 */
export function convertRegister(
  table: RegisterTable,
  address: number,
  store: RegisterBlock
): Metric[] {
  const definition = table.get(address);
  if (!isPrimary(definition)) {
    return [];
  }

  const v = store.get(address);
  const { name } = definition;

  switch (definition.encoding) {
    case "BOOL":
      if (v !== 0 && v !== definition.trueValue) {
        throw new DecodeError(address, `BOOL value ${v} unexpected for "${name}"`);
      }
      return [metric(definition, name, v === definition.trueValue ? 1 : 0)];

    case "BITFIELD":
      return [metric(definition, name, v)];

    case "HEX":
      return [metric(definition, name, v.toString(16).padStart(4, "0"))];

    case "UINT8":
    case "UINT16":
      return [metric(definition, name, v / definition.scale)];

    case "INT16":
      return [metric(definition, name, twosComplement(v, 16) / definition.scale)];

    case "UINT32_HIGH": {
      if (definition.companion !== address + 1) {
        throw new DecodeError(
          address,
          `UINT32_HIGH companion ${definition.companion} is not ${address + 1} for "${name}"`
        );
      }
      const low = companionValue(table, definition, definition.companion, store);
      return [metric(definition, name, (v * 0x10000 + low) / definition.scale)];
    }

    case "UINT32_LOW":
      throw new DecodeError(address, `UINT32_LOW defined as a primary register for "${name}"`);

    case "DUINT8":
      return [
        metric(definition, name, v >> 8),
        metric(definition, definition.secondaryName, v & 0xff),
      ];

    case "ASCII": {
      let text = decodeAscii(address, v);
      for (const companion of definition.companions) {
        text += decodeAscii(companion, companionValue(table, definition, companion, store));
      }
      return [metric(definition, name, text)];
    }

    case "TIME":
      // BCD packed (430 = 04:30); reported raw until confirmed against a device.
      return [metric(definition, name, v)];

    case "POWER_FACTOR":
      return [metric(definition, name, (v - 10_000) / 10_000)];

    default: {
      const unsupported: never = definition;
      throw new DecodeError(address, `encoding of ${JSON.stringify(unsupported)} unsupported`);
    }
  }
}

/**
 * Convert every register of a response, in address order.
 *
 * An error response carries no registers and yields no metrics.
 */
export function convertBlock(table: RegisterTable, response: ResponsePayload): Metric[] {
  if (response.error) {
    return [];
  }
  const metrics: Metric[] = [];
  const end = response.baseRegister + response.registerCount;
  for (let address = response.baseRegister; address < end; address++) {
    metrics.push(...convertRegister(table, address, response.registers));
  }
  return metrics;
}

/** Stable sort by name, in code point order. */
export function sortMetrics(metrics: readonly Metric[]): Metric[] {
  return [...metrics].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
