/**
 * Register definition tables.
 *
 * Each address of the holding and input register spaces maps to exactly one
 * definition, tagged by its encoding. The tables are read from the JSON files
 * under `data/`, validated, and frozen on first use.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { DecodeError } from "./errors.js";

// ---------- Enums ----------

/** Divisor applied to the raw value. */
export const Scale = {
  UNIT: 1,
  DECI: 10,
  CENTI: 100,
  MILLI: 1000,
} as const;

export const Unit = {
  SCALAR: "",
  ENERGY_KWH: "kwh",
  POWER_W: "w",
  POWER_KW: "kw",
  POWER_VA: "va",
  FREQUENCY_HZ: "hz",
  VOLTAGE_V: "volts",
  CURRENT_A: "amps",
  TEMPERATURE_C: "temp_c",
  CHARGE_AH: "ah",
  TIME_S: "sec",
  TIME_M: "min",
} as const;

export type UnitValue = (typeof Unit)[keyof typeof Unit];

export type PrometheusKind = "gauge" | "counter";

// ---------- Schema ----------

const scaleSchema = z.union([
  z.literal(Scale.UNIT),
  z.literal(Scale.DECI),
  z.literal(Scale.CENTI),
  z.literal(Scale.MILLI),
]);

const unitSchema = z.enum([
  Unit.SCALAR,
  Unit.ENERGY_KWH,
  Unit.POWER_W,
  Unit.POWER_KW,
  Unit.POWER_VA,
  Unit.FREQUENCY_HZ,
  Unit.VOLTAGE_V,
  Unit.CURRENT_A,
  Unit.TEMPERATURE_C,
  Unit.CHARGE_AH,
  Unit.TIME_S,
  Unit.TIME_M,
]);

const addressSchema = z.number().int().min(0).max(0xffff);

const primaryFields = {
  address: addressSchema,
  name: z.string().min(1),
  unit: unitSchema.default(Unit.SCALAR),
  writable: z.boolean().default(false),
  prometheus: z.enum(["gauge", "counter"]).default("gauge"),
};

const scaledFields = {
  ...primaryFields,
  scale: scaleSchema.default(Scale.UNIT),
};

const definitionSchema = z.discriminatedUnion("encoding", [
  z.object({ address: addressSchema, encoding: z.literal("UNKNOWN"), label: z.string() }),
  z.object({ address: addressSchema, encoding: z.literal("CONTINUATION"), of: z.string() }),
  z.object({
    ...primaryFields,
    encoding: z.literal("BOOL"),
    trueValue: z.number().int().min(1).max(0xffff).default(1),
  }),
  z.object({ ...primaryFields, encoding: z.literal("BITFIELD") }),
  z.object({ ...primaryFields, encoding: z.literal("HEX") }),
  z.object({ ...scaledFields, encoding: z.literal("UINT8") }),
  z.object({ ...scaledFields, encoding: z.literal("UINT16") }),
  z.object({ ...scaledFields, encoding: z.literal("INT16") }),
  z.object({ ...scaledFields, encoding: z.literal("UINT32_HIGH"), companion: addressSchema }),
  z.object({ ...scaledFields, encoding: z.literal("UINT32_LOW") }),
  z.object({ ...primaryFields, encoding: z.literal("DUINT8"), secondaryName: z.string().min(1) }),
  z.object({ ...primaryFields, encoding: z.literal("ASCII"), companions: z.array(addressSchema) }),
  z.object({ ...primaryFields, encoding: z.literal("TIME") }),
  z.object({ ...primaryFields, encoding: z.literal("POWER_FACTOR") }),
]);

const tableSchema = z.array(definitionSchema);

/** A register definition as written in the data files, before defaults. */
export type RegisterDefinitionInput = z.input<typeof definitionSchema>;

export type RegisterDefinition = Readonly<z.output<typeof definitionSchema>>;

export type Encoding = RegisterDefinition["encoding"];

/** Definitions that produce metrics. */
export type PrimaryDefinition = Exclude<
  RegisterDefinition,
  { encoding: "UNKNOWN" } | { encoding: "CONTINUATION" }
>;

export function isPrimary(definition: RegisterDefinition): definition is PrimaryDefinition {
  return definition.encoding !== "UNKNOWN" && definition.encoding !== "CONTINUATION";
}

// ---------- Table ----------

export type RegisterSpace = "holding" | "input";

function unknownRegister(space: RegisterSpace, address: number): RegisterDefinition {
  const definition: RegisterDefinition = {
    address,
    encoding: "UNKNOWN",
    label: `${space}_reg${String(address).padStart(3, "0")}`,
  };
  return Object.freeze(definition);
}

export class RegisterTable {
  public readonly space: RegisterSpace;
  private readonly definitions: readonly RegisterDefinition[];

  private constructor(space: RegisterSpace, definitions: RegisterDefinition[]) {
    this.space = space;
    this.definitions = Object.freeze(definitions);
  }

  /**
   * Validate raw entries and build a table covering 0..highest address.
   * Addresses missing from the input become UNKNOWN entries.
   */
  static fromEntries(space: RegisterSpace, entries: unknown): RegisterTable {
    const parsed = tableSchema.parse(entries);

    const byAddress = new Map<number, RegisterDefinition>();
    for (const definition of parsed) {
      if (byAddress.has(definition.address)) {
        throw new Error(`Duplicate ${space} register definition for address ${definition.address}`);
      }
      byAddress.set(definition.address, Object.freeze(definition));
    }

    const maxAddress = Math.max(-1, ...byAddress.keys());
    const definitions: RegisterDefinition[] = [];
    for (let address = 0; address <= maxAddress; address++) {
      definitions.push(byAddress.get(address) ?? unknownRegister(space, address));
    }
    return new RegisterTable(space, definitions);
  }

  /** Load and validate a table from a JSON file. */
  static load(space: RegisterSpace, file: URL | string): RegisterTable {
    const entries: unknown = JSON.parse(readFileSync(file, "utf-8"));
    return RegisterTable.fromEntries(space, entries);
  }

  get maxAddress(): number {
    return this.definitions.length - 1;
  }

  get(address: number): RegisterDefinition {
    const definition = this.definitions[address];
    if (!Number.isInteger(address) || definition === undefined) {
      throw new DecodeError(address, `no ${this.space} register definition`);
    }
    return definition;
  }

  *[Symbol.iterator](): IterableIterator<RegisterDefinition> {
    yield* this.definitions;
  }
}

// ---------- Built-in tables ----------

const HOLDING_REGISTERS_FILE = new URL("../data/holding-registers.json", import.meta.url);
const INPUT_REGISTERS_FILE = new URL("../data/input-registers.json", import.meta.url);

let holdingRegisters: RegisterTable | null = null;
let inputRegisters: RegisterTable | null = null;

export function getHoldingRegisters(): RegisterTable {
  holdingRegisters ??= RegisterTable.load("holding", HOLDING_REGISTERS_FILE);
  return holdingRegisters;
}

export function getInputRegisters(): RegisterTable {
  inputRegisters ??= RegisterTable.load("input", INPUT_REGISTERS_FILE);
  return inputRegisters;
}

export interface RegisterTables {
  holding: RegisterTable;
  input: RegisterTable;
}

export function getRegisterTables(): RegisterTables {
  return { holding: getHoldingRegisters(), input: getInputRegisters() };
}
