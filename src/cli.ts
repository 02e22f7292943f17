#!/usr/bin/env node

/**
 * givenergy-exporter CLI – command-line interface for polling GivEnergy
 * inverters and writing a Prometheus textfile report.
 */

import { Command, InvalidArgumentError } from "commander";
import { decode } from "./decoder.js";
import { DEFAULT_PROM_FILE, GivEnergyExporter } from "./exporter.js";
import { DEFAULT_PORT, GivEnergyClient } from "./givenergy.js";
import type { ResponsePayload } from "./frame.js";

const VERSION = "1.0.0";

interface ConnectionFlags {
  port: number;
  debug: boolean;
}

interface ReportFlags extends ConnectionFlags {
  promFile: string;
}

interface ReadFlags extends ConnectionFlags {
  register: number;
  quantity: number;
}

/** Decimal or 0x-prefixed hex integer. */
function parseInteger(value: string): number {
  const parsed = parseInt(value, value.startsWith("0x") ? 16 : 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer`);
  }
  return parsed;
}

function fail(err: unknown): void {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}

const program = new Command();

program
  .name("givenergy-exporter")
  .description("Prometheus exporter for GivEnergy inverter and battery metrics")
  .version(VERSION);

// ---------- report ----------

program
  .command("report")
  .description("Poll the inverter once and write the Prometheus textfile report")
  .argument("<host>", "IP address or hostname of the inverter")
  .option("-p, --port <number>", "TCP port", parseInteger, DEFAULT_PORT)
  .option("-f, --prom-file <path>", "Report file", DEFAULT_PROM_FILE)
  .option("-d, --debug", "Enable debug logging", false)
  .action(async (host: string, opts: ReportFlags) => {
    const exporter = new GivEnergyExporter(host, {
      port: opts.port,
      promFile: opts.promFile,
      verbose: opts.debug,
    });
    try {
      await exporter.report();
    } catch (err) {
      fail(err);
    }
  });

// ---------- read-input / read-holding ----------

function readCommand(
  name: string,
  description: string,
  read: (client: GivEnergyClient, base: number, count: number) => Promise<ResponsePayload>
): void {
  program
    .command(name)
    .description(description)
    .argument("<host>", "IP address or hostname of the inverter")
    .requiredOption("-r, --register <number>", "Start register address", parseInteger)
    .requiredOption("-q, --quantity <number>", "Number of registers to read", parseInteger)
    .option("-p, --port <number>", "TCP port", parseInteger, DEFAULT_PORT)
    .option("-d, --debug", "Enable debug logging", false)
    .action(async (host: string, opts: ReadFlags) => {
      const client = new GivEnergyClient(host, {
        port: opts.port,
        verbose: opts.debug,
      });
      try {
        await client.connect();
        const response = await read(client, opts.register, opts.quantity);
        if (response.error) {
          throw new Error(`Inverter returned an error for function ${response.functionCode}`);
        }
        console.log(JSON.stringify(Object.fromEntries(response.registers.entries())));
      } catch (err) {
        fail(err);
      } finally {
        await client.disconnect();
      }
    });
}

readCommand("read-input", "Read raw input registers (function code 4)", (client, base, count) =>
  client.readInputRegisters(base, count)
);

readCommand(
  "read-holding",
  "Read raw holding registers (function code 3)",
  (client, base, count) => client.readHoldingRegisters(base, count)
);

// ---------- decode ----------

program
  .command("decode")
  .description("Decode a captured GivEnergy frame")
  .argument("<hex...>", "Hex bytes of the frame (e.g. 59 59 00 01 00 1c ...)")
  .action((hexBytes: string[]) => {
    try {
      console.log(decode(hexBytes));
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync();
