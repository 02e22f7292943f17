/**
 * Prometheus textfile exporter.
 *
 * One report cycle opens a single connection, reads every block of the
 * polling plan in order, converts the registers and writes the exposition
 * text through a temporary file that is renamed over the report. A failure
 * anywhere aborts the cycle and leaves the previous report in place.
 */

import { rename, writeFile } from "node:fs/promises";
import { convertBlock, sortMetrics } from "./converter.js";
import type { Metric } from "./converter.js";
import { FunctionCode, createReadRequest } from "./frame.js";
import type { FunctionCodeValue } from "./frame.js";
import { GivEnergyClient } from "./givenergy.js";
import type { GivEnergyOptions, RegisterReader } from "./givenergy.js";
import type { Logger } from "./logger.js";
import { nullLogger, resolveLogger } from "./logger.js";
import { getRegisterTables } from "./registers.js";
import type { RegisterTables } from "./registers.js";

/** Default textfile collector location used by node-exporter on Fedora. */
export const DEFAULT_PROM_FILE = "/var/lib/prometheus/node-exporter/givenergy.prom";

export const METRIC_PREFIX = "givenergy_";

export interface PollBlock {
  readonly space: keyof RegisterTables;
  readonly functionCode: FunctionCodeValue;
  readonly base: number;
  readonly count: number;
}

function block(space: keyof RegisterTables, base: number, count: number): PollBlock {
  const functionCode =
    space === "input" ? FunctionCode.READ_INPUT_REGISTERS : FunctionCode.READ_HOLDING_REGISTERS;
  return { space, functionCode, base, count };
}

/**
 * Blocks read on every cycle. Input 120..179 and holding 180..201 are not
 * polled.
 */
export const POLL_PLAN: readonly PollBlock[] = Object.freeze([
  block("input", 0, 60),
  block("input", 60, 60),
  block("input", 180, 60),
  block("holding", 0, 60),
  block("holding", 60, 60),
  block("holding", 120, 60),
]);

// ---------- Fetch ----------

/**
 * Read and convert every block of the plan, strictly one after another.
 */
export async function fetchMetrics(
  reader: RegisterReader,
  tables: RegisterTables = getRegisterTables(),
  log: Logger = nullLogger,
  plan: readonly PollBlock[] = POLL_PLAN
): Promise<Metric[]> {
  const metrics: Metric[] = [];
  for (const { space, functionCode, base, count } of plan) {
    const response = await reader.transact(createReadRequest(functionCode, base, count));
    if (response.error) {
      log.warn(
        `${space} registers ${base}..${base + count - 1}: inverter returned an error for function ${response.functionCode}`
      );
    }
    metrics.push(...convertBlock(tables[space], response));
  }
  return metrics;
}

// ---------- Rendering ----------

export function metricName(metric: Metric): string {
  return metric.unit === ""
    ? `${METRIC_PREFIX}${metric.name}`
    : `${METRIC_PREFIX}${metric.name}_${metric.unit}`;
}

/**
 * Render metrics in the Prometheus exposition format. Non-numeric values
 * are written as comments.
 */
export function renderMetrics(metrics: readonly Metric[], now: Date = new Date()): string {
  const lines: string[] = [`# givenergy-exporter report ${now.toISOString()}`];
  for (const metric of sortMetrics(metrics)) {
    const name = metricName(metric);
    if (typeof metric.value === "number") {
      lines.push(`# TYPE ${name} ${metric.prometheus}`);
      lines.push(`${name} ${metric.value}`);
    } else {
      lines.push(`# COMMENT ${name} ${metric.value}`);
    }
  }
  return lines.join("\n") + "\n";
}

/** Write `<file>.tmp` and rename it over `file`. */
export async function writeReport(file: string, content: string): Promise<void> {
  const tmpFile = `${file}.tmp`;
  await writeFile(tmpFile, content, "utf-8");
  await rename(tmpFile, file);
}

// ---------- Exporter ----------

export interface ExporterOptions extends GivEnergyOptions {
  /** Report file. Default: /var/lib/prometheus/node-exporter/givenergy.prom */
  promFile?: string;
  /** Register tables. Default: the built-in holding and input tables */
  tables?: RegisterTables;
}

export class GivEnergyExporter {
  public readonly host: string;
  public readonly promFile: string;

  private readonly options: GivEnergyOptions;
  private readonly tables: RegisterTables | undefined;
  private readonly log: Logger;

  constructor(host: string, options: ExporterOptions = {}) {
    const { promFile, tables, ...clientOptions } = options;
    this.host = host;
    this.promFile = promFile ?? DEFAULT_PROM_FILE;
    this.tables = tables;
    this.log = resolveLogger(options);
    this.options = { ...clientOptions, logger: this.log };
  }

  /** Poll the inverter once over a fresh connection. */
  async fetchMetrics(): Promise<Metric[]> {
    const client = new GivEnergyClient(this.host, this.options);
    await client.connect();
    try {
      return await fetchMetrics(client, this.tables ?? getRegisterTables(), this.log);
    } finally {
      await client.disconnect();
    }
  }

  /** Run one full cycle and replace the report file. */
  async report(now: Date = new Date()): Promise<Metric[]> {
    const metrics = await this.fetchMetrics();
    this.log.debug(`report: ${metrics.length} metrics to ${this.promFile}`);
    await writeReport(this.promFile, renderMetrics(metrics, now));
    return metrics;
  }
}
