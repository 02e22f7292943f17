import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Metric } from "../src/converter.js";
import { ConnectionError, DecodeError } from "../src/errors.js";
import { decodePayload } from "../src/frame.js";
import type { ReadRequest, ResponsePayload } from "../src/frame.js";
import type { RegisterReader } from "../src/givenergy.js";
import type { Logger } from "../src/logger.js";
import {
  GivEnergyExporter,
  POLL_PLAN,
  fetchMetrics,
  metricName,
  renderMetrics,
  writeReport,
} from "../src/exporter.js";
import type { PollBlock } from "../src/exporter.js";
import { RegisterTable } from "../src/registers.js";
import type { RegisterTables } from "../src/registers.js";
import { buildResponsePayload, startMockInverter, unusedPort } from "./helpers.js";
import type { MockInverter } from "./helpers.js";

const NOW = new Date("2024-01-02T03:04:05.000Z");

class FakeReader implements RegisterReader {
  public readonly requests: ReadRequest[] = [];

  constructor(private readonly values: (request: ReadRequest) => number[] = () => []) {}

  async transact(request: ReadRequest): Promise<ResponsePayload> {
    this.requests.push(request);
    return decodePayload(
      buildResponsePayload({
        functionCode: request.functionCode,
        baseRegister: request.baseRegister,
        values: this.values(request),
      })
    );
  }
}

function testLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const SMALL_TABLES: RegisterTables = {
  input: RegisterTable.fromEntries("input", [{ address: 0, name: "flag", encoding: "BOOL" }]),
  holding: RegisterTable.fromEntries("holding", [
    { address: 0, name: "mode", encoding: "UINT16", unit: "w" },
  ]),
};

const SMALL_PLAN: PollBlock[] = [
  { space: "input", functionCode: 4, base: 0, count: 1 },
  { space: "holding", functionCode: 3, base: 0, count: 1 },
];

describe("POLL_PLAN", () => {
  it("reads input blocks then holding blocks of 60", () => {
    expect(POLL_PLAN.map((b) => [b.functionCode, b.base, b.count])).toEqual([
      [4, 0, 60],
      [4, 60, 60],
      [4, 180, 60],
      [3, 0, 60],
      [3, 60, 60],
      [3, 120, 60],
    ]);
  });
});

describe("fetchMetrics", () => {
  it("issues the plan's requests in order", async () => {
    const reader = new FakeReader();
    const metrics = await fetchMetrics(reader);

    expect(metrics).toEqual([]);
    expect(reader.requests).toEqual(
      POLL_PLAN.map((b) => ({
        functionCode: b.functionCode,
        baseRegister: b.base,
        registerCount: b.count,
      }))
    );
  });

  it("converts each block with the table of its register space", async () => {
    const reader = new FakeReader(() => [1]);
    const metrics = await fetchMetrics(reader, SMALL_TABLES, undefined, SMALL_PLAN);
    expect(metrics).toEqual([
      { name: "flag", value: 1, unit: "", prometheus: "gauge" },
      { name: "mode", value: 1, unit: "w", prometheus: "gauge" },
    ]);
  });

  it("aborts the cycle on a DecodeError", async () => {
    const reader = new FakeReader(() => [5]);
    await expect(fetchMetrics(reader, SMALL_TABLES, undefined, SMALL_PLAN)).rejects.toThrow(
      DecodeError
    );
    expect(reader.requests).toHaveLength(1);
  });

  it("warns about an error response and carries on", async () => {
    const log = testLogger();
    const reader: RegisterReader = {
      transact: async (request) =>
        decodePayload(
          buildResponsePayload({
            functionCode: request.functionCode,
            baseRegister: request.baseRegister,
            registerCount: request.registerCount,
            values: request.functionCode === 4 ? [] : [7],
            error: request.functionCode === 4,
          })
        ),
    };

    const metrics = await fetchMetrics(reader, SMALL_TABLES, log, SMALL_PLAN);
    expect(metrics).toEqual([{ name: "mode", value: 7, unit: "w", prometheus: "gauge" }]);
    expect(log.warn).toHaveBeenCalledWith(
      "input registers 0..0: inverter returned an error for function 4"
    );
  });
});

describe("metricName", () => {
  it("appends the unit when there is one", () => {
    expect(metricName({ name: "pv1", value: 1, unit: "volts", prometheus: "gauge" })).toBe(
      "givenergy_pv1_volts"
    );
    expect(metricName({ name: "battery_level", value: 1, unit: "", prometheus: "gauge" })).toBe(
      "givenergy_battery_level"
    );
  });
});

describe("renderMetrics", () => {
  it("writes sorted exposition text with strings as comments", () => {
    const metrics: Metric[] = [
      { name: "pv1", value: 230.5, unit: "volts", prometheus: "gauge" },
      { name: "battery_serial_number", value: "AB12", unit: "", prometheus: "gauge" },
      { name: "pv_total", value: 10, unit: "kwh", prometheus: "counter" },
    ];
    expect(renderMetrics(metrics, NOW)).toBe(
      [
        "# givenergy-exporter report 2024-01-02T03:04:05.000Z",
        "# COMMENT givenergy_battery_serial_number AB12",
        "# TYPE givenergy_pv1_volts gauge",
        "givenergy_pv1_volts 230.5",
        "# TYPE givenergy_pv_total_kwh counter",
        "givenergy_pv_total_kwh 10",
        "",
      ].join("\n")
    );
  });

  it("writes only the timestamp line for no metrics", () => {
    expect(renderMetrics([], NOW)).toBe("# givenergy-exporter report 2024-01-02T03:04:05.000Z\n");
  });
});

describe("report files", () => {
  let dir: string;
  let inverter: MockInverter | null = null;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "givenergy-"));
  });

  afterEach(async () => {
    await inverter?.close();
    inverter = null;
    await rm(dir, { recursive: true, force: true });
  });

  it("replaces the report through a temporary file", async () => {
    const file = join(dir, "givenergy.prom");
    await writeFile(file, "old\n");

    await writeReport(file, "new\n");
    expect(await readFile(file, "utf-8")).toBe("new\n");
    expect(await readdir(dir)).toEqual(["givenergy.prom"]);
  });

  it("polls a mock inverter and writes the report", async () => {
    inverter = await startMockInverter({ value: () => 0 });
    const file = join(dir, "givenergy.prom");
    const exporter = new GivEnergyExporter("127.0.0.1", { port: inverter.port, promFile: file });

    const metrics = await exporter.report(NOW);

    expect(inverter.requests).toHaveLength(POLL_PLAN.length);
    const lines = (await readFile(file, "utf-8")).split("\n");
    expect(lines[0]).toBe("# givenergy-exporter report 2024-01-02T03:04:05.000Z");
    expect(lines).toContain("# TYPE givenergy_pv1_volts gauge");
    expect(lines).toContain("givenergy_pv1_volts 0");
    expect(lines).toContain("givenergy_power_factor -1");
    expect(metrics.some((m) => m.name === "battery_discharge_total")).toBe(true);
  });

  it("keeps the previous report when the cycle fails", async () => {
    const file = join(dir, "givenergy.prom");
    await writeFile(file, "previous\n");
    const exporter = new GivEnergyExporter("127.0.0.1", {
      port: await unusedPort(),
      promFile: file,
    });

    await expect(exporter.report(NOW)).rejects.toThrow(ConnectionError);
    expect(await readFile(file, "utf-8")).toBe("previous\n");
    expect(await readdir(dir)).toEqual(["givenergy.prom"]);
  });

  it("logs error blocks through the injected logger", async () => {
    inverter = await startMockInverter({ value: () => 0, errorFrom: 180 });
    const log = testLogger();
    const file = join(dir, "givenergy.prom");
    const exporter = new GivEnergyExporter("127.0.0.1", {
      port: inverter.port,
      promFile: file,
      logger: log,
    });

    const metrics = await exporter.report(NOW);
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(
      "input registers 180..239: inverter returned an error for function 4"
    );
    expect(metrics.some((m) => m.name === "battery_discharge_total")).toBe(false);
  });
});
