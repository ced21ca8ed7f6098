import { describe, expect, it } from "vitest";
import { deviceToRemotePayload, createDevice } from "../devices/device.js";
import { createFakeArchive, FAKE_API_URL } from "../test-helpers/fake-archive.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { EXIT_FAILED, EXIT_OK, failureOutput, runDeviceModule } from "./run.js";

const args = {
  api_url: FAKE_API_URL,
  name: "workstation23",
  host: "10.0.0.100",
  port: 11112,
  aetitle: "HELLOWORLD",
  state: "present",
};

async function run(
  moduleArgs: Record<string, unknown>,
  opts: { initial?: Record<string, string>; env?: NodeJS.ProcessEnv; argv?: string[] } = {},
) {
  const archive = createFakeArchive(opts.initial);
  const lines: string[] = [];
  const logLines: string[] = [];
  const code = await runDeviceModule({
    argv: opts.argv ?? ["/tmp/args.json"],
    env: opts.env ?? {},
    readFile: async () => JSON.stringify({ ANSIBLE_MODULE_ARGS: moduleArgs }),
    stdout: (line) => lines.push(line),
    fetch: archive.fetch,
    log: createSubsystemLogger("archive_device", {
      level: "debug",
      write: (line) => logLines.push(line),
    }),
  });
  return { code, lines, logLines, archive, output: JSON.parse(lines[0] ?? "null") };
}

describe("runDeviceModule", () => {
  it("creates a device and prints the result", async () => {
    const { code, lines, archive } = await run(args);
    expect(code).toBe(EXIT_OK);
    expect(lines).toEqual(['{"name":"workstation23","state":"present","changed":true}']);
    expect(archive.documents.has("workstation23")).toBe(true);
  });

  it("reports no change for an up-to-date device", async () => {
    const existing = createDevice({
      name: "workstation23",
      host: "10.0.0.100",
      port: 11112,
      aetitle: "HELLOWORLD",
    });
    const { output, archive } = await run(args, {
      initial: { workstation23: deviceToRemotePayload(existing) },
    });
    expect(output).toEqual({ name: "workstation23", state: "present", changed: false });
    expect(archive.requests.map((r) => r.method)).toEqual(["GET"]);
  });

  it("reports no change when deleting an absent device", async () => {
    const { code, output } = await run({ ...args, state: "absent" });
    expect(code).toBe(EXIT_OK);
    expect(output).toEqual({ name: "workstation23", state: "absent", changed: false });
  });

  it("includes alias warnings in the result", async () => {
    const { output, logLines } = await run({ ...args, device: "workstation23" });
    expect(output.warnings).toEqual(["Both option name and its alias device are set."]);
    expect(logLines).toContain(
      "[archive_device] warn Both option name and its alias device are set.",
    );
  });

  it("skips without requests in check mode", async () => {
    const { code, output, archive } = await run({ ...args, _ansible_check_mode: true });
    expect(code).toBe(EXIT_OK);
    expect(output).toEqual({
      changed: false,
      skipped: true,
      msg: "remote module (archive_device) does not support check mode",
    });
    expect(archive.requests).toEqual([]);
  });

  it("reads the api url from the environment", async () => {
    const { api_url: _url, ...rest } = args;
    const { code, archive } = await run(rest, { env: { ARCHIVE_API_URL: FAKE_API_URL } });
    expect(code).toBe(EXIT_OK);
    expect(archive.requests[0]?.url).toBe(`${FAKE_API_URL}devices/workstation23`);
  });

  it("fails on invalid parameters before any request", async () => {
    const { code, output, archive } = await run({ ...args, state: "running" });
    expect(code).toBe(EXIT_FAILED);
    expect(output).toEqual({
      failed: true,
      msg: "value of state must be one of: present, absent, got: running",
    });
    expect(archive.requests).toEqual([]);
  });

  it("fails with the http status when the archive errors", async () => {
    const archive = createFakeArchive();
    archive.failNext("GET", 500, "Internal Server Error");
    const lines: string[] = [];
    const code = await runDeviceModule({
      argv: ["-"],
      env: {},
      readStdin: async () => JSON.stringify(args),
      stdout: (line) => lines.push(line),
      fetch: archive.fetch,
      log: createSubsystemLogger("archive_device", { level: "silent" }),
    });
    expect(code).toBe(EXIT_FAILED);
    expect(JSON.parse(lines[0] ?? "null")).toEqual({
      failed: true,
      msg: "HTTP Error 500: Internal Server Error",
      status: 500,
      url: `${FAKE_API_URL}devices/workstation23`,
    });
  });

  it("fails when the archive returns a malformed device", async () => {
    const { code, output } = await run(args, {
      initial: { workstation23: JSON.stringify({ dicomDeviceName: "workstation23" }) },
    });
    expect(code).toBe(EXIT_FAILED);
    expect(output.failed).toBe(true);
    expect(output.msg).toMatch(/^archive returned an unexpected device document at /);
  });

  it("prints the module description", async () => {
    const { code, output } = await run(args, { argv: ["--describe"] });
    expect(code).toBe(EXIT_OK);
    expect(output.module).toBe("archive_device");
    expect(output.supports_check_mode).toBe(false);
    expect(Object.keys(output.options.properties)).toEqual([
      "api_url",
      "name",
      "host",
      "port",
      "aetitle",
      "state",
    ]);
  });

  it("prints usage without an args source", async () => {
    const { code, output } = await run(args, { argv: [] });
    expect(code).toBe(EXIT_FAILED);
    expect(output).toEqual({
      failed: true,
      msg: "usage: archive-device <args-file | -> | --describe",
    });
  });
});

describe("runDeviceModule verbosity", () => {
  async function runWithDefaultLogger(moduleArgs: Record<string, unknown>) {
    const archive = createFakeArchive();
    const logLines: string[] = [];
    const code = await runDeviceModule({
      argv: ["-"],
      env: {},
      readStdin: async () => JSON.stringify(moduleArgs),
      stdout: () => {},
      fetch: archive.fetch,
      writeLog: (line) => logLines.push(line),
    });
    return { code, logLines };
  }

  it("logs only warnings by default", async () => {
    const { code, logLines } = await runWithDefaultLogger(args);
    expect(code).toBe(EXIT_OK);
    expect(logLines).toEqual([]);
  });

  it("logs requests at debug level with -vvv", async () => {
    const { logLines } = await runWithDefaultLogger({ ...args, _ansible_verbosity: 3 });
    expect(logLines).toEqual([
      `[archive_device/client] debug GET ${FAKE_API_URL}devices/workstation23 -> 404`,
      `[archive_device/client] debug POST ${FAKE_API_URL}devices/workstation23 -> 204`,
      "[archive_device] info created workstation23 (HELLOWORLD@10.0.0.100:11112)",
    ]);
  });
});

describe("failureOutput", () => {
  it("uses the message of plain errors", () => {
    expect(failureOutput(new Error("boom"))).toEqual({ failed: true, msg: "boom" });
  });

  it("stringifies non-errors", () => {
    expect(failureOutput("boom")).toEqual({ failed: true, msg: "boom" });
  });
});
