import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createLogger,
  formatLogLine,
  getLogLevel,
  isLogLevel,
  redactSecrets,
  setLogFile,
  setLogLevel,
} from "../logger";

describe("logger", () => {
  afterEach(() => {
    setLogFile(null);
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("formats lines with timestamp, level and module", () => {
    const line = formatLogLine(
      "warn",
      "audit-log",
      "entry dropped",
      [{ id: 1 }, new Error("boom")],
      new Date("2026-01-02T03:04:05.000Z"),
    );
    expect(line).toBe('[2026-01-02T03:04:05.000Z] [WARN] [audit-log] entry dropped {"id":1} Error: boom');
  });

  it("redacts provider keys and bearer tokens", () => {
    expect(redactSecrets("key sk-ant-test-secret")).toBe("key [REDACTED:sk-a...]");
    expect(redactSecrets("Bearer placeholder-token-value")).toBe("[REDACTED:Bear...]");
    expect(redactSecrets("nothing to hide")).toBe("nothing to hide");
  });

  it("drops lines below the current level", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setLogLevel("warn");
    const log = createLogger("test");

    log.info("quiet");
    log.warn("loud");

    expect(getLogLevel()).toBe("warn");
    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toMatch(/\[WARN\] \[test\] loud\n$/);
  });

  it("writes to the log file when one is set", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "kubeward-log-"));
    const file = path.join(dir, "nested", "kubeward.log");
    try {
      setLogFile(file);
      setLogLevel("debug");
      createLogger("session").debug("started");

      expect(fs.readFileSync(file, "utf8")).toMatch(/^\[[^\]]+\] \[DEBUG\] \[session\] started\n$/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("recognizes level names only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("constructor")).toBe(false);
  });
});
