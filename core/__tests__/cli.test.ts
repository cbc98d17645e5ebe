import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { NewAuditEntry } from "@shared/audit";
import { EXIT_CONFIG, EXIT_FAULT, EXIT_OK, USAGE, historyFilter, main, readVersion } from "../cli";
import { AuditLog, formatAuditTable } from "../services/auditLog";

const DAY_MS = 24 * 60 * 60 * 1000;

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: { write: (chunk: string) => out.push(chunk) },
      stderr: { write: (chunk: string) => err.push(chunk) },
    },
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

function entry(finalCommand: string, timestamp: number, environmentName = "prod-us"): NewAuditEntry {
  return {
    timestamp,
    userId: "ops",
    naturalLanguageInput: finalCommand,
    finalCommand,
    originalCommand: null,
    confidence: null,
    riskLevel: "LOW",
    environmentName,
    cluster: "us-1",
    namespace: null,
    exitCode: 0,
    stdout: "",
    stderr: "",
    durationMs: 10,
    userAction: "EXECUTED",
  };
}

describe("main", () => {
  let home: string;
  let env: Record<string, string>;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "kubeward-cli-"));
    env = { KUBEWARD_HOME: home, KUBECONFIG: path.join(home, "missing-kubeconfig") };
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  function seed(...entries: NewAuditEntry[]): void {
    const auditLog = AuditLog.open(path.join(home, "audit.db"));
    for (const item of entries) auditLog.record(item);
    auditLog.close();
  }

  it("prints usage", async () => {
    const run = capture();
    await expect(main(["--help"], env, run.io)).resolves.toBe(EXIT_OK);
    expect(run.stdout()).toBe(USAGE);
  });

  it("prints the package version", async () => {
    const run = capture();
    await expect(main(["-v"], env, run.io)).resolves.toBe(EXIT_OK);
    expect(run.stdout()).toBe(`${readVersion()}\n`);
    expect(readVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });

  it("rejects unknown commands with usage", async () => {
    const run = capture();
    await expect(main(["frobnicate"], env, run.io)).resolves.toBe(EXIT_CONFIG);
    expect(run.stderr()).toBe(`kubeward: Unknown command "frobnicate"\n${USAGE}`);
  });

  it("rejects unknown flags", async () => {
    const run = capture();
    await expect(main(["--bogus"], env, run.io)).resolves.toBe(EXIT_CONFIG);
    expect(run.stderr().endsWith(USAGE)).toBe(true);
  });

  it("exits with the configuration code when the kubeconfig is missing", async () => {
    const run = capture();
    await expect(main([], env, run.io)).resolves.toBe(EXIT_CONFIG);
    expect(run.stderr().startsWith("kubeward: ")).toBe(true);
    expect(run.stdout()).toBe("");
  });

  describe("history", () => {
    it("reports an empty log", async () => {
      const run = capture();
      await expect(main(["history"], env, run.io)).resolves.toBe(EXIT_OK);
      expect(run.stdout()).toBe("No commands found.\n");
    });

    it("prints recent entries as a table and says when there are more", async () => {
      const now = Date.now();
      seed(
        entry("kubectl get ns", now - 3000),
        entry("kubectl get pods", now - 2000),
        entry("kubectl get svc", now - 1000),
      );

      const run = capture();
      await expect(main(["history", "--days", "1", "--limit", "2"], env, run.io)).resolves.toBe(EXIT_OK);

      const reader = AuditLog.open(path.join(home, "audit.db"));
      const expected = reader.query({ kind: "range", since: now - DAY_MS }, { limit: 2 });
      reader.close();

      expect(expected.entries.map((row) => row.finalCommand)).toEqual(["kubectl get svc", "kubectl get pods"]);
      expect(run.stdout()).toBe(
        `${formatAuditTable(expected.entries)}\nShowing the 2 most recent. Raise --limit to see more.\n`,
      );
    });

    it("filters by environment", async () => {
      const now = Date.now();
      seed(entry("kubectl get pods", now - 2000, "staging-eu"), entry("kubectl get svc", now - 1000));

      const run = capture();
      await expect(main(["history", "--env", "staging-eu"], env, run.io)).resolves.toBe(EXIT_OK);
      const rows = run.stdout().trimEnd().split("\n");
      expect(rows).toHaveLength(3);
      expect(rows[2]).toContain("kubectl get pods");
    });

    it("rejects conflicting selectors and bad numbers", async () => {
      const conflicting = capture();
      await expect(main(["history", "--today", "--env", "prod-us"], env, conflicting.io)).resolves.toBe(
        EXIT_CONFIG,
      );
      expect(conflicting.stderr()).toBe(`kubeward: Use only one of --today, --days and --env\n${USAGE}`);

      const badLimit = capture();
      await expect(main(["history", "--limit", "0"], env, badLimit.io)).resolves.toBe(EXIT_CONFIG);
      expect(badLimit.stderr()).toBe(`kubeward: --limit takes a whole number between 1 and 200, got "0"\n${USAGE}`);
    });
  });

  describe("allowlist", () => {
    it("lists an empty allowlist", async () => {
      const run = capture();
      await expect(main(["allowlist"], env, run.io)).resolves.toBe(EXIT_OK);
      expect(run.stdout()).toBe("The allowlist is empty.\n");
    });

    it("lists and removes entries", async () => {
      fs.writeFileSync(path.join(home, "allowlist"), "kubectl delete pod web-1\nkubectl rollout restart deployment/web\n");

      const list = capture();
      await expect(main(["allowlist", "list"], env, list.io)).resolves.toBe(EXIT_OK);
      expect(list.stdout()).toBe("kubectl delete pod web-1\nkubectl rollout restart deployment/web\n");

      const remove = capture();
      await expect(main(["allowlist", "remove", "kubectl", "delete", "pod", "web-1"], env, remove.io)).resolves.toBe(
        EXIT_OK,
      );
      expect(remove.stdout()).toBe("Removed from the allowlist: kubectl delete pod web-1\n");

      const again = capture();
      await expect(main(["allowlist", "remove", "kubectl delete pod web-1"], env, again.io)).resolves.toBe(EXIT_FAULT);
      expect(again.stderr()).toBe("Not on the allowlist: kubectl delete pod web-1\n");
    });

    it("rejects unknown actions", async () => {
      const run = capture();
      await expect(main(["allowlist", "purge"], env, run.io)).resolves.toBe(EXIT_CONFIG);
      expect(run.stderr()).toBe(`kubeward: Unknown allowlist action "purge"\n${USAGE}`);
    });
  });
});

describe("historyFilter", () => {
  const now = new Date(2026, 2, 14, 15, 30).getTime();

  it("defaults to today", () => {
    expect(historyFilter({}, now)).toEqual({ kind: "range", since: new Date(2026, 2, 14).getTime() });
  });

  it("selects by days or environment", () => {
    expect(historyFilter({ days: "3" }, now)).toEqual({ kind: "range", since: now - 3 * DAY_MS });
    expect(historyFilter({ env: "prod-us" }, now)).toEqual({ kind: "environment", name: "prod-us" });
  });

  it("rejects a non-integer day count", () => {
    expect(() => historyFilter({ days: "two" }, now)).toThrow('--days takes a whole number between 1 and 3650, got "two"');
  });
});
