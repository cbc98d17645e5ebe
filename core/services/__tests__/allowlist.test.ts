import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Allowlist, AllowlistError } from "../allowlist";

describe("Allowlist", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "kubeward-allowlist-"));
    file = path.join(dir, "nested", "allowlist");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", () => {
    const allowlist = Allowlist.load(file);
    expect(allowlist.entries()).toEqual([]);
    expect(allowlist.isAllowed("kubectl get pods")).toBe(false);
    expect(fs.existsSync(file)).toBe(false);
  });

  it("persists added commands with a header and owner-only permissions", () => {
    const allowlist = Allowlist.load(file);
    allowlist.add("  kubectl rollout restart deployment/web  ");

    expect(fs.readFileSync(file, "utf8")).toBe(
      "# kubeward allowlist: one exact command per line, matched verbatim\n" +
        "kubectl rollout restart deployment/web\n",
    );
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
    expect(Allowlist.load(file).entries()).toEqual(["kubectl rollout restart deployment/web"]);
  });

  it("matches the trimmed command exactly", () => {
    const allowlist = Allowlist.load(file);
    allowlist.add("kubectl delete pod web-1");

    expect(allowlist.isAllowed(" kubectl delete pod web-1 ")).toBe(true);
    expect(allowlist.isAllowed("kubectl delete pod web-2")).toBe(false);
    expect(allowlist.isAllowed("kubectl  delete pod web-1")).toBe(false);
  });

  it("ignores duplicates", () => {
    const allowlist = Allowlist.load(file);
    allowlist.add("kubectl delete pod web-1");
    allowlist.add("kubectl delete pod web-1");
    expect(allowlist.entries()).toEqual(["kubectl delete pod web-1"]);
  });

  it("skips comments and blank lines when loading", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, "# header\n\nkubectl scale deployment/web --replicas=3\r\n  # indented comment\n");
    expect(Allowlist.load(file).entries()).toEqual(["kubectl scale deployment/web --replicas=3"]);
  });

  it("removes entries and reports missing ones", () => {
    const allowlist = Allowlist.load(file);
    allowlist.add("kubectl delete pod web-1");
    allowlist.add("kubectl delete pod web-2");

    expect(allowlist.remove("kubectl delete pod web-1")).toBe(true);
    expect(allowlist.remove("kubectl delete pod web-1")).toBe(false);
    expect(Allowlist.load(file).entries()).toEqual(["kubectl delete pod web-2"]);
  });

  it.each([
    ["   ", "Cannot allowlist an empty command"],
    ["kubectl get pods\nkubectl delete ns prod", "Allowlisted commands must be a single line"],
    ["# kubectl get pods", "Allowlisted commands cannot start with #"],
  ])("rejects %j", (command, message) => {
    const allowlist = Allowlist.load(file);
    expect(() => allowlist.add(command)).toThrow(message);
    expect(allowlist.entries()).toEqual([]);
  });

  it("rolls back when the file cannot be written", () => {
    // A directory where the file should be makes the final rename fail
    const occupied = path.join(dir, "occupied");
    const allowlist = Allowlist.load(occupied);
    fs.mkdirSync(occupied);

    let caught: unknown;
    try {
      allowlist.add("kubectl delete pod web-1");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AllowlistError);
    expect(caught instanceof AllowlistError && caught.code).toBe("ALLOWLIST_WRITE_FAILED");
    expect(allowlist.isAllowed("kubectl delete pod web-1")).toBe(false);
    expect(fs.readdirSync(dir)).toEqual(["occupied"]);
  });
});
