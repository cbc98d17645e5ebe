import { spawn } from "node:child_process";
import { StringDecoder } from "node:string_decoder";
import type {
  BrokerExecuteRequest,
  CommandPolicyDecision,
  ExecutionResult,
  OutputStream,
} from "@shared/terminal";
import { evaluateCommandPolicy } from "./policy";
import { kubectlAdapter } from "./adapters/kubectl";
import { createLogger } from "../lib/logger";

const log = createLogger("executor");

export const DEFAULT_MAX_OUTPUT_BYTES = 10 * 1024;
export const TRUNCATION_MARKER = "\n...[TRUNCATED]";
const DEFAULT_TIMEOUT_MS = 10 * 60_000;
const INTERRUPT_EXIT_CODE = 130;
const TIMEOUT_EXIT_CODE = 124;

export class ExecutionError extends Error {
  code: "COMMAND_BLOCKED" | "COMMAND_FAILED" | "COMMAND_CANCELLED";
  // Commands are never retried automatically
  readonly retryable = false;
  policyDecision?: CommandPolicyDecision;

  constructor(code: ExecutionError["code"], message: string, policyDecision?: CommandPolicyDecision) {
    super(message);
    this.name = "ExecutionError";
    this.code = code;
    this.policyDecision = policyDecision;
  }
}

/**
 * The part of a child process the broker relies on. Node's ChildProcess
 * satisfies it; tests supply an in-process fake.
 */
export interface SpawnedProcess {
  stdout: NodeJS.ReadableStream | null;
  stderr: NodeJS.ReadableStream | null;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (executable: string, args: string[]) => SpawnedProcess;

const defaultSpawn: SpawnFn = (executable, args) =>
  spawn(executable, args, {
    stdio: ["ignore", "pipe", "pipe"],
    env: process.env,
  });

export function redactSensitiveOutput(output: string): string {
  return output
    .replace(/(api[_-]?key\s*[:=]\s*)([^\s]+)/gi, "$1[REDACTED]")
    .replace(/(token\s*[:=]\s*)([^\s]+)/gi, "$1[REDACTED]")
    .replace(/(password\s*[:=]\s*)([^\s]+)/gi, "$1[REDACTED]")
    .replace(/(secret\s*[:=]\s*)([^\s]+)/gi, "$1[REDACTED]");
}

/**
 * Keeps at most `maxBytes` of a stream; everything past that is only shown,
 * never retained.
 */
class OutputCapture {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer): void {
    let room = this.maxBytes - this.size;
    if (chunk.length > room) {
      this.truncated = true;
      // Never keep half of a multi-byte character
      while (room > 0 && (chunk[room] & 0xc0) === 0x80) room -= 1;
      if (room > 0) {
        this.chunks.push(chunk.subarray(0, room));
        this.size += room;
      }
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  text(): string {
    const content = redactSensitiveOutput(Buffer.concat(this.chunks).toString("utf8"));
    return this.truncated ? content + TRUNCATION_MARKER : content;
  }
}

function toBuffer(chunk: string | Buffer): Buffer {
  return typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
}

function spawnFailureMessage(error: Error, executable: string): string {
  if ("code" in error && error.code === "ENOENT") {
    return `${executable} was not found. Install kubectl or set KUBEWARD_KUBECTL to its path.`;
  }
  return `Failed to execute command: ${error.message}`;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  onOutput?: (stream: OutputStream, text: string) => void;
}

export interface CommandBrokerOptions {
  spawn?: SpawnFn;
  kubectlBinary?: string;
  timeoutMs?: number;
  maxOutputBytes?: number;
  now?: () => number;
}

export class CommandBroker {
  private readonly spawnProcess: SpawnFn;
  private readonly kubectlBinary: string;
  private readonly timeoutMs: number;
  private readonly maxOutputBytes: number;
  private readonly now: () => number;

  constructor(options: CommandBrokerOptions = {}) {
    this.spawnProcess = options.spawn || defaultSpawn;
    this.kubectlBinary = options.kubectlBinary || "kubectl";
    this.timeoutMs = options.timeoutMs || DEFAULT_TIMEOUT_MS;
    this.maxOutputBytes = options.maxOutputBytes || DEFAULT_MAX_OUTPUT_BYTES;
    this.now = options.now || Date.now;
  }

  async execute(request: BrokerExecuteRequest, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const { decision, tokens } = evaluateCommandPolicy(request.command, {
      sessionContext: request.clusterContext,
    });

    if (!decision.allowed) {
      throw new ExecutionError(
        "COMMAND_BLOCKED",
        decision.reason || "Command blocked by policy",
        decision,
      );
    }

    if (options.signal?.aborted) {
      throw new ExecutionError("COMMAND_CANCELLED", "Command cancelled before it started", decision);
    }

    const { executable, args } = kubectlAdapter.build(tokens, {
      clusterContext: request.clusterContext,
      executable: this.kubectlBinary,
    });
    const timeoutMs = request.timeoutMs || this.timeoutMs;
    const stdout = new OutputCapture(request.maxOutputBytes || this.maxOutputBytes);
    const stderr = new OutputCapture(request.maxOutputBytes || this.maxOutputBytes);
    const startedAt = this.now();

    log.debug(`spawning ${executable} ${args.join(" ")}`);

    return new Promise<ExecutionResult>((resolve, reject) => {
      const child = this.spawnProcess(executable, args);
      let interrupted = false;
      let timedOut = false;
      let settled = false;

      const onAbort = () => {
        interrupted = true;
        child.kill("SIGINT");
      };
      options.signal?.addEventListener("abort", onAbort, { once: true });

      const timeout = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, timeoutMs);

      const cleanup = () => {
        settled = true;
        clearTimeout(timeout);
        options.signal?.removeEventListener("abort", onAbort);
      };

      const decoders: Record<OutputStream, StringDecoder> = {
        stdout: new StringDecoder("utf8"),
        stderr: new StringDecoder("utf8"),
      };
      const forward = (stream: OutputStream, text: string) => {
        if (text) options.onOutput?.(stream, text);
      };
      const capture = (stream: OutputStream, target: OutputCapture) => (chunk: string | Buffer) => {
        const buffer = toBuffer(chunk);
        target.push(buffer);
        forward(stream, decoders[stream].write(buffer));
      };
      child.stdout?.on("data", capture("stdout", stdout));
      child.stderr?.on("data", capture("stderr", stderr));

      child.on("error", (error) => {
        if (settled) return;
        cleanup();
        log.warn(`spawn failed for ${executable}: ${error.message}`);
        reject(new ExecutionError("COMMAND_FAILED", spawnFailureMessage(error, executable), decision));
      });

      child.on("close", (code) => {
        if (settled) return;
        cleanup();
        forward("stdout", decoders.stdout.end());
        forward("stderr", decoders.stderr.end());

        let exitCode = code ?? 1;
        if (interrupted) exitCode = INTERRUPT_EXIT_CODE;
        else if (timedOut) exitCode = TIMEOUT_EXIT_CODE;

        let stderrText = stderr.text();
        if (timedOut) {
          stderrText += `${stderrText && !stderrText.endsWith("\n") ? "\n" : ""}Command timed out after ${timeoutMs}ms`;
        }

        const durationMs = Math.max(0, this.now() - startedAt);
        log.info(`${request.command} exited with ${exitCode} in ${durationMs}ms`);

        resolve({
          stdout: stdout.text(),
          stderr: stderrText,
          exitCode,
          executedAt: startedAt,
          durationMs,
          interrupted,
          timedOut,
          truncated: stdout.truncated || stderr.truncated,
          policyDecision: decision,
        });
      });
    });
  }
}
