import fs from "node:fs";
import os from "node:os";
import readline from "node:readline";
import { parseArgs } from "node:util";
import type { AuditQueryFilter } from "@shared/audit";
import { CommandBroker } from "./commands/broker";
import {
  assessRisk,
  getDefaultVerbCatalog,
  loadVerbCatalog,
  VerbCatalogError,
  type VerbCatalog,
} from "./commands/riskClassifier";
import { loadConfig, type KubewardConfig } from "./config";
import { createConfiguredProviders } from "./agent/providers";
import { createLogger, setLogFile, setLogLevel } from "./lib/logger";
import { Allowlist, AllowlistError } from "./services/allowlist";
import {
  AuditLog,
  DEFAULT_PAGE_SIZE,
  environmentFilter,
  formatAuditTable,
  lastDaysFilter,
  MAX_PAGE_SIZE,
  todayFilter,
} from "./services/auditLog";
import { ConfirmationEngine } from "./services/confirmation";
import { ConfigurationError, listContexts, resolveEnvironment } from "./services/environment";
import { Translator } from "./services/translator";
import { InteractionLoop } from "../tui/interactionLoop";
import { normalizeKeypress, type ReadlineKey } from "../tui/keys";
import { SessionMachine } from "../tui/sessionMachine";
import { TerminalGuard, withTerminal } from "../tui/terminalGuard";

const log = createLogger("cli");

export const EXIT_OK = 0;
export const EXIT_FAULT = 1;
export const EXIT_CONFIG = 2;

export const USAGE = `Usage:
  kubeward [--context NAME] [--kubeconfig PATH]
  kubeward history [--today | --days N | --env NAME] [--limit N]
  kubeward allowlist [list | remove <command>]
  kubeward --help | --version
`;

export interface CliIo {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function readVersion(): string {
  const raw: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

function parseCount(flag: string, value: string, max: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    throw new UsageError(`--${flag} takes a whole number between 1 and ${max}, got "${value}"`);
  }
  return parsed;
}

interface HistoryFlags {
  today?: boolean;
  days?: string;
  env?: string;
  limit?: string;
}

export function historyFilter(flags: HistoryFlags, now: number = Date.now()): AuditQueryFilter {
  const chosen = [flags.today, flags.days !== undefined, flags.env !== undefined].filter(Boolean).length;
  if (chosen > 1) {
    throw new UsageError("Use only one of --today, --days and --env");
  }
  if (flags.env !== undefined) return environmentFilter(flags.env);
  if (flags.days !== undefined) return lastDaysFilter(parseCount("days", flags.days, 3650), now);
  return todayFilter(now);
}

function runHistory(config: KubewardConfig, flags: HistoryFlags, io: CliIo): number {
  const filter = historyFilter(flags);
  const limit = flags.limit !== undefined ? parseCount("limit", flags.limit, MAX_PAGE_SIZE) : DEFAULT_PAGE_SIZE;

  const auditLog = AuditLog.open(config.auditDbPath, {
    retentionDays: config.auditRetentionDays,
    outputCapBytes: config.outputCapBytes,
  });
  try {
    const page = auditLog.query(filter, { limit });
    io.stdout.write(`${formatAuditTable(page.entries)}\n`);
    if (page.hasMore) {
      io.stdout.write(`Showing the ${page.entries.length} most recent. Raise --limit to see more.\n`);
    }
    return EXIT_OK;
  } finally {
    auditLog.close();
  }
}

function runAllowlist(config: KubewardConfig, args: string[], io: CliIo): number {
  const [action = "list", ...rest] = args;
  const allowlist = Allowlist.load(config.allowlistPath);

  if (action === "list" && rest.length === 0) {
    const entries = allowlist.entries();
    io.stdout.write(entries.length === 0 ? "The allowlist is empty.\n" : `${entries.join("\n")}\n`);
    return EXIT_OK;
  }

  if (action === "remove" && rest.length > 0) {
    const command = rest.join(" ");
    if (!allowlist.remove(command)) {
      io.stderr.write(`Not on the allowlist: ${command}\n`);
      return EXIT_FAULT;
    }
    io.stdout.write(`Removed from the allowlist: ${command}\n`);
    return EXIT_OK;
  }

  throw new UsageError(`Unknown allowlist action "${args.join(" ")}"`);
}

function currentUser(env: NodeJS.ProcessEnv): string {
  try {
    return os.userInfo().username;
  } catch (error) {
    log.debug("os.userInfo() failed, falling back to $USER", error);
    return env.USER || env.USERNAME || "unknown";
  }
}

async function runInteractive(config: KubewardConfig, env: NodeJS.ProcessEnv, io: CliIo): Promise<number> {
  const context = resolveEnvironment({
    kubeconfigPath: config.kubeconfigPath,
    contextOverride: config.contextOverride,
  });

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    io.stderr.write("kubeward needs an interactive terminal. Use `kubeward history` for scripted access.\n");
    return EXIT_FAULT;
  }

  const catalog: VerbCatalog = config.verbCatalogPath
    ? loadVerbCatalog(config.verbCatalogPath)
    : getDefaultVerbCatalog();
  const allowlist = Allowlist.load(config.allowlistPath);
  const auditLog = AuditLog.open(config.auditDbPath, {
    retentionDays: config.auditRetentionDays,
    outputCapBytes: config.outputCapBytes,
  });
  if (!auditLog.available) {
    io.stderr.write(`Warning: ${auditLog.unavailableReason}. Commands will run without an audit trail.\n`);
  }

  const providers = createConfiguredProviders(config);
  const translator = new Translator({
    backends: () => providers.values(),
    timeoutMs: config.translationTimeoutMs,
    catalog,
  });
  const broker = new CommandBroker({
    kubectlBinary: config.kubectlBinary,
    timeoutMs: config.executionTimeoutMs,
    maxOutputBytes: config.outputCapBytes,
  });
  const machine = new SessionMachine({
    assessRisk: (command) => assessRisk(command, catalog),
    gate: new ConfirmationEngine(allowlist),
    confidenceThreshold: config.confidenceThreshold,
  });

  const loop = new InteractionLoop({
    machine,
    context,
    translator,
    broker,
    auditLog,
    allowlist,
    contexts: {
      listContexts: () => listContexts({ kubeconfigPath: config.kubeconfigPath }),
      resolve: (name) => resolveEnvironment({ kubeconfigPath: config.kubeconfigPath, contextOverride: name }),
    },
    userId: currentUser(env),
    screen: process.stdout,
  });

  log.info(`session started on ${context.name} (${context.environmentClass}) with ${providers.size} backends`);

  const onKeypress = (str: string | undefined, key: ReadlineKey | undefined) => {
    loop.enqueueKey(normalizeKeypress(str, key));
  };
  const guard = new TerminalGuard(process.stdin, process.stdout, process, process.stderr);

  readline.emitKeypressEvents(process.stdin);
  process.stdin.on("keypress", onKeypress);
  process.stdin.resume();
  setLogFile(config.logFilePath);
  try {
    await withTerminal(guard, () => loop.run());
  } finally {
    process.stdin.off("keypress", onKeypress);
    process.stdin.pause();
    setLogFile(null);
    auditLog.close();
  }

  log.info("session ended");
  return EXIT_OK;
}

/**
 * Parse arguments and run the requested mode. Resolves to the process exit
 * code instead of exiting, so callers decide when the process ends.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        context: { type: "string" },
        kubeconfig: { type: "string" },
        today: { type: "boolean" },
        days: { type: "string" },
        env: { type: "string" },
        limit: { type: "string" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "v" },
      },
    });

    if (values.help) {
      io.stdout.write(USAGE);
      return EXIT_OK;
    }
    if (values.version) {
      io.stdout.write(`${readVersion()}\n`);
      return EXIT_OK;
    }

    const { config, warnings } = loadConfig(env);
    setLogLevel(config.logLevel);
    for (const warning of warnings) {
      log.warn(warning.message);
    }
    if (values.kubeconfig) config.kubeconfigPath = values.kubeconfig;
    if (values.context) config.contextOverride = values.context;

    const [command, ...rest] = positionals;
    switch (command) {
      case undefined:
        return await runInteractive(config, env, io);
      case "history":
        if (rest.length > 0) throw new UsageError(`Unexpected argument "${rest[0]}"`);
        return runHistory(config, values, io);
      case "allowlist":
        return runAllowlist(config, rest, io);
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr.write(`kubeward: ${error.message}\n${error.remediation}\n`);
      return EXIT_CONFIG;
    }
    if (error instanceof VerbCatalogError) {
      io.stderr.write(`kubeward: ${error.message}\n`);
      return EXIT_CONFIG;
    }
    if (error instanceof UsageError || (error instanceof TypeError && "code" in error)) {
      io.stderr.write(`kubeward: ${error.message}\n${USAGE}`);
      return EXIT_CONFIG;
    }
    if (error instanceof AllowlistError) {
      io.stderr.write(`kubeward: ${error.message}\n`);
      return EXIT_FAULT;
    }
    log.error("unexpected failure", error);
    io.stderr.write(`kubeward: ${error instanceof Error ? error.message : String(error)}\n`);
    return EXIT_FAULT;
  }
}
