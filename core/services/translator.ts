import type { AgentResponseChunk, TranslationBackend } from "@shared/coordination";
import type { TranslationRequest, TranslationResult } from "@shared/terminal";
import type { EnvironmentContext } from "@shared/environment";
import { evaluateCommandPolicy, normalizeCommand } from "../commands/policy";
import { getDefaultVerbCatalog, type VerbCatalog } from "../commands/riskClassifier";
import { effectiveNamespace } from "./environment";
import { createLogger } from "../lib/logger";

const log = createLogger("translator");

export const MAX_REQUEST_LENGTH = 500;
const DEFAULT_TIMEOUT_MS = 10_000;
const RETRY_DELAY_MS = 250;
const CLARIFICATION_MARKER = "NEEDS_CLARIFICATION";

export class TranslationError extends Error {
  code:
    | "TRANSLATION_INVALID"
    | "TRANSLATION_MALFORMED"
    | "TRANSLATION_UNAVAILABLE"
    | "TRANSLATION_CANCELLED";
  retryable: boolean;
  // What the backend said, shown when its answer is rejected
  rawRationale?: string;

  constructor(
    code: TranslationError["code"],
    message: string,
    retryable: boolean,
    rawRationale?: string,
  ) {
    super(message);
    this.name = "TranslationError";
    this.code = code;
    this.retryable = retryable;
    this.rawRationale = rawRationale;
  }
}

interface TranslationCandidate {
  command: string;
  confidence: unknown;
  rationale: string;
}

type AttemptOutcome =
  | { kind: "text"; text: string }
  | { kind: "error"; code: string; message: string; retryable: boolean }
  | { kind: "aborted" };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pull the JSON object out of a model reply: a fenced block, the whole
 * text, or the outermost braces, in that order.
 */
export function extractJsonCandidate(raw: string): TranslationCandidate | null {
  if (!raw.trim()) return null;

  const candidates: string[] = [];
  const codeBlock = raw.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (codeBlock?.[1]) {
    candidates.push(codeBlock[1].trim());
  }

  candidates.push(raw.trim());

  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start >= 0 && end > start) {
    candidates.push(raw.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    if (!isRecord(parsed) || typeof parsed.command !== "string") {
      continue;
    }
    const rationale =
      typeof parsed.rationale === "string"
        ? parsed.rationale
        : typeof parsed.reasoning === "string"
          ? parsed.reasoning
          : "";
    return {
      command: parsed.command,
      confidence: parsed.confidence,
      rationale: rationale.trim(),
    };
  }

  return null;
}

/**
 * Confidence must be a number (or numeric string) in [0, 100]; anything
 * else marks the whole reply as malformed.
 */
export function parseConfidence(value: unknown): number | null {
  const parsed =
    typeof value === "number" ? value : typeof value === "string" && value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) return null;
  return Math.round(parsed);
}

export function buildSystemPrompt(context: EnvironmentContext, catalog: VerbCatalog): string {
  const namespace = effectiveNamespace(context);
  return [
    "You translate natural-language Kubernetes requests into exactly one kubectl command.",
    "",
    "CURRENT CONTEXT:",
    `- Context: ${context.name}`,
    `- Cluster: ${context.cluster}`,
    `- Namespace: ${namespace}`,
    `- Environment: ${context.environmentClass}`,
    "",
    "SUPPORTED OPERATIONS:",
    catalog.supported.join(", "),
    "",
    "RULES:",
    '1. Reply with STRICT JSON only: {"command":"kubectl <subcommand> <args>","confidence":<0-100>,"rationale":"<short explanation>"}',
    `2. If the request is ambiguous (missing resource name, type or namespace), set confidence below 70 and put "${CLARIFICATION_MARKER}: <question>" in rationale.`,
    `3. Use namespace ${namespace} unless the request names another one.`,
    "4. Never use shell pipes, redirects, command chaining, variable substitution or file paths.",
    "5. Never add --context, --kubeconfig, --cluster or --server; the command runs against the current context.",
    "6. For delete or drain, the resource name must be explicit; otherwise set confidence below 70.",
    "",
    "EXAMPLES:",
    `"show all pods" -> {"command":"kubectl get pods -n ${namespace}","confidence":95,"rationale":"List pods in the current namespace"}`,
    `"show logs" -> {"command":"kubectl logs","confidence":40,"rationale":"${CLARIFICATION_MARKER}: Which pod?"}`,
    `"scale my api to 5" -> {"command":"kubectl scale deployment api --replicas=5 -n ${namespace}","confidence":75,"rationale":"Assuming api is a deployment"}`,
  ].join("\n");
}

export function buildUserPrompt(text: string, context: EnvironmentContext): string {
  return [
    `Request: "${text}"`,
    "",
    `Context reminder: cluster ${context.cluster}, namespace ${effectiveNamespace(context)}, environment ${context.environmentClass}.`,
  ].join("\n");
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
    signal.addEventListener("abort", done, { once: true });
  });
}

function abortOutcome(signal: AbortSignal): { promise: Promise<AttemptOutcome>; dispose: () => void } {
  let onAbort: () => void = () => undefined;
  const promise = new Promise<AttemptOutcome>((resolve) => {
    onAbort = () => resolve({ kind: "aborted" });
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}

export interface TranslatorOptions {
  backends: () => Iterable<TranslationBackend>;
  timeoutMs?: number;
  catalog?: VerbCatalog;
}

export interface TranslateOptions {
  signal?: AbortSignal;
}

/**
 * Natural language to kubectl through the first backend that answers.
 * One hard deadline covers probing, every attempt and the single retry.
 */
export class Translator {
  private readonly getBackends: () => Iterable<TranslationBackend>;
  private readonly timeoutMs: number;
  private readonly catalog: VerbCatalog;

  constructor(options: TranslatorOptions) {
    this.getBackends = options.backends;
    this.timeoutMs = options.timeoutMs || DEFAULT_TIMEOUT_MS;
    this.catalog = options.catalog || getDefaultVerbCatalog();
  }

  async translate(
    request: TranslationRequest,
    options: TranslateOptions = {},
  ): Promise<TranslationResult> {
    const text = request.text.trim();
    if (!text) {
      throw new TranslationError("TRANSLATION_INVALID", "Request is empty.", false);
    }
    if (text.length > MAX_REQUEST_LENGTH) {
      throw new TranslationError(
        "TRANSLATION_INVALID",
        `Request is ${text.length} characters; the limit is ${MAX_REQUEST_LENGTH}.`,
        false,
      );
    }

    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), this.timeoutMs);
    const signal = options.signal
      ? AbortSignal.any([options.signal, deadline.signal])
      : deadline.signal;

    try {
      return await this.run(text, request.context, signal, options.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(
    text: string,
    context: EnvironmentContext,
    signal: AbortSignal,
    userSignal?: AbortSignal,
  ): Promise<TranslationResult> {
    const cancelledOrTimedOut = () =>
      userSignal?.aborted
        ? new TranslationError("TRANSLATION_CANCELLED", "Translation cancelled.", false)
        : new TranslationError(
            "TRANSLATION_UNAVAILABLE",
            `No answer from the translation backend within ${Math.round(this.timeoutMs / 1000)}s.`,
            true,
          );

    const backends = await this.orderBackends(signal);
    if (signal.aborted) throw cancelledOrTimedOut();
    if (backends.length === 0) {
      throw new TranslationError(
        "TRANSLATION_UNAVAILABLE",
        "No translation backend is available.",
        true,
      );
    }

    const systemPrompt = buildSystemPrompt(context, this.catalog);
    const userPrompt = buildUserPrompt(text, context);
    let retryAvailable = true;
    const failures: string[] = [];

    for (const backend of backends) {
      let outcome = await this.attempt(backend, systemPrompt, userPrompt, signal);

      if (outcome.kind === "error" && outcome.retryable && retryAvailable && !signal.aborted) {
        retryAvailable = false;
        log.warn(`${backend.id} failed (${outcome.code}), retrying once`);
        await delay(RETRY_DELAY_MS, signal);
        if (!signal.aborted) {
          outcome = await this.attempt(backend, systemPrompt, userPrompt, signal);
        }
      }

      if (outcome.kind === "aborted" || signal.aborted) {
        throw cancelledOrTimedOut();
      }

      if (outcome.kind === "error") {
        log.warn(`${backend.id} failed: ${outcome.code} ${outcome.message}`);
        failures.push(`${backend.name}: ${outcome.message}`);
        continue;
      }

      return this.parse(outcome.text, backend.id, context);
    }

    throw new TranslationError(
      "TRANSLATION_UNAVAILABLE",
      `Translation failed (${failures.join("; ")}).`,
      true,
    );
  }

  private async orderBackends(signal: AbortSignal): Promise<TranslationBackend[]> {
    const all = Array.from(this.getBackends());
    const probes = await Promise.all(
      all.map(async (backend) => ({
        backend,
        available: await backend.isAvailable(signal).catch((error: unknown) => {
          log.warn(`${backend.id} availability probe failed`, error);
          return false;
        }),
      })),
    );
    const available = probes.filter((probe) => probe.available).map((probe) => probe.backend);
    for (const probe of probes) {
      if (!probe.available) log.info(`${probe.backend.id} is not reachable, skipping`);
    }
    return [
      ...available.filter((backend) => backend.locality === "local"),
      ...available.filter((backend) => backend.locality === "remote"),
    ];
  }

  private async attempt(
    backend: TranslationBackend,
    systemPrompt: string,
    userPrompt: string,
    signal: AbortSignal,
  ): Promise<AttemptOutcome> {
    const collect = async (): Promise<AttemptOutcome> => {
      let raw = "";
      const stream: AsyncGenerator<AgentResponseChunk> = backend.streamResponse({
        systemPrompt,
        messages: [{ role: "user", content: userPrompt, timestamp: Date.now() }],
        modelPreferences: { temperature: 0, maxTokens: 500 },
        signal,
      });
      for await (const chunk of stream) {
        if (chunk.type === "error") {
          return {
            kind: "error",
            code: chunk.error?.code || "UNKNOWN_ERROR",
            message: chunk.error?.message || "Backend failed",
            retryable: chunk.error?.retryable ?? false,
          };
        }
        if (chunk.text) raw += chunk.text;
      }
      return { kind: "text", text: raw };
    };

    const aborted = abortOutcome(signal);
    try {
      return await Promise.race([
        collect().catch(
          (error: unknown): AttemptOutcome => ({
            kind: "error",
            code: "UNKNOWN_ERROR",
            message: error instanceof Error ? error.message : String(error),
            retryable: false,
          }),
        ),
        aborted.promise,
      ]);
    } finally {
      aborted.dispose();
    }
  }

  private parse(raw: string, backendId: string, context: EnvironmentContext): TranslationResult {
    const candidate = extractJsonCandidate(raw);
    if (!candidate) {
      throw new TranslationError(
        "TRANSLATION_MALFORMED",
        "The backend reply was not the expected JSON.",
        false,
        raw.trim().slice(0, MAX_REQUEST_LENGTH),
      );
    }

    const command = normalizeCommand(candidate.command);
    if (!command.startsWith("kubectl ")) {
      throw new TranslationError(
        "TRANSLATION_MALFORMED",
        "The backend did not propose a kubectl command.",
        false,
        candidate.rationale,
      );
    }

    const { decision } = evaluateCommandPolicy(command, { sessionContext: context.name });
    if (!decision.allowed) {
      throw new TranslationError(
        "TRANSLATION_MALFORMED",
        `The proposed command was rejected: ${decision.reason || "blocked"}.`,
        false,
        candidate.rationale,
      );
    }

    const confidence = parseConfidence(candidate.confidence);
    if (confidence === null) {
      throw new TranslationError(
        "TRANSLATION_MALFORMED",
        "The backend reported a confidence outside 0-100.",
        false,
        candidate.rationale,
      );
    }

    return {
      command,
      confidence,
      rationale: candidate.rationale,
      needsClarification: candidate.rationale.includes(CLARIFICATION_MARKER),
      backendId,
    };
  }
}
