import { beforeEach, describe, expect, it } from "vitest";
import type { EnvironmentContext } from "@shared/environment";
import type { ExecutionResult, TranslationResult } from "@shared/terminal";
import { assessRisk } from "../../core/commands/riskClassifier";
import { ConfirmationEngine } from "../../core/services/confirmation";
import { HELP_LINES } from "../builtins";
import type { KeyEvent } from "../keys";
import {
  SessionMachine,
  isDirectCommand,
  type SessionEffect,
  type SessionEvent,
  type SessionState,
} from "../sessionMachine";

const prod: EnvironmentContext = {
  name: "prod-us",
  cluster: "us-1",
  namespace: "web",
  user: "ops",
  environmentClass: "production",
};

const staging: EnvironmentContext = {
  name: "staging-eu",
  cluster: "eu-1",
  user: "ops",
  environmentClass: "staging",
};

const dev: EnvironmentContext = {
  name: "dev-local",
  cluster: "kind",
  user: "ops",
  environmentClass: "development",
};

function translation(command: string, overrides: Partial<TranslationResult> = {}): TranslationResult {
  return {
    command,
    confidence: 92,
    rationale: "Lists pods in the current namespace.",
    needsClarification: false,
    backendId: "ollama",
    ...overrides,
  };
}

function execution(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    stdout: "",
    stderr: "",
    exitCode: 0,
    executedAt: 1_000,
    durationMs: 42,
    interrupted: false,
    timedOut: false,
    truncated: false,
    policyDecision: { allowed: true, family: "kubectl" },
    ...overrides,
  };
}

class Session {
  state: SessionState;
  private readonly machine: SessionMachine;

  constructor(context: EnvironmentContext, allowlisted: string[] = []) {
    this.machine = new SessionMachine({
      assessRisk: (command) => assessRisk(command),
      gate: new ConfirmationEngine({
        isAllowed: (command) => allowlisted.includes(command.trim()),
        entries: () => allowlisted,
      }),
      confidenceThreshold: 70,
    });
    this.state = this.machine.initialState(context);
  }

  send(event: SessionEvent): SessionEffect[] {
    const { state, effects } = this.machine.transition(this.state, event);
    this.state = state;
    return effects;
  }

  key(key: KeyEvent): SessionEffect[] {
    return this.send({ type: "key", key });
  }

  type(text: string): void {
    for (const char of text) {
      this.key({ kind: "char", char });
    }
  }

  submit(text: string): SessionEffect[] {
    this.type(text);
    return this.key({ kind: "enter" });
  }

  lines(): string[] {
    return this.state.lines.map((line) => line.content);
  }

  lastLine(): { type: string; content: string } {
    const { type, content } = this.state.lines[this.state.lines.length - 1];
    return { type, content };
  }
}

describe("isDirectCommand", () => {
  it("recognises kubectl invocations only", () => {
    expect(isDirectCommand("kubectl get pods")).toBe(true);
    expect(isDirectCommand("kubectl")).toBe(true);
    expect(isDirectCommand("kubectlx get pods")).toBe(false);
    expect(isDirectCommand("show kubectl pods")).toBe(false);
  });
});

describe("SessionMachine", () => {
  let session: Session;

  beforeEach(() => {
    session = new Session(prod);
  });

  describe("low-risk translation", () => {
    it("translates, runs without confirmation and audits the result", () => {
      expect(session.submit("show pods")).toEqual([
        { type: "translate", requestId: 1, text: "show pods", context: prod },
      ]);
      expect(session.state.phase).toEqual({ kind: "translating", requestId: 1, text: "show pods" });
      expect(session.state.input).toBe("");

      const effects = session.send({
        type: "translation_succeeded",
        requestId: 1,
        result: translation("kubectl get pods"),
      });
      expect(effects).toEqual([{ type: "execute", requestId: 2, command: "kubectl get pods", context: prod }]);
      expect(session.lines()).toEqual([
        "› show pods",
        "→ kubectl get pods",
        "confidence 92% via ollama",
        "Lists pods in the current namespace.",
        "$ kubectl get pods",
      ]);

      session.send({ type: "execution_output", requestId: 2, stream: "stdout", text: "NAME    READY\nweb-1" });
      session.send({ type: "execution_output", requestId: 2, stream: "stdout", text: "   1/1\n" });
      const finished = session.send({
        type: "execution_finished",
        requestId: 2,
        result: execution({ stdout: "NAME    READY\nweb-1   1/1\n" }),
      });

      expect(session.lines().slice(5)).toEqual(["NAME    READY", "web-1   1/1", "exit 0 in 42ms"]);
      expect(session.state.phase).toEqual({ kind: "normal" });
      expect(session.state.pending).toBeNull();
      expect(finished).toEqual([
        {
          type: "audit",
          entry: {
            naturalLanguageInput: "show pods",
            finalCommand: "kubectl get pods",
            originalCommand: null,
            confidence: 92,
            riskLevel: "LOW",
            environmentName: "prod-us",
            cluster: "us-1",
            namespace: "web",
            exitCode: 0,
            stdout: "NAME    READY\nweb-1   1/1\n",
            stderr: "",
            durationMs: 42,
            userAction: "EXECUTED",
          },
        },
      ]);
    });

    it("shows a banner when confidence is below the threshold", () => {
      session.submit("pods maybe");
      session.send({
        type: "translation_succeeded",
        requestId: 1,
        result: translation("kubectl get pods", { confidence: 55, rationale: "" }),
      });

      expect(session.state.lines.map(({ type, content }) => ({ type, content })).slice(1, 4)).toEqual([
        { type: "command", content: "→ kubectl get pods" },
        { type: "info", content: "confidence 55% via ollama" },
        { type: "warning", content: "Low confidence (55%). Review the command before running it." },
      ]);
      expect(session.state.pending?.lowConfidence).toBe(true);
    });

    it("shows a clarification rationale as a warning", () => {
      session.submit("restart it");
      session.send({
        type: "translation_succeeded",
        requestId: 1,
        result: translation("kubectl get deployments", {
          rationale: "Which deployment should be restarted?",
          needsClarification: true,
        }),
      });
      expect(session.state.lines[3]).toMatchObject({
        type: "warning",
        content: "Which deployment should be restarted?",
      });
    });

    it("prints captured output when nothing was streamed", () => {
      session.submit("kubectl get pods");
      session.send({
        type: "execution_finished",
        requestId: 1,
        result: execution({ stdout: "web-1\nweb-2\n", stderr: "Warning: deprecated\n" }),
      });

      expect(session.state.lines.slice(2).map(({ type, content }) => ({ type, content }))).toEqual([
        { type: "output", content: "web-1" },
        { type: "output", content: "web-2" },
        { type: "error", content: "Warning: deprecated" },
        { type: "info", content: "exit 0 in 42ms" },
      ]);
    });
  });

  describe("direct commands", () => {
    it("runs a typed kubectl command without translating it", () => {
      const effects = session.submit("kubectl get pods -n web");
      expect(effects).toEqual([{ type: "execute", requestId: 1, command: "kubectl get pods -n web", context: prod }]);
      expect(session.state.pending).toMatchObject({
        input: "kubectl get pods -n web",
        confidence: null,
        risk: { level: "LOW" },
      });
    });

    it("rejects shell operators before anything runs", () => {
      expect(session.submit("kubectl get pods | grep web")).toEqual([]);
      expect(session.lastLine()).toEqual({
        type: "error",
        content: "Command rejected: Command contains unsafe shell operators",
      });
      expect(session.state.phase).toEqual({ kind: "normal" });
    });

    it("gates a quoted verb like the bare one", () => {
      expect(session.submit('kubectl "delete" deployment nginx')).toEqual([]);
      expect(session.state.pending?.risk).toEqual({ level: "HIGH", matchedRule: "delete" });
      expect(session.state.phase).toEqual({
        kind: "modal_active",
        modal: { kind: "typed_phrase", expected: "nginx", typed: "", remember: false },
      });
    });

    it("asks for the typed phrase when replicas spell zero another way", () => {
      session.submit("kubectl scale deployment web --replicas=00");
      expect(session.state.phase).toMatchObject({ kind: "modal_active", modal: { kind: "typed_phrase" } });
    });

    it("refuses a command that names another context", () => {
      session = new Session(dev);
      expect(session.submit("kubectl --context prod-us delete deployment nginx")).toEqual([]);
      expect(session.lastLine()).toEqual({
        type: "error",
        content:
          'Command rejected: Command names context "prod-us" but the session is on dev-local; use use-context to switch',
      });
      expect(session.state.phase).toEqual({ kind: "normal" });
      expect(session.state.pending).toBeNull();
    });

    it("skips confirmation for allowlisted commands", () => {
      session = new Session(prod, ["kubectl delete pod web-1"]);
      const effects = session.submit("kubectl delete pod web-1");

      expect(effects).toEqual([{ type: "execute", requestId: 1, command: "kubectl delete pod web-1", context: prod }]);
      expect(session.lines()).toEqual([
        "› kubectl delete pod web-1",
        "Allowlisted, running without confirmation.",
        "$ kubectl delete pod web-1",
      ]);
    });
  });

  describe("yes/no confirmation", () => {
    beforeEach(() => {
      session = new Session(staging);
    });

    it("opens the dialog for a medium-risk command and runs it on allow once", () => {
      expect(session.submit("kubectl scale deployment web --replicas=3")).toEqual([]);
      expect(session.state.phase).toEqual({ kind: "modal_active", modal: { kind: "yes_no", selected: "deny" } });
      expect(session.state.pending?.risk).toEqual({ level: "MEDIUM", matchedRule: "scale" });

      session.key({ kind: "char", char: "y" });
      expect(session.key({ kind: "enter" })).toEqual([
        { type: "execute", requestId: 1, command: "kubectl scale deployment web --replicas=3", context: staging },
      ]);
    });

    it("cancels on deny and audits the cancellation", () => {
      session.submit("kubectl scale deployment web --replicas=3");
      const effects = session.key({ kind: "enter" });

      expect(session.lastLine()).toEqual({ type: "info", content: "Cancelled." });
      expect(session.state.phase).toEqual({ kind: "normal" });
      expect(effects).toEqual([
        {
          type: "audit",
          entry: {
            naturalLanguageInput: "kubectl scale deployment web --replicas=3",
            finalCommand: "kubectl scale deployment web --replicas=3",
            originalCommand: null,
            confidence: null,
            riskLevel: "MEDIUM",
            environmentName: "staging-eu",
            cluster: "eu-1",
            namespace: null,
            exitCode: null,
            stdout: null,
            stderr: null,
            durationMs: null,
            userAction: "CANCELLED",
          },
        },
      ]);
    });

    it("asks yes/no for high risk outside production", () => {
      session.submit("kubectl delete deployment web");
      expect(session.state.phase).toEqual({ kind: "modal_active", modal: { kind: "yes_no", selected: "deny" } });
    });
  });

  describe("keys the dialog does not bind", () => {
    const unbound: KeyEvent[] = [
      { kind: "up" },
      { kind: "down" },
      { kind: "ctrl", name: "d" },
      { kind: "ctrl", name: "l" },
      { kind: "backspace" },
      { kind: "other" },
    ];

    it("leave the prompt, the context and the scrollback alone in the yes/no dialog", () => {
      session = new Session(staging);
      session.submit("kubectl scale deployment web --replicas=3");
      const before = session.state;

      for (const key of [...unbound, { kind: "char", char: "x" } satisfies KeyEvent]) {
        expect(session.key(key)).toEqual([]);
      }
      expect(session.state.input).toBe("");
      expect(session.state.context).toBe(staging);
      expect(session.state.lines).toEqual(before.lines);
      expect(session.state.phase).toEqual({ kind: "modal_active", modal: { kind: "yes_no", selected: "deny" } });
    });

    it("leave the prompt, the context and the scrollback alone in the typed-phrase dialog", () => {
      session.submit("kubectl delete deployment web");
      const before = session.state;

      for (const key of unbound) {
        expect(session.key(key)).toEqual([]);
      }
      expect(session.state.input).toBe("");
      expect(session.state.context).toBe(prod);
      expect(session.state.lines).toEqual(before.lines);
      expect(session.state.phase).toEqual({
        kind: "modal_active",
        modal: { kind: "typed_phrase", expected: "web", typed: "", remember: false },
      });
    });
  });

  describe("typed-phrase confirmation", () => {
    function proposeDelete(): void {
      session.submit("delete the web deployment");
      session.send({
        type: "translation_succeeded",
        requestId: 1,
        result: translation("kubectl delete deployment web", { confidence: 88, rationale: "Deletes web." }),
      });
    }

    it("asks for the resource name in production", () => {
      proposeDelete();
      expect(session.state.phase).toEqual({
        kind: "modal_active",
        modal: { kind: "typed_phrase", expected: "web", typed: "", remember: false },
      });
    });

    it("cancels when the typed text does not match", () => {
      proposeDelete();
      session.type("api");
      const effects = session.key({ kind: "enter" });

      expect(session.lastLine()).toEqual({ type: "info", content: 'Typed text did not match "web". Cancelled.' });
      expect(effects).toHaveLength(1);
      expect(effects[0]).toMatchObject({
        type: "audit",
        entry: { userAction: "CANCELLED", riskLevel: "HIGH", confidence: 88, exitCode: null },
      });
    });

    it("runs when the phrase matches", () => {
      proposeDelete();
      session.type("web");
      expect(session.key({ kind: "enter" })).toEqual([
        { type: "execute", requestId: 2, command: "kubectl delete deployment web", context: prod },
      ]);
    });

    it("adds the command to the allowlist when remember is on", () => {
      proposeDelete();
      session.type("web");
      session.key({ kind: "tab" });
      const effects = session.key({ kind: "enter" });

      expect(effects).toEqual([
        { type: "allowlist_add", command: "kubectl delete deployment web" },
        { type: "execute", requestId: 2, command: "kubectl delete deployment web", context: prod },
      ]);
      expect(session.lines().slice(-2)).toEqual(["Added to the allowlist.", "$ kubectl delete deployment web"]);
    });
  });

  describe("editing", () => {
    beforeEach(() => {
      session = new Session(staging);
      session.submit("scale web to five");
      session.send({
        type: "translation_succeeded",
        requestId: 1,
        result: translation("kubectl scale deployment web --replicas=5", { confidence: 90, rationale: "" }),
      });
    });

    it("records the proposed command when the operator changes it", () => {
      session.key({ kind: "char", char: "e" });
      expect(session.state.phase).toEqual({ kind: "editing" });
      expect(session.state.input).toBe("kubectl scale deployment web --replicas=5");

      session.key({ kind: "backspace" });
      session.type("4");
      session.key({ kind: "enter" });
      expect(session.lastLine()).toEqual({ type: "command", content: "✎ kubectl scale deployment web --replicas=4" });
      expect(session.state.phase).toEqual({ kind: "modal_active", modal: { kind: "yes_no", selected: "deny" } });

      session.key({ kind: "char", char: "y" });
      session.key({ kind: "enter" });
      const effects = session.send({ type: "execution_finished", requestId: 2, result: execution() });

      expect(effects[0]).toMatchObject({
        type: "audit",
        entry: {
          naturalLanguageInput: "scale web to five",
          finalCommand: "kubectl scale deployment web --replicas=4",
          originalCommand: "kubectl scale deployment web --replicas=5",
          confidence: 90,
          userAction: "EDITED",
        },
      });
    });

    it("treats an unchanged edit as a plain execution", () => {
      session.key({ kind: "ctrl", name: "e" });
      session.key({ kind: "enter" });
      session.key({ kind: "char", char: "y" });
      session.key({ kind: "enter" });
      const effects = session.send({ type: "execution_finished", requestId: 2, result: execution() });

      expect(effects[0]).toMatchObject({ type: "audit", entry: { originalCommand: null, userAction: "EXECUTED" } });
    });

    it("keeps the editor open when the edit breaks policy", () => {
      session.key({ kind: "char", char: "e" });
      session.type(" && rm -rf /");
      expect(session.key({ kind: "enter" })).toEqual([]);
      expect(session.state.phase).toEqual({ kind: "editing" });
      expect(session.state.notice).toBe("Command rejected: Command contains unsafe shell operators");
    });

    it("cancels the edit on Escape", () => {
      session.key({ kind: "char", char: "e" });
      const effects = session.key({ kind: "escape" });

      expect(session.lastLine()).toEqual({ type: "info", content: "Edit cancelled." });
      expect(session.state.input).toBe("");
      expect(effects[0]).toMatchObject({ type: "audit", entry: { userAction: "CANCELLED" } });
    });
  });

  describe("translation failures", () => {
    it("falls back to typing kubectl directly when no backend is available", () => {
      session.submit("show pods");
      session.send({
        type: "translation_failed",
        requestId: 1,
        failure: { code: "TRANSLATION_UNAVAILABLE", message: "No translation backend is reachable." },
      });

      expect(session.state.phase).toEqual({ kind: "normal" });
      expect(session.state.input).toBe("kubectl ");
      expect(session.lines().slice(1)).toEqual([
        "Translation unavailable: No translation backend is reachable.",
        "Type the kubectl command yourself to continue.",
      ]);

      expect(session.submit("get pods")).toEqual([
        { type: "execute", requestId: 2, command: "kubectl get pods", context: prod },
      ]);
    });

    it("keeps text typed ahead during translation", () => {
      session.submit("show pods");
      session.type("get nodes");
      session.send({
        type: "translation_failed",
        requestId: 1,
        failure: { code: "TRANSLATION_UNAVAILABLE", message: "offline" },
      });
      expect(session.state.input).toBe("get nodes");
    });

    it("explains a malformed reply", () => {
      session.submit("show pods");
      session.send({
        type: "translation_failed",
        requestId: 1,
        failure: { code: "TRANSLATION_MALFORMED", message: "Reply is not JSON.", rawRationale: "I think you want pods" },
      });
      expect(session.lines().slice(1)).toEqual([
        "Could not use the translation: Reply is not JSON.",
        "Backend said: I think you want pods",
        "Rephrase the request or type the kubectl command directly.",
      ]);
    });

    it("cancels an in-flight translation and ignores its late result", () => {
      session.submit("show pods");
      expect(session.key({ kind: "interrupt" })).toEqual([{ type: "cancel_translation", requestId: 1 }]);
      expect(session.lastLine()).toEqual({ type: "info", content: "Translation cancelled." });

      const before = session.state;
      expect(
        session.send({ type: "translation_succeeded", requestId: 1, result: translation("kubectl get pods") }),
      ).toEqual([]);
      expect(session.state).toBe(before);
    });

    it("refuses a second submission while translating", () => {
      session.submit("show pods");
      session.type("get nodes");
      expect(session.key({ kind: "enter" })).toEqual([]);
      expect(session.state.notice).toBe("Still processing the previous request…");
      expect(session.state.input).toBe("get nodes");
    });
  });

  describe("execution", () => {
    beforeEach(() => {
      session.submit("kubectl logs web-1 -f");
    });

    it("interrupts once on Ctrl+C", () => {
      expect(session.key({ kind: "interrupt" })).toEqual([{ type: "interrupt_execution", requestId: 1 }]);
      expect(session.state.notice).toBe("Interrupting…");
      expect(session.key({ kind: "interrupt" })).toEqual([]);

      session.send({
        type: "execution_finished",
        requestId: 1,
        result: execution({ exitCode: 130, interrupted: true }),
      });
      expect(session.lastLine()).toEqual({ type: "warning", content: "exit 130 in 42ms (interrupted)" });
    });

    it("reports timeouts and truncated output", () => {
      session.send({
        type: "execution_finished",
        requestId: 1,
        result: execution({ exitCode: 124, timedOut: true, truncated: true }),
      });
      expect(session.lines().slice(-2)).toEqual([
        "exit 124 in 42ms (timed out)",
        "Output passed the capture limit; the audit log keeps the first part.",
      ]);
    });

    it("explains a failed command and offers the next step", () => {
      session.send({
        type: "execution_output",
        requestId: 1,
        stream: "stderr",
        text: 'Error from server (NotFound): pods "web-1" not found\n',
      });
      session.send({
        type: "execution_finished",
        requestId: 1,
        result: execution({ exitCode: 1, stderr: 'Error from server (NotFound): pods "web-1" not found\n' }),
      });

      expect(session.state.lines.slice(-4).map(({ type, content }) => ({ type, content }))).toEqual([
        { type: "error", content: 'Error from server (NotFound): pods "web-1" not found' },
        { type: "warning", content: "exit 1 in 42ms" },
        { type: "warning", content: "The named resource does not exist in this namespace." },
        { type: "info", content: "Next: List what exists with a get command, or edit the name or namespace." },
      ]);
    });

    it("drops escape sequences and control characters from output", () => {
      session.send({
        type: "execution_output",
        requestId: 1,
        stream: "stdout",
        text: "\u001b[31mCrashLoopBackOff\u001b[0m\u0007 web-1\u001b]0;title\u0007\n",
      });
      expect(session.lastLine()).toEqual({ type: "output", content: "CrashLoopBackOff web-1" });
    });

    it("splits stderr into error lines", () => {
      session.send({ type: "execution_output", requestId: 1, stream: "stderr", text: "Error from server\r\n" });
      expect(session.lastLine()).toEqual({ type: "error", content: "Error from server" });
    });

    it("audits a command that could not start", () => {
      const effects = session.send({
        type: "execution_failed",
        requestId: 1,
        message: "kubectl was not found on PATH",
      });

      expect(session.lastLine()).toEqual({ type: "error", content: "kubectl was not found on PATH" });
      expect(effects[0]).toMatchObject({
        type: "audit",
        entry: { exitCode: null, stdout: null, stderr: "kubectl was not found on PATH", userAction: "EXECUTED" },
      });
    });

    it("ignores output from another request", () => {
      const before = session.state;
      session.send({ type: "execution_output", requestId: 7, stream: "stdout", text: "stale\n" });
      expect(session.state).toBe(before);
    });

    it("advances the spinner only while busy", () => {
      session.send({ type: "tick" });
      session.send({ type: "tick" });
      expect(session.state.spinnerFrame).toBe(2);

      session.send({ type: "execution_finished", requestId: 1, result: execution() });
      session.send({ type: "tick" });
      expect(session.state.spinnerFrame).toBe(2);
    });
  });

  describe("prompt keys and built-ins", () => {
    it("hints on Ctrl+C at an empty prompt and exits on Ctrl+D", () => {
      session.key({ kind: "interrupt" });
      expect(session.state.notice).toBe("Press Ctrl+D or type exit to quit.");
      expect(session.key({ kind: "ctrl", name: "d" })).toEqual([{ type: "exit" }]);
    });

    it("clears typed text on Ctrl+C", () => {
      session.type("get po");
      session.key({ kind: "interrupt" });
      expect(session.state.input).toBe("");
      expect(session.state.notice).toBeNull();
    });

    it("exits on the exit built-in", () => {
      expect(session.submit("quit")).toEqual([{ type: "exit" }]);
    });

    it("prints help locally", () => {
      expect(session.submit("help")).toEqual([]);
      expect(session.lines()).toEqual(["› help", ...HELP_LINES]);
    });

    it("clears the scrollback", () => {
      session.submit("help");
      session.submit("clear");
      expect(session.state.lines).toEqual([]);
    });

    it("hands other built-ins to the loop", () => {
      expect(session.submit("history 7d")).toEqual([
        { type: "builtin", command: { kind: "history_days", days: 7 } },
      ]);
    });

    it("recalls earlier input with the arrow keys", () => {
      session.submit("help");
      session.submit("history 7d");

      session.key({ kind: "up" });
      expect(session.state.input).toBe("history 7d");
      session.key({ kind: "up" });
      expect(session.state.input).toBe("help");
      session.key({ kind: "up" });
      expect(session.state.input).toBe("help");
      session.key({ kind: "down" });
      expect(session.state.input).toBe("history 7d");
      session.key({ kind: "down" });
      expect(session.state.input).toBe("");
    });

    it("applies a context switch to later commands", () => {
      session.send({ type: "context_switched", context: staging });
      expect(session.lastLine()).toEqual({ type: "info", content: "Switched to staging-eu (staging)." });

      expect(session.submit("kubectl get pods")).toEqual([
        { type: "execute", requestId: 1, command: "kubectl get pods", context: staging },
      ]);
    });

    it("keeps at most 2000 scrollback lines", () => {
      const lines = Array.from({ length: 2100 }, (_, index) => `line ${index}`);
      session.send({ type: "builtin_output", lines });

      expect(session.state.lines).toHaveLength(2000);
      expect(session.state.lines[0].content).toBe("line 100");
      expect(session.lastLine().content).toBe("line 2099");
    });
  });
});
