import { v4 as uuidv4 } from "uuid";
import type { AgentResponseChunk } from "@shared/coordination";

export function textChunk(text: string, isDone = false): AgentResponseChunk {
  return {
    type: "text",
    chunkId: uuidv4(),
    timestamp: Date.now(),
    text,
    isDone,
  };
}

export function errorChunk(code: string, message: string, retryable: boolean): AgentResponseChunk {
  return {
    type: "error",
    chunkId: uuidv4(),
    timestamp: Date.now(),
    error: { code, message, retryable },
  };
}

/**
 * Classification shared by providers whose SDK reports failures only as
 * plain errors with a message.
 */
export function isTransientMessage(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return (
    message.includes("network") ||
    message.includes("timeout") ||
    message.includes("timed out") ||
    message.includes("econnreset") ||
    message.includes("socket hang up") ||
    message.includes("fetch failed")
  );
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "APIUserAbortError");
}
