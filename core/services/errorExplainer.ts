/**
 * Turns kubectl's stderr into one line of explanation and the next step the
 * operator can take. Patterns are checked in order; the first match wins.
 */

export interface FailureExplanation {
  id: string;
  explanation: string;
  nextAction: string;
}

interface FailurePattern extends FailureExplanation {
  pattern: RegExp;
}

const PATTERNS: FailurePattern[] = [
  {
    id: "context_not_found",
    pattern: /context "[^"]*" does not exist|no context exists with the name|current-context is not set/i,
    explanation: "The kubeconfig has no such context.",
    nextAction: "Run contexts to list the valid names, then use-context <name>.",
  },
  {
    id: "forbidden",
    pattern: /\(Forbidden\)|is forbidden|cannot \S+ resource/i,
    explanation: "Your credentials are not allowed to do this in the cluster (RBAC).",
    nextAction: "Check with kubectl auth can-i, or ask a cluster admin for access.",
  },
  {
    id: "unauthorized",
    pattern: /\(Unauthorized\)|must be logged in to the server/i,
    explanation: "The cluster rejected your credentials.",
    nextAction: "Refresh your login for this context, then retry.",
  },
  {
    id: "unknown_resource_type",
    pattern: /the server doesn't have a resource type|couldn't find resource for/i,
    explanation: "The cluster does not know that resource type.",
    nextAction: "Edit the command to use a type from kubectl api-resources.",
  },
  {
    id: "not_found",
    pattern: /\(NotFound\)|not found/i,
    explanation: "The named resource does not exist in this namespace.",
    nextAction: "List what exists with a get command, or edit the name or namespace.",
  },
  {
    id: "connection_refused",
    pattern: /connection refused|was refused|unable to connect to the server|no such host|i\/o timeout/i,
    explanation: "kubectl could not reach the cluster API server.",
    nextAction: "Check the network or VPN and that the cluster is up, then retry.",
  },
  {
    id: "already_exists",
    pattern: /\(AlreadyExists\)|already exists/i,
    explanation: "A resource with that name already exists.",
    nextAction: "Edit the command to use another name, or apply changes instead of create.",
  },
  {
    id: "invalid",
    pattern: /\(Invalid\)|unknown flag|unknown command|invalid argument|error: required/i,
    explanation: "kubectl did not accept the command as written.",
    nextAction: "Edit the command or rephrase the request.",
  },
];

const FALLBACK: FailureExplanation = {
  id: "unrecognized",
  explanation: "The command failed; see the error output above.",
  nextAction: "Rephrase the request or type a corrected kubectl command.",
};

export function explainFailure(stderr: string): FailureExplanation {
  const match = PATTERNS.find(({ pattern }) => pattern.test(stderr));
  if (!match) return FALLBACK;
  const { id, explanation, nextAction } = match;
  return { id, explanation, nextAction };
}
