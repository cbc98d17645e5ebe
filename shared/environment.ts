/**
 * Cluster connection context types
 */

export type EnvironmentClass = "development" | "staging" | "production" | "unknown";

/**
 * Snapshot of the active kubeconfig context. Created once per session and
 * replaced wholesale on a context switch.
 */
export interface EnvironmentContext {
  readonly name: string;
  readonly cluster: string;
  readonly namespace?: string;
  readonly user: string;
  readonly environmentClass: EnvironmentClass;
}

export interface KubeContextSummary {
  name: string;
  cluster: string;
  namespace?: string;
  user: string;
  isCurrent: boolean;
}
