export type DhcpApiGeneration = "v6" | "legacy";

export interface DhcpNodeConfig {
  id: string;
  name: string;
  baseUrl: string;
  password: string;
  priority: number; // lower wins the election
  apiGeneration: DhcpApiGeneration;
}

export interface DhcpControllerOptions {
  checkIntervalMs: number;
  probeTimeoutMs: number;
  loginTimeoutMs: number;
  mutationTimeoutMs: number;
  healthPath: string;
  authFailureStatuses: number[];
  rejectUnauthorized: boolean;
  runOnce: boolean;
}

/** Session material returned by `/api/auth`. Both tokens or nothing. */
export interface DhcpNodeSession {
  sid: string;
  csrf: string;
}

export type DhcpApiConfirmation =
  | { confirmed: true }
  | { confirmed: false; detail: string };

/**
 * How one API generation presents session material and reports the result
 * of a DHCP change. Chosen per node when its runtime state is created.
 */
export interface DhcpApiStrategy {
  readonly generation: DhcpApiGeneration;
  sessionHeaders(session: DhcpNodeSession): Record<string, string>;
  sessionCookies(session: DhcpNodeSession): Record<string, string>;
  readConfirmation(
    body: Record<string, unknown>,
    desiredEnabled: boolean,
  ): DhcpApiConfirmation;
}

export interface DhcpNodeRuntimeState {
  readonly node: DhcpNodeConfig;
  readonly api: DhcpApiStrategy;
  reachable: boolean;
  session?: DhcpNodeSession;
  readonly cookies: Map<string, string>;
}

export type DhcpLoginResult =
  | { ok: true; session: DhcpNodeSession }
  | { ok: false; error: string };

export type DhcpMutationErrorKind = "auth" | "protocol" | "transient";

export type DhcpMutationOutcome =
  | { status: "skipped"; desiredEnabled: boolean }
  | { status: "success"; desiredEnabled: boolean }
  | { status: "warning"; desiredEnabled: boolean; message: string }
  | {
      status: "error";
      desiredEnabled: boolean;
      kind: DhcpMutationErrorKind;
      message: string;
    };

export interface DhcpNodeRef {
  nodeId: string;
  name: string;
}

export type DhcpCycleEvent =
  | ({ type: "online" } & DhcpNodeRef)
  | ({ type: "offline"; detail: string } & DhcpNodeRef)
  | ({ type: "elected" } & DhcpNodeRef)
  | { type: "no-leader" }
  | ({ type: "session-established" } & DhcpNodeRef)
  | ({ type: "login-failed"; error: string } & DhcpNodeRef)
  | ({ type: "session-invalidated"; httpStatus: number } & DhcpNodeRef)
  | ({ type: "mutation"; outcome: DhcpMutationOutcome } & DhcpNodeRef);

export interface DhcpCycleNodeReport extends DhcpNodeRef {
  reachable: boolean;
  outcome: DhcpMutationOutcome;
}

export interface DhcpCycleReport {
  cycle: number;
  startedAt: string;
  finishedAt: string;
  electedNodeId: string | null;
  nodes: DhcpCycleNodeReport[];
}

export interface DhcpNodeSummary extends DhcpNodeRef {
  baseUrl: string;
  priority: number;
  apiGeneration: DhcpApiGeneration;
  reachable: boolean;
  authenticated: boolean;
}

export interface DhcpControllerStatus {
  nodes: DhcpNodeSummary[];
  cycles: number;
  lastCycle?: DhcpCycleReport;
}
