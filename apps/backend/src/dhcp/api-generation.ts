import type {
  DhcpApiConfirmation,
  DhcpApiGeneration,
  DhcpApiStrategy,
  DhcpNodeConfig,
  DhcpNodeRuntimeState,
  DhcpNodeSession,
} from "./dhcp.types";

const csrfHeader = (session: DhcpNodeSession): Record<string, string> => ({
  "X-CSRF-Token": session.csrf,
});

const describeBody = (body: Record<string, unknown>): string => {
  try {
    return JSON.stringify(body);
  } catch {
    return "[unserializable body]";
  }
};

/** Current API: `sid` travels as a header and the body reports `success`. */
const v6Strategy: DhcpApiStrategy = {
  generation: "v6",
  sessionHeaders: (session) => ({ sid: session.sid, ...csrfHeader(session) }),
  sessionCookies: () => ({}),
  readConfirmation(body): DhcpApiConfirmation {
    if (body.success === true) {
      return { confirmed: true };
    }

    return {
      confirmed: false,
      detail: `API accepted the change without confirming it: ${describeBody(body)}`,
    };
  },
};

/**
 * Legacy API: `sid` travels as a cookie and the body carries a
 * `dhcp_enabled` / `dhcp_disabled` status string.
 */
const legacyStrategy: DhcpApiStrategy = {
  generation: "legacy",
  sessionHeaders: csrfHeader,
  sessionCookies: (session) => ({ sid: session.sid }),
  readConfirmation(body, desiredEnabled): DhcpApiConfirmation {
    const expected = desiredEnabled ? "dhcp_enabled" : "dhcp_disabled";
    if (body.status === expected) {
      return { confirmed: true };
    }

    if (typeof body.status === "string") {
      return {
        confirmed: false,
        detail: `API reported "${body.status}" while "${expected}" was requested`,
      };
    }

    return {
      confirmed: false,
      detail: `API accepted the change without confirming it: ${describeBody(body)}`,
    };
  },
};

export const DHCP_API_STRATEGIES: Record<DhcpApiGeneration, DhcpApiStrategy> =
  {
    v6: v6Strategy,
    legacy: legacyStrategy,
  };

export function isDhcpApiGeneration(value: string): value is DhcpApiGeneration {
  return value === "v6" || value === "legacy";
}

export function createNodeRuntimeState(
  node: DhcpNodeConfig,
): DhcpNodeRuntimeState {
  return {
    node,
    api: DHCP_API_STRATEGIES[node.apiGeneration],
    reachable: false,
    session: undefined,
    cookies: new Map(),
  };
}
