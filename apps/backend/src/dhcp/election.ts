import type { DhcpNodeConfig } from "./dhcp.types";

interface ElectionCandidate {
  readonly node: DhcpNodeConfig;
  readonly reachable: boolean;
}

export function byPriority(
  left: ElectionCandidate,
  right: ElectionCandidate,
): number {
  return left.node.priority - right.node.priority;
}

/**
 * Picks the reachable candidate with the lowest priority value. Computed
 * only from the current reachability vector, so there is no stickiness:
 * a flapping primary takes leadership back as soon as it answers again.
 */
export function electLeader<T extends ElectionCandidate>(
  candidates: readonly T[],
): T | undefined {
  return [...candidates].sort(byPriority).find((candidate) => candidate.reachable);
}
