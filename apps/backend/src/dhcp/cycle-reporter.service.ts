import { Injectable, Logger } from "@nestjs/common";
import type {
  DhcpCycleEvent,
  DhcpCycleReport,
  DhcpMutationOutcome,
} from "./dhcp.types";

const stateLabel = (enabled: boolean): string =>
  enabled ? "enabled" : "disabled";

/**
 * Observer for everything that happens during a cycle. Events are logged as
 * they arrive and the last completed report is kept for the status API.
 * Nothing here feeds back into election or convergence.
 */
@Injectable()
export class DhcpCycleReporterService {
  private readonly logger = new Logger("DhcpController");
  private lastReport?: DhcpCycleReport;
  private completedCycles = 0;

  record(event: DhcpCycleEvent): void {
    switch (event.type) {
      case "online":
        this.logger.log(`OK: ${event.name} is online.`);
        return;
      case "offline":
        this.logger.warn(`FAIL: ${event.name} is unreachable (${event.detail}).`);
        return;
      case "elected":
        this.logger.log(`Active DHCP server should be: ${event.name}`);
        return;
      case "no-leader":
        this.logger.warn(
          "All servers offline. DHCP stays untouched until a node comes back.",
        );
        return;
      case "session-established":
        this.logger.log(`New session established for ${event.name}.`);
        return;
      case "login-failed":
        this.logger.error(`Auth failed for ${event.name}: ${event.error}`);
        return;
      case "session-invalidated":
        this.logger.warn(
          `Session for ${event.name} rejected (HTTP ${event.httpStatus}). Clearing tokens.`,
        );
        return;
      case "mutation":
        this.recordMutation(event.name, event.outcome);
        return;
    }
  }

  complete(report: DhcpCycleReport): void {
    this.lastReport = report;
    this.completedCycles += 1;

    const failures = report.nodes.filter(
      (node) => node.outcome.status === "error",
    ).length;
    const leader =
      report.nodes.find((node) => node.nodeId === report.electedNodeId)?.name ??
      "none";

    this.logger.log(
      `Cycle #${report.cycle} complete: leader=${leader}, errors=${failures}.`,
    );
  }

  getLastReport(): DhcpCycleReport | undefined {
    return this.lastReport;
  }

  getCompletedCycles(): number {
    return this.completedCycles;
  }

  private recordMutation(name: string, outcome: DhcpMutationOutcome): void {
    const action = stateLabel(outcome.desiredEnabled);

    switch (outcome.status) {
      case "skipped":
        this.logger.debug(`Skipping ${name}: node is unreachable.`);
        return;
      case "success":
        this.logger.log(`SUCCESS: ${name} DHCP is now ${action}.`);
        return;
      case "warning":
        this.logger.warn(
          `Unconfirmed DHCP ${action} on ${name}: ${outcome.message}`,
        );
        return;
      case "error":
        this.logger.error(
          `Failed to set DHCP ${action} on ${name} (${outcome.kind}): ${outcome.message}`,
        );
        return;
    }
  }
}
