import { Inject, Injectable, Logger } from "@nestjs/common";
import { DhcpCycleReporterService } from "./cycle-reporter.service";
import {
  DHCP_CONFIG_PATH,
  DHCP_CONTROLLER_OPTIONS_TOKEN,
} from "./dhcp.constants";
import type {
  DhcpControllerOptions,
  DhcpMutationOutcome,
  DhcpNodeRuntimeState,
} from "./dhcp.types";
import {
  DhcpNodeHttpService,
  describeRequestError,
  isRecord,
} from "./node-http.service";
import { DhcpNodeSessionService } from "./node-session.service";

@Injectable()
export class DhcpConfigMutatorService {
  private readonly logger = new Logger(DhcpConfigMutatorService.name);

  constructor(
    private readonly http: DhcpNodeHttpService,
    private readonly sessions: DhcpNodeSessionService,
    @Inject(DHCP_CONTROLLER_OPTIONS_TOKEN)
    private readonly options: DhcpControllerOptions,
    private readonly reporter: DhcpCycleReporterService,
  ) {}

  /**
   * Asserts `dhcp.active = desiredEnabled` on one node with a partial config
   * update that asks the node to restart its DHCP service. Unreachable nodes
   * are skipped; the outcome is always reported and never thrown.
   */
  async apply(
    state: DhcpNodeRuntimeState,
    desiredEnabled: boolean,
  ): Promise<DhcpMutationOutcome> {
    const outcome = await this.mutate(state, desiredEnabled);
    this.reporter.record({
      type: "mutation",
      nodeId: state.node.id,
      name: state.node.name,
      outcome,
    });
    return outcome;
  }

  private async mutate(
    state: DhcpNodeRuntimeState,
    desiredEnabled: boolean,
  ): Promise<DhcpMutationOutcome> {
    if (!state.reachable) {
      return { status: "skipped", desiredEnabled };
    }

    const login = await this.sessions.ensureAuthenticated(state);
    if (!login.ok) {
      return {
        status: "error",
        desiredEnabled,
        kind: "auth",
        message: login.error,
      };
    }

    const { session } = login;
    this.logger.log(
      `Setting DHCP on ${state.node.name} to ${desiredEnabled ? "enabled" : "disabled"}...`,
    );

    try {
      const response = await this.http.request(state, {
        method: "PATCH",
        url: DHCP_CONFIG_PATH,
        params: { restart: true },
        data: { config: { dhcp: { active: desiredEnabled } } },
        headers: state.api.sessionHeaders(session),
        cookies: state.api.sessionCookies(session),
        timeoutMs: this.options.mutationTimeoutMs,
      });

      if (this.options.authFailureStatuses.includes(response.status)) {
        this.sessions.invalidate(state);
        this.reporter.record({
          type: "session-invalidated",
          nodeId: state.node.id,
          name: state.node.name,
          httpStatus: response.status,
        });
        return {
          status: "error",
          desiredEnabled,
          kind: "auth",
          message: `Session rejected (HTTP ${response.status}); will re-authenticate next cycle`,
        };
      }

      if (response.status < 200 || response.status >= 300) {
        return {
          status: "error",
          desiredEnabled,
          kind: "transient",
          message: `HTTP ${response.status}`,
        };
      }

      if (!isRecord(response.data)) {
        return {
          status: "error",
          desiredEnabled,
          kind: "protocol",
          message: "Response body was not a JSON object",
        };
      }

      const confirmation = state.api.readConfirmation(
        response.data,
        desiredEnabled,
      );
      if (confirmation.confirmed) {
        return { status: "success", desiredEnabled };
      }

      return { status: "warning", desiredEnabled, message: confirmation.detail };
    } catch (error) {
      return {
        status: "error",
        desiredEnabled,
        kind: "transient",
        message: describeRequestError(error),
      };
    }
  }
}
