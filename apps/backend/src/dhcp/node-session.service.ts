import { Inject, Injectable, Logger } from "@nestjs/common";
import { DhcpCycleReporterService } from "./cycle-reporter.service";
import {
  DHCP_AUTH_PATH,
  DHCP_CONTROLLER_OPTIONS_TOKEN,
} from "./dhcp.constants";
import type {
  DhcpControllerOptions,
  DhcpLoginResult,
  DhcpNodeRuntimeState,
  DhcpNodeSession,
} from "./dhcp.types";
import {
  DhcpNodeHttpService,
  describeRequestError,
  isRecord,
} from "./node-http.service";

/**
 * Owns the login side of a node's runtime state. A stored session is reused
 * until a caller reports an authorization rejection through `invalidate`.
 */
@Injectable()
export class DhcpNodeSessionService {
  private readonly logger = new Logger(DhcpNodeSessionService.name);

  constructor(
    private readonly http: DhcpNodeHttpService,
    @Inject(DHCP_CONTROLLER_OPTIONS_TOKEN)
    private readonly options: DhcpControllerOptions,
    private readonly reporter: DhcpCycleReporterService,
  ) {}

  async ensureAuthenticated(
    state: DhcpNodeRuntimeState,
  ): Promise<DhcpLoginResult> {
    if (state.session) {
      return { ok: true, session: state.session };
    }

    const result = await this.login(state);
    const ref = { nodeId: state.node.id, name: state.node.name };

    if (result.ok) {
      state.session = result.session;
      this.reporter.record({ type: "session-established", ...ref });
    } else {
      state.cookies.clear();
      this.reporter.record({ type: "login-failed", ...ref, error: result.error });
    }

    return result;
  }

  /** Drops both tokens and every captured cookie. Safe to call repeatedly. */
  invalidate(state: DhcpNodeRuntimeState): void {
    state.session = undefined;
    state.cookies.clear();
  }

  private async login(state: DhcpNodeRuntimeState): Promise<DhcpLoginResult> {
    this.logger.log(`Authenticating with ${state.node.name}...`);

    try {
      const response = await this.http.request(state, {
        method: "POST",
        url: DHCP_AUTH_PATH,
        data: { password: state.node.password },
        timeoutMs: this.options.loginTimeoutMs,
      });

      if (response.status < 200 || response.status >= 300) {
        return { ok: false, error: `Login rejected (HTTP ${response.status})` };
      }

      const session = this.extractSession(response.data);
      if (!session) {
        return {
          ok: false,
          error: "Login response did not include both sid and csrf",
        };
      }

      return { ok: true, session };
    } catch (error) {
      return { ok: false, error: describeRequestError(error) };
    }
  }

  private extractSession(payload: unknown): DhcpNodeSession | undefined {
    if (!isRecord(payload) || !isRecord(payload.session)) {
      return undefined;
    }

    const { sid, csrf } = payload.session;
    if (
      typeof sid !== "string" ||
      sid.length === 0 ||
      typeof csrf !== "string" ||
      csrf.length === 0
    ) {
      return undefined;
    }

    return { sid, csrf };
  }
}
