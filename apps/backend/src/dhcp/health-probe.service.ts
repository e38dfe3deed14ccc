import { Inject, Injectable } from "@nestjs/common";
import { DhcpCycleReporterService } from "./cycle-reporter.service";
import { DHCP_CONTROLLER_OPTIONS_TOKEN } from "./dhcp.constants";
import type { DhcpControllerOptions, DhcpNodeRuntimeState } from "./dhcp.types";
import { DhcpNodeHttpService, describeRequestError } from "./node-http.service";

@Injectable()
export class DhcpHealthProbeService {
  constructor(
    private readonly http: DhcpNodeHttpService,
    @Inject(DHCP_CONTROLLER_OPTIONS_TOKEN)
    private readonly options: DhcpControllerOptions,
    private readonly reporter: DhcpCycleReporterService,
  ) {}

  /**
   * A node counts as reachable when its management interface answers below
   * 500, so a 401 or 404 from the health path still proves the host is up.
   * Session state is never read or sent.
   */
  async check(state: DhcpNodeRuntimeState): Promise<boolean> {
    let reachable = false;
    let detail = "";

    try {
      const status = await this.http.probe(
        state.node,
        this.options.healthPath,
        this.options.probeTimeoutMs,
      );
      reachable = status < 500;
      detail = `HTTP ${status}`;
    } catch (error) {
      detail = describeRequestError(error);
    }

    state.reachable = reachable;

    const ref = { nodeId: state.node.id, name: state.node.name };
    this.reporter.record(
      reachable ? { type: "online", ...ref } : { type: "offline", ...ref, detail },
    );

    return reachable;
  }
}
