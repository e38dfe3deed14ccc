import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from "@nestjs/common";
import { createNodeRuntimeState } from "./api-generation";
import { DhcpConfigMutatorService } from "./config-mutator.service";
import { DhcpCycleReporterService } from "./cycle-reporter.service";
import {
  DHCP_CONTROLLER_OPTIONS_TOKEN,
  DHCP_NODES_TOKEN,
  MAX_TIMER_DELAY_MS,
} from "./dhcp.constants";
import type {
  DhcpControllerOptions,
  DhcpCycleNodeReport,
  DhcpCycleReport,
  DhcpMutationOutcome,
  DhcpNodeConfig,
  DhcpNodeRuntimeState,
  DhcpNodeSummary,
} from "./dhcp.types";
import { byPriority, electLeader } from "./election";
import { DhcpHealthProbeService } from "./health-probe.service";

@Injectable()
export class DhcpElectionEnforcerService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(DhcpElectionEnforcerService.name);
  private readonly states: DhcpNodeRuntimeState[];

  private loop?: Promise<void>;
  private stopped = false;
  private wake?: () => void;
  private cycleCount = 0;

  // Skip the background loop in unit tests to avoid Jest open handle warnings
  private readonly enableBackgroundLoop = process.env.NODE_ENV !== "test";

  constructor(
    @Inject(DHCP_NODES_TOKEN)
    nodeConfigs: DhcpNodeConfig[],
    @Inject(DHCP_CONTROLLER_OPTIONS_TOKEN)
    private readonly options: DhcpControllerOptions,
    private readonly probe: DhcpHealthProbeService,
    private readonly mutator: DhcpConfigMutatorService,
    private readonly reporter: DhcpCycleReporterService,
  ) {
    this.states = nodeConfigs
      .map(createNodeRuntimeState)
      .sort(byPriority);
  }

  onApplicationBootstrap(): void {
    if (!this.enableBackgroundLoop || this.options.runOnce) {
      return;
    }

    this.start();
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    if (!this.loop) {
      return;
    }

    this.logger.log(
      `Stopping DHCP controller${signal ? ` (${signal})` : ""}...`,
    );
    await this.stop();
  }

  start(): void {
    if (this.loop) {
      return;
    }

    this.stopped = false;
    this.loop = this.runLoop();
  }

  /** Interrupts the sleep between cycles and waits for the loop to end. */
  async stop(): Promise<void> {
    this.stopped = true;
    this.wake?.();
    await this.loop;
    this.loop = undefined;
  }

  isRunning(): boolean {
    return this.loop !== undefined;
  }

  listNodes(): DhcpNodeSummary[] {
    return this.states.map(({ node, reachable, session }) => ({
      nodeId: node.id,
      name: node.name,
      baseUrl: node.baseUrl,
      priority: node.priority,
      apiGeneration: node.apiGeneration,
      reachable,
      authenticated: session !== undefined,
    }));
  }

  /** Probe, elect, converge. Every node gets exactly one apply per cycle. */
  async runCycle(): Promise<DhcpCycleReport> {
    const cycle = ++this.cycleCount;
    const startedAt = new Date().toISOString();
    this.logger.log(`--- Starting check cycle #${cycle} ---`);

    for (const state of this.states) {
      try {
        await this.probe.check(state);
      } catch (error) {
        state.reachable = false;
        this.logger.error(
          `Probe of ${state.node.name} failed unexpectedly: ${this.errorMessage(error)}`,
        );
      }
    }

    const leader = electLeader(this.states);
    if (leader) {
      this.reporter.record({
        type: "elected",
        nodeId: leader.node.id,
        name: leader.node.name,
      });
    } else {
      this.reporter.record({ type: "no-leader" });
    }

    const nodes: DhcpCycleNodeReport[] = [];
    for (const state of this.states) {
      const outcome = await this.applyIsolated(state, state === leader);
      nodes.push({
        nodeId: state.node.id,
        name: state.node.name,
        reachable: state.reachable,
        outcome,
      });
    }

    const report: DhcpCycleReport = {
      cycle,
      startedAt,
      finishedAt: new Date().toISOString(),
      electedNodeId: leader ? leader.node.id : null,
      nodes,
    };
    this.reporter.complete(report);
    return report;
  }

  private async applyIsolated(
    state: DhcpNodeRuntimeState,
    desiredEnabled: boolean,
  ): Promise<DhcpMutationOutcome> {
    try {
      return await this.mutator.apply(state, desiredEnabled);
    } catch (error) {
      const message = this.errorMessage(error);
      this.logger.error(
        `Applying DHCP state to ${state.node.name} failed unexpectedly: ${message}`,
      );
      return { status: "error", desiredEnabled, kind: "transient", message };
    }
  }

  private async runLoop(): Promise<void> {
    this.logger.log(
      `DHCP controller started (${this.states.length} nodes, interval ${this.options.checkIntervalMs / 1000}s).`,
    );

    while (!this.stopped) {
      try {
        await this.runCycle();
      } catch (error) {
        this.logger.error(
          `Check cycle failed: ${this.errorMessage(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
      }

      if (this.stopped) {
        break;
      }

      this.logger.log(
        `--- Cycle complete. Sleeping ${this.options.checkIntervalMs / 1000}s ---`,
      );
      await this.sleep(this.options.checkIntervalMs);
    }

    this.logger.log("DHCP controller stopped.");
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, Math.min(ms, MAX_TIMER_DELAY_MS));

      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }

  private errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
