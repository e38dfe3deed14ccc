import { Injectable } from "@nestjs/common";
import { DhcpCycleReporterService } from "./dhcp/cycle-reporter.service";
import type { DhcpControllerStatus } from "./dhcp/dhcp.types";
import { DhcpElectionEnforcerService } from "./dhcp/election-enforcer.service";

export interface HealthCheckBasic {
  status: "ok";
  timestamp: string;
  uptime: number;
}

@Injectable()
export class AppService {
  private readonly startTime = Date.now();

  constructor(
    private readonly enforcer: DhcpElectionEnforcerService,
    private readonly reporter: DhcpCycleReporterService,
  ) {}

  getBasicHealth(): HealthCheckBasic {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }

  /** Node roster plus the last completed cycle. Secrets never leave here. */
  getStatus(): DhcpControllerStatus {
    const lastCycle = this.reporter.getLastReport();
    return {
      nodes: this.enforcer.listNodes(),
      cycles: this.reporter.getCompletedCycles(),
      ...(lastCycle ? { lastCycle } : {}),
    };
  }
}
