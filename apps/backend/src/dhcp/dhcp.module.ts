import { Module } from "@nestjs/common";
import { DhcpConfigMutatorService } from "./config-mutator.service";
import { DhcpCycleReporterService } from "./cycle-reporter.service";
import { loadControllerOptions, loadDhcpNodeConfigs } from "./dhcp.config";
import {
  DHCP_CONTROLLER_OPTIONS_TOKEN,
  DHCP_NODES_TOKEN,
} from "./dhcp.constants";
import type { DhcpControllerOptions, DhcpNodeConfig } from "./dhcp.types";
import { DhcpElectionEnforcerService } from "./election-enforcer.service";
import { DhcpHealthProbeService } from "./health-probe.service";
import { DhcpNodeHttpService } from "./node-http.service";
import { DhcpNodeSessionService } from "./node-session.service";

@Module({
  providers: [
    {
      provide: DHCP_NODES_TOKEN,
      // Throws FatalConfigurationError when a mandatory node is incomplete
      useFactory: (): DhcpNodeConfig[] => loadDhcpNodeConfigs(process.env),
    },
    {
      provide: DHCP_CONTROLLER_OPTIONS_TOKEN,
      useFactory: (): DhcpControllerOptions =>
        loadControllerOptions(process.env),
    },
    DhcpNodeHttpService,
    DhcpCycleReporterService,
    DhcpNodeSessionService,
    DhcpHealthProbeService,
    DhcpConfigMutatorService,
    DhcpElectionEnforcerService,
  ],
  exports: [DhcpElectionEnforcerService, DhcpCycleReporterService],
})
export class DhcpModule {}
