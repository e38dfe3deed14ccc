import { Controller, Get } from "@nestjs/common";
import { AppService } from "./app.service";
import type { HealthCheckBasic } from "./app.service";
import type { DhcpControllerStatus } from "./dhcp/dhcp.types";

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  // Liveness only; node reachability is reported under /status
  @Get("health")
  getHealth(): HealthCheckBasic {
    return this.appService.getBasicHealth();
  }

  @Get("status")
  getStatus(): DhcpControllerStatus {
    return this.appService.getStatus();
  }
}
