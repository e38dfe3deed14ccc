import "reflect-metadata";
import "dotenv/config";
import { INestApplicationContext, Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { FatalConfigurationError } from "./dhcp/dhcp.config";
import { DhcpElectionEnforcerService } from "./dhcp/election-enforcer.service";
import { resolveEnvFileVariables } from "./utils/env-file";

function resolveLogLevels(): LogLevel[] {
  return process.env.LOG_LEVEL === "debug"
    ? ["error", "warn", "log", "debug", "verbose"]
    : ["error", "warn", "log"];
}

async function runOnce(app: INestApplicationContext, logger: Logger) {
  const report = await app.get(DhcpElectionEnforcerService).runCycle();
  await app.close();

  const failed = report.nodes.filter((node) => node.outcome.status === "error");
  if (failed.length > 0) {
    logger.warn(
      `Single cycle finished with errors on: ${failed.map((node) => node.name).join(", ")}`,
    );
    process.exitCode = 1;
  }
}

async function bootstrap() {
  const logger = new Logger("Bootstrap");
  resolveEnvFileVariables();

  const statusApiEnabled = process.env.STATUS_API_ENABLED !== "false";
  const singleCycle = process.env.RUN_ONCE === "true";
  const logLevels = resolveLogLevels();

  if (singleCycle || !statusApiEnabled) {
    const context = await NestFactory.createApplicationContext(AppModule, {
      abortOnError: false,
      logger: logLevels,
    });

    if (singleCycle) {
      logger.log("RUN_ONCE=true: running a single check cycle.");
      await runOnce(context, logger);
      return;
    }

    context.enableShutdownHooks();
    logger.log("Status API disabled (STATUS_API_ENABLED=false).");
    return;
  }

  const app = await NestFactory.create(AppModule, {
    abortOnError: false,
    logger: logLevels,
  });
  app.setGlobalPrefix("api");
  app.enableShutdownHooks();

  const port = process.env.PORT || 3000;
  await app.listen(port);
  logger.log(`Status API available at: http://localhost:${port}/api/status`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger("Bootstrap");
  if (error instanceof FatalConfigurationError) {
    logger.error(`Configuration error: ${error.message}`);
  } else {
    logger.error(
      "Failed to start DHCP controller",
      error instanceof Error ? error.stack : String(error),
    );
  }
  process.exit(1);
});
