import { Logger } from "@nestjs/common";
import { listConfiguredNodeIds, nodeEnvKey } from "../utils/env-file";
import { isDhcpApiGeneration } from "./api-generation";
import {
  DEFAULT_AUTH_FAILURE_STATUSES,
  DEFAULT_CHECK_INTERVAL_SECONDS,
  DEFAULT_HEALTH_PATH,
  DEFAULT_LOGIN_TIMEOUT_MS,
  DEFAULT_MUTATION_TIMEOUT_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  MAX_CHECK_INTERVAL_SECONDS,
  MAX_TIMER_DELAY_MS,
  MIN_DHCP_NODES,
} from "./dhcp.constants";
import type {
  DhcpApiGeneration,
  DhcpControllerOptions,
  DhcpNodeConfig,
} from "./dhcp.types";

/** Startup configuration that cannot be recovered from; the process exits. */
export class FatalConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalConfigurationError";
  }
}

export function normalizeBaseUrl(address: string): string {
  const trimmed = address.trim();
  const withScheme =
    /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  return withScheme.replace(/\/+$/, "");
}

function defaultNodeName(nodeId: string): string {
  return nodeId.charAt(0).toUpperCase() + nodeId.slice(1);
}

function readNonEmpty(
  env: NodeJS.ProcessEnv,
  ...names: string[]
): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

function parseApiGeneration(
  env: NodeJS.ProcessEnv,
  key: string,
): DhcpApiGeneration {
  const raw = (env[`DHCP_${key}_API`] ?? "").trim().toLowerCase();
  if (!raw) {
    return "v6";
  }

  if (!isDhcpApiGeneration(raw)) {
    throw new FatalConfigurationError(
      `DHCP_${key}_API must be "v6" or "legacy" (got "${raw}").`,
    );
  }

  return raw;
}

/**
 * Builds the ordered node list. The first {@link MIN_DHCP_NODES} ids are
 * mandatory; later ids are optional and skipped when incomplete.
 *
 * For a node id `primary` the address is read from `DHCP_PRIMARY_ADDRESS`
 * (falling back to `PRIMARY_PIHOLE_IP`) and the password from
 * `DHCP_PRIMARY_PASSWORD` (falling back to `PRIMARY_PIHOLE_TOKEN`).
 */
export function loadDhcpNodeConfigs(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = new Logger("DhcpConfig"),
): DhcpNodeConfig[] {
  const ids = listConfiguredNodeIds(env);

  if (ids.length < MIN_DHCP_NODES) {
    throw new FatalConfigurationError(
      `At least ${MIN_DHCP_NODES} DHCP nodes are required (DHCP_NODES lists ${ids.length}).`,
    );
  }

  const seenKeys = new Set<string>();
  const configs: DhcpNodeConfig[] = [];

  ids.forEach((id, index) => {
    const key = nodeEnvKey(id);
    if (!key) {
      throw new FatalConfigurationError(
        `DHCP node id "${id}" must contain at least one letter or digit.`,
      );
    }
    if (seenKeys.has(key)) {
      throw new FatalConfigurationError(
        `DHCP node id "${id}" is listed more than once.`,
      );
    }
    seenKeys.add(key);

    const address = readNonEmpty(
      env,
      `DHCP_${key}_ADDRESS`,
      `${key}_PIHOLE_IP`,
    );
    const password = readNonEmpty(
      env,
      `DHCP_${key}_PASSWORD`,
      `${key}_PIHOLE_TOKEN`,
    );
    const mandatory = index < MIN_DHCP_NODES;

    if (!address || !password) {
      const missing = [
        address ? undefined : `DHCP_${key}_ADDRESS`,
        password ? undefined : `DHCP_${key}_PASSWORD`,
      ].filter((name): name is string => name !== undefined);

      if (mandatory) {
        throw new FatalConfigurationError(
          `Node "${id}" is required but ${missing.join(" and ")} ${missing.length > 1 ? "are" : "is"} not set.`,
        );
      }

      if (address || password) {
        logger.warn(
          `Skipping optional node "${id}" because ${missing.join(" and ")} is not set.`,
        );
      }
      return;
    }

    configs.push({
      id,
      name: readNonEmpty(env, `DHCP_${key}_NAME`) ?? defaultNodeName(id),
      baseUrl: normalizeBaseUrl(address),
      password,
      priority: configs.length,
      apiGeneration: parseApiGeneration(env, key),
    });
  });

  logger.log(
    `Configured for ${configs.length} DHCP nodes: ${configs.map((node) => node.name).join(", ")}.`,
  );

  return configs;
}

function parsePositiveInt(
  raw: string | undefined,
  fallback: number,
  name: string,
  logger: Logger,
  max: number,
): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn(
      `${name}="${raw}" is not a positive integer; using ${fallback}.`,
    );
    return fallback;
  }

  if (value > max) {
    logger.warn(`${name}=${value} is above the maximum of ${max}; using ${max}.`);
    return max;
  }

  return value;
}

function parseStatusList(
  raw: string | undefined,
  logger: Logger,
): number[] {
  if (!raw || raw.trim() === "") {
    return [...DEFAULT_AUTH_FAILURE_STATUSES];
  }

  const statuses: number[] = [];
  for (const entry of raw.split(",")) {
    const value = Number(entry.trim());
    if (Number.isInteger(value) && value >= 400 && value < 500) {
      statuses.push(value);
    } else if (entry.trim()) {
      logger.warn(
        `Ignoring "${entry.trim()}" in DHCP_AUTH_FAILURE_STATUSES; only 4xx statuses are accepted.`,
      );
    }
  }

  return statuses.length > 0 ? statuses : [...DEFAULT_AUTH_FAILURE_STATUSES];
}

export function loadControllerOptions(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = new Logger("DhcpConfig"),
): DhcpControllerOptions {
  const healthPath = (env.HEALTH_PATH ?? "").trim() || DEFAULT_HEALTH_PATH;

  return {
    checkIntervalMs:
      parsePositiveInt(
        env.CHECK_INTERVAL,
        DEFAULT_CHECK_INTERVAL_SECONDS,
        "CHECK_INTERVAL",
        logger,
        MAX_CHECK_INTERVAL_SECONDS,
      ) * 1000,
    probeTimeoutMs: parsePositiveInt(
      env.PROBE_TIMEOUT_MS,
      DEFAULT_PROBE_TIMEOUT_MS,
      "PROBE_TIMEOUT_MS",
      logger,
      MAX_TIMER_DELAY_MS,
    ),
    loginTimeoutMs: parsePositiveInt(
      env.LOGIN_TIMEOUT_MS,
      DEFAULT_LOGIN_TIMEOUT_MS,
      "LOGIN_TIMEOUT_MS",
      logger,
      MAX_TIMER_DELAY_MS,
    ),
    mutationTimeoutMs: parsePositiveInt(
      env.MUTATION_TIMEOUT_MS,
      DEFAULT_MUTATION_TIMEOUT_MS,
      "MUTATION_TIMEOUT_MS",
      logger,
      MAX_TIMER_DELAY_MS,
    ),
    healthPath: healthPath.startsWith("/") ? healthPath : `/${healthPath}`,
    authFailureStatuses: parseStatusList(env.DHCP_AUTH_FAILURE_STATUSES, logger),
    rejectUnauthorized: env.TLS_REJECT_UNAUTHORIZED !== "false",
    runOnce: env.RUN_ONCE === "true",
  };
}
