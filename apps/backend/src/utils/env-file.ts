import { existsSync, readFileSync } from "fs";
import { Logger } from "@nestjs/common";
import { DEFAULT_DHCP_NODE_IDS } from "../dhcp/dhcp.constants";

const logger = new Logger("EnvFile");

function readSecretFile(
  fileEnvVar: string,
  filePath: string,
): string | undefined {
  if (!existsSync(filePath)) {
    logger.error(`${fileEnvVar} points at "${filePath}", which does not exist`);
    return undefined;
  }

  try {
    return readFileSync(filePath, "utf-8").trim();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error(`Could not read ${fileEnvVar} (${filePath}): ${reason}`);
    return undefined;
  }
}

/**
 * Reads `VAR`, or the trimmed contents of the file named by `VAR_FILE` when
 * that is set. Docker Swarm and Kubernetes mount secrets this way
 * (e.g. `/run/secrets/primary_password`).
 *
 * @example
 * // With DHCP_PRIMARY_PASSWORD_FILE=/run/secrets/primary_password
 * const password = getEnvOrFile("DHCP_PRIMARY_PASSWORD");
 */
export function getEnvOrFile(
  envVar: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = env[fileEnvVar]?.trim();

  return filePath ? readSecretFile(fileEnvVar, filePath) : env[envVar];
}

export function nodeEnvKey(nodeId: string): string {
  return nodeId.replace(/[^A-Za-z0-9]/g, "").toUpperCase();
}

export function listConfiguredNodeIds(
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const raw = env.DHCP_NODES?.trim();
  if (!raw) {
    return [...DEFAULT_DHCP_NODE_IDS];
  }

  return raw
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);
}

/**
 * Copies every node password held in a `_FILE` secret into the environment
 * so the configuration factories only ever read plain variables. Both the
 * `DHCP_<NODE>_PASSWORD` form and the older `<NODE>_PIHOLE_TOKEN` form are
 * resolved. A non-blank value already in the environment is left alone; a
 * blank one counts as unset.
 */
export function resolveEnvFileVariables(
  env: NodeJS.ProcessEnv = process.env,
): void {
  for (const nodeId of listConfiguredNodeIds(env)) {
    const key = nodeEnvKey(nodeId);

    for (const envVar of [`DHCP_${key}_PASSWORD`, `${key}_PIHOLE_TOKEN`]) {
      if (!env[`${envVar}_FILE`]?.trim() || env[envVar]?.trim()) {
        continue;
      }

      const value = getEnvOrFile(envVar, env);
      if (value) {
        env[envVar] = value;
        logger.log(`Loaded ${envVar} from ${envVar}_FILE`);
      }
    }
  }
}
