export const DHCP_NODES_TOKEN = "DHCP_NODES";
export const DHCP_CONTROLLER_OPTIONS_TOKEN = "DHCP_CONTROLLER_OPTIONS";

export const DHCP_AUTH_PATH = "/api/auth";
export const DHCP_CONFIG_PATH = "/api/config";

export const DEFAULT_DHCP_NODE_IDS = ["primary", "secondary", "tertiary"];
export const MIN_DHCP_NODES = 2;

export const DEFAULT_CHECK_INTERVAL_SECONDS = 60;
// setTimeout fires after 1 ms for any delay above 2^31 - 1 ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
export const MAX_CHECK_INTERVAL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);
export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;
export const DEFAULT_LOGIN_TIMEOUT_MS = 10_000;
export const DEFAULT_MUTATION_TIMEOUT_MS = 15_000;
export const DEFAULT_HEALTH_PATH = "/admin/";
export const DEFAULT_AUTH_FAILURE_STATUSES = [401, 403];
