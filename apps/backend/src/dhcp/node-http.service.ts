import { Inject, Injectable } from "@nestjs/common";
import axios, { AxiosResponse } from "axios";
import * as https from "https";
import { DHCP_CONTROLLER_OPTIONS_TOKEN } from "./dhcp.constants";
import type {
  DhcpControllerOptions,
  DhcpNodeConfig,
  DhcpNodeRuntimeState,
} from "./dhcp.types";

export interface DhcpNodeRequest {
  method: "GET" | "POST" | "PATCH";
  url: string;
  timeoutMs: number;
  params?: Record<string, string | boolean>;
  data?: unknown;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function describeRequestError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return `request timed out (${error.message})`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }

  return error instanceof Error ? error.message : "Unknown error";
}

/**
 * Thin axios wrapper for talking to one node. Every status is handed back to
 * the caller (no status throws); only transport failures reject.
 */
@Injectable()
export class DhcpNodeHttpService {
  private readonly httpsAgent: https.Agent;

  constructor(
    @Inject(DHCP_CONTROLLER_OPTIONS_TOKEN)
    options: DhcpControllerOptions,
  ) {
    this.httpsAgent = new https.Agent({
      rejectUnauthorized: options.rejectUnauthorized,
    });
  }

  /** Unauthenticated GET returning only the HTTP status. */
  async probe(
    node: DhcpNodeConfig,
    path: string,
    timeoutMs: number,
  ): Promise<number> {
    const response = await axios.request<unknown>({
      method: "GET",
      baseURL: node.baseUrl,
      url: path,
      timeout: timeoutMs,
      maxRedirects: 0,
      httpsAgent: this.httpsAgent,
      headers: this.defaultHeaders(node),
      validateStatus: () => true,
    });

    return response.status;
  }

  /**
   * Request carrying the node's captured cookies. Any `Set-Cookie` in the
   * response is folded back into `state.cookies`.
   */
  async request(
    state: DhcpNodeRuntimeState,
    request: DhcpNodeRequest,
  ): Promise<AxiosResponse<unknown>> {
    const cookie = this.cookieHeader(state.cookies, request.cookies ?? {});
    const headers: Record<string, string> = {
      ...this.defaultHeaders(state.node),
      ...(request.data !== undefined
        ? { "Content-Type": "application/json" }
        : {}),
      ...(cookie ? { Cookie: cookie } : {}),
      ...request.headers,
    };

    const response = await axios.request<unknown>({
      method: request.method,
      baseURL: state.node.baseUrl,
      url: request.url,
      params: request.params,
      data: request.data,
      timeout: request.timeoutMs,
      maxRedirects: 0,
      httpsAgent: this.httpsAgent,
      headers,
      validateStatus: () => true,
    });

    this.captureCookies(state.cookies, response);
    return response;
  }

  private defaultHeaders(node: DhcpNodeConfig): Record<string, string> {
    return {
      Accept: "application/json",
      Referer: `${node.baseUrl}/`,
    };
  }

  private cookieHeader(
    jar: Map<string, string>,
    extra: Record<string, string>,
  ): string {
    const merged = new Map(jar);
    for (const [name, value] of Object.entries(extra)) {
      merged.set(name, value);
    }

    return [...merged.entries()]
      .map(([name, value]) => `${name}=${value}`)
      .join("; ");
  }

  private captureCookies(
    jar: Map<string, string>,
    response: AxiosResponse<unknown>,
  ): void {
    const raw: unknown = response.headers?.["set-cookie"];
    let lines: unknown[] = [];
    if (Array.isArray(raw)) {
      lines = raw;
    } else if (typeof raw === "string") {
      lines = [raw];
    }

    for (const line of lines) {
      if (typeof line !== "string") {
        continue;
      }

      const [pair] = line.split(";");
      const separator = pair.indexOf("=");
      if (separator <= 0) {
        continue;
      }

      const name = pair.slice(0, separator).trim();
      const value = pair.slice(separator + 1).trim();
      const expired = /;\s*max-age=0\b/i.test(line);

      if (!value || expired) {
        jar.delete(name);
      } else {
        jar.set(name, value);
      }
    }
  }
}
