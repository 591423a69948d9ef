import { z } from "zod";
import type { Port } from "@port-hunter/shared";
import type { Logger } from "../logger.js";
import { withRetry, type RetryPolicy } from "./retry.js";

const RETRYABLE_STATUSES = new Set([500, 502, 503, 504]);

/**
 * Operations the hunter needs from the cloud control plane
 */
export interface CloudClient {
  createPort(networkId: string): Promise<Port>;
  getPort(portId: string): Promise<Port>;
  attachPort(instanceId: string, portId: string): Promise<void>;
  /** Resolves when the port is already detached */
  detachPort(instanceId: string, portId: string): Promise<void>;
  /** Resolves when the port is already gone */
  deletePort(portId: string): Promise<void>;
  listPorts(): Promise<Port[]>;
}

export class CloudError extends Error {
  status?: number;
  operation: string;
  transient: boolean;

  constructor(operation: string, message: string, options: { status?: number; transient?: boolean; cause?: unknown } = {}) {
    const prefix = options.status ? `Cloud API error ${options.status}` : "Cloud API request failed";
    super(`${prefix} (${operation}): ${message}`, { cause: options.cause });
    this.name = "CloudError";
    this.operation = operation;
    this.status = options.status;
    this.transient = options.transient ?? (options.status !== undefined && RETRYABLE_STATUSES.has(options.status));
  }

  get notFound(): boolean {
    return this.status === 404;
  }
}

/**
 * Retry server-side failures, timeouts and dropped connections
 */
export function isTransientCloudError(error: unknown): boolean {
  return error instanceof CloudError && error.transient;
}

const FixedIpSchema = z.object({
  ip_address: z.string(),
  subnet_id: z.string().optional(),
});

const NeutronPortSchema = z.object({
  id: z.string(),
  network_id: z.string(),
  device_id: z.string().nullish(),
  device_owner: z.string().nullish(),
  status: z.string().optional(),
  fixed_ips: z.array(FixedIpSchema).nullish(),
});

const PortEnvelopeSchema = z.object({ port: NeutronPortSchema });
const PortListSchema = z.object({ ports: z.array(NeutronPortSchema) });

type NeutronPort = z.infer<typeof NeutronPortSchema>;

function toPort(raw: NeutronPort): Port {
  return {
    id: raw.id,
    networkId: raw.network_id,
    deviceId: raw.device_id ? raw.device_id : null,
    deviceOwner: raw.device_owner ?? undefined,
    status: raw.status,
    addresses: (raw.fixed_ips ?? []).map((ip) => ip.ip_address),
  };
}

export interface OpenStackClientOptions {
  /** Network API base, e.g. https://cloud.example.com:9696 */
  networkUrl: string;
  /** Compute API base, e.g. https://cloud.example.com:8774 */
  computeUrl: string;
  authToken: string;
  projectId?: string;
  requestTimeoutMs: number;
  retry: Omit<RetryPolicy, "isRetryable">;
  logger: Logger;
  fetch?: typeof fetch;
}

/**
 * OpenStack-compatible network and compute API client
 */
export class OpenStackClient implements CloudClient {
  private networkUrl: string;
  private computeUrl: string;
  private authToken: string;
  private projectId?: string;
  private requestTimeoutMs: number;
  private retry: RetryPolicy;
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(options: OpenStackClientOptions) {
    this.networkUrl = options.networkUrl.replace(/\/$/, "");
    this.computeUrl = options.computeUrl.replace(/\/$/, "");
    this.authToken = options.authToken;
    this.projectId = options.projectId;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.retry = { ...options.retry, isRetryable: isTransientCloudError };
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async request(
    operation: string,
    method: string,
    url: string,
    body?: Record<string, unknown>
  ): Promise<unknown> {
    return withRetry(
      this.retry,
      () => this.send(operation, method, url, body),
      (error, retry, delayMs) => {
        this.logger.warn(
          { operation, retry, delayMs, err: error },
          `Transient failure on ${operation}, retrying in ${delayMs}ms`
        );
      }
    );
  }

  private async send(
    operation: string,
    method: string,
    url: string,
    body?: Record<string, unknown>
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      "X-Auth-Token": this.authToken,
      Accept: "application/json",
    };
    if (body) {
      headers["Content-Type"] = "application/json";
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      // The timeout still applies while the body streams
      text = await response.text();
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
      const message = timedOut
        ? `timed out after ${this.requestTimeoutMs}ms`
        : error instanceof Error ? error.message : String(error);
      throw new CloudError(operation, message, { transient: true, cause: error });
    }

    if (!response.ok) {
      throw new CloudError(operation, text ? `${response.statusText} - ${text}` : response.statusText, {
        status: response.status,
      });
    }

    if (!text) {
      return undefined;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new CloudError(operation, "response is not valid JSON", { cause: error });
    }
  }

  private parse<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new CloudError(operation, `unexpected response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  /**
   * Create a port on a network
   */
  async createPort(networkId: string): Promise<Port> {
    const data = await this.request("createPort", "POST", `${this.networkUrl}/v2.0/ports`, {
      port: {
        network_id: networkId,
        admin_state_up: true,
      },
    });
    return toPort(this.parse("createPort", PortEnvelopeSchema, data).port);
  }

  /**
   * Get a port, including its fixed IPs
   */
  async getPort(portId: string): Promise<Port> {
    const data = await this.request(
      "getPort",
      "GET",
      `${this.networkUrl}/v2.0/ports/${encodeURIComponent(portId)}`
    );
    return toPort(this.parse("getPort", PortEnvelopeSchema, data).port);
  }

  /**
   * Attach a port to an instance
   */
  async attachPort(instanceId: string, portId: string): Promise<void> {
    await this.request(
      "attachPort",
      "POST",
      `${this.computeUrl}/v2.1/servers/${encodeURIComponent(instanceId)}/os-interface`,
      { interfaceAttachment: { port_id: portId } }
    );
  }

  async detachPort(instanceId: string, portId: string): Promise<void> {
    try {
      await this.request(
        "detachPort",
        "DELETE",
        `${this.computeUrl}/v2.1/servers/${encodeURIComponent(instanceId)}/os-interface/${encodeURIComponent(portId)}`
      );
    } catch (error) {
      if (error instanceof CloudError && error.notFound) {
        this.logger.debug({ portId }, "Port already detached");
        return;
      }
      throw error;
    }
  }

  async deletePort(portId: string): Promise<void> {
    try {
      await this.request("deletePort", "DELETE", `${this.networkUrl}/v2.0/ports/${encodeURIComponent(portId)}`);
    } catch (error) {
      if (error instanceof CloudError && error.notFound) {
        this.logger.debug({ portId }, "Port already deleted");
        return;
      }
      throw error;
    }
  }

  /**
   * List ports visible to the project
   */
  async listPorts(): Promise<Port[]> {
    const query = this.projectId ? `?project_id=${encodeURIComponent(this.projectId)}` : "";
    const data = await this.request("listPorts", "GET", `${this.networkUrl}/v2.0/ports${query}`);
    return this.parse("listPorts", PortListSchema, data).ports.map(toPort);
  }
}
