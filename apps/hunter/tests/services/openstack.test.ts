import { describe, expect, it } from "vitest";
import { CloudError, OpenStackClient } from "../../src/services/openstack.js";
import { logger } from "../helpers/fixtures.js";

interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function empty(status: number): Response {
  return new Response(null, { status });
}

/**
 * Replays canned responses in order and records every request
 */
function fakeFetch(responses: Array<Response | Error>) {
  const requests: RecordedRequest[] = [];

  const impl: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });

    const next = responses.shift();
    if (!next) {
      throw new Error("Unexpected request");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };

  return { impl, requests };
}

function client(
  fetchImpl: typeof fetch,
  projectId?: string,
  { requestTimeoutMs = 1000, maxRetries = 2 }: { requestTimeoutMs?: number; maxRetries?: number } = {}
): OpenStackClient {
  return new OpenStackClient({
    networkUrl: "https://network.test/",
    computeUrl: "https://compute.test",
    authToken: "test-token",
    projectId,
    requestTimeoutMs,
    retry: { maxRetries, backoffFactorMs: 0, maxBackoffMs: 0 },
    logger,
    fetch: fetchImpl,
  });
}

/**
 * A 200 response whose body fails while it is being read
 */
function brokenBody(error: Error): Response {
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(error);
    },
  });
  return new Response(stream, { status: 200 });
}

const neutronPort = {
  id: "port-1",
  network_id: "ext-net",
  device_id: "",
  device_owner: "",
  status: "DOWN",
  fixed_ips: [{ ip_address: "10.0.0.15", subnet_id: "subnet-1" }],
};

describe("OpenStackClient", () => {
  it("creates a port on the network and maps the response", async () => {
    const { impl, requests } = fakeFetch([json(201, { port: neutronPort })]);

    const port = await client(impl).createPort("ext-net");

    expect(port).toEqual({
      id: "port-1",
      networkId: "ext-net",
      deviceId: null,
      deviceOwner: "",
      status: "DOWN",
      addresses: ["10.0.0.15"],
    });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://network.test/v2.0/ports");
    expect(requests[0]?.method).toBe("POST");
    expect(requests[0]?.headers.get("X-Auth-Token")).toBe("test-token");
    expect(requests[0]?.body).toEqual({ port: { network_id: "ext-net", admin_state_up: true } });
  });

  it("attaches a port through the compute API", async () => {
    const { impl, requests } = fakeFetch([json(200, { interfaceAttachment: { port_id: "port-1" } })]);

    await client(impl).attachPort("vm-1", "port-1");

    expect(requests[0]?.url).toBe("https://compute.test/v2.1/servers/vm-1/os-interface");
    expect(requests[0]?.body).toEqual({ interfaceAttachment: { port_id: "port-1" } });
  });

  it("treats a port without fixed IPs as having no address", async () => {
    const { impl } = fakeFetch([json(200, { port: { ...neutronPort, device_id: "vm-1", fixed_ips: [] } })]);

    const port = await client(impl).getPort("port-1");

    expect(port.deviceId).toBe("vm-1");
    expect(port.addresses).toEqual([]);
  });

  it("retries server errors and succeeds", async () => {
    const { impl, requests } = fakeFetch([empty(503), json(200, { port: neutronPort })]);

    const port = await client(impl).getPort("port-1");

    expect(port.id).toBe("port-1");
    expect(requests).toHaveLength(2);
  });

  it("retries dropped connections", async () => {
    const { impl, requests } = fakeFetch([new TypeError("fetch failed"), json(200, { ports: [] })]);

    await expect(client(impl).listPorts()).resolves.toEqual([]);
    expect(requests).toHaveLength(2);
  });

  it("surfaces the last error once retries are exhausted", async () => {
    const { impl, requests } = fakeFetch([empty(502), empty(502), empty(502)]);

    const error = await client(impl).getPort("port-1").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CloudError);
    expect(error instanceof CloudError && error.status).toBe(502);
    expect(requests).toHaveLength(3);
  });

  it("does not retry client errors", async () => {
    const { impl, requests } = fakeFetch([json(400, { NeutronError: { message: "Invalid input" } })]);

    await expect(client(impl).createPort("ext-net")).rejects.toThrow("Cloud API error 400 (createPort)");
    expect(requests).toHaveLength(1);
  });

  it("treats a missing port as already detached and deleted", async () => {
    const { impl, requests } = fakeFetch([empty(404), empty(404)]);
    const cloud = client(impl);

    await expect(cloud.detachPort("vm-1", "port-1")).resolves.toBeUndefined();
    await expect(cloud.deletePort("port-1")).resolves.toBeUndefined();
    expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
      "DELETE https://compute.test/v2.1/servers/vm-1/os-interface/port-1",
      "DELETE https://network.test/v2.0/ports/port-1",
    ]);
  });

  it("reports other delete failures", async () => {
    const { impl } = fakeFetch([empty(409)]);

    await expect(client(impl).deletePort("port-1")).rejects.toBeInstanceOf(CloudError);
  });

  it("filters the port list by project", async () => {
    const { impl, requests } = fakeFetch([json(200, { ports: [neutronPort] })]);

    const ports = await client(impl, "project-1").listPorts();

    expect(ports.map((port) => port.id)).toEqual(["port-1"]);
    expect(requests[0]?.url).toBe("https://network.test/v2.0/ports?project_id=project-1");
  });

  it("rejects responses that are not ports", async () => {
    const { impl, requests } = fakeFetch([json(200, { server: {} })]);

    await expect(client(impl).getPort("port-1")).rejects.toThrow("unexpected response");
    expect(requests).toHaveLength(1);
  });

  it("gives up on a request that does not answer within the timeout", async () => {
    let requests = 0;
    const hanging: typeof fetch = (_input, init) => {
      requests++;
      const signal = init?.signal;
      return new Promise<Response>((_resolve, reject) => {
        if (signal) {
          signal.addEventListener("abort", () => reject(signal.reason), { once: true });
        }
      });
    };

    const startedAt = Date.now();
    const error = await client(hanging, undefined, { requestTimeoutMs: 20, maxRetries: 1 })
      .listPorts()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CloudError);
    expect(error instanceof CloudError && error.message).toBe(
      "Cloud API request failed (listPorts): timed out after 20ms"
    );
    expect(error instanceof CloudError && error.transient).toBe(true);
    expect(requests).toBe(2);
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });

  it("retries when the response body times out while streaming", async () => {
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    const { impl, requests } = fakeFetch([brokenBody(timeout), json(200, { ports: [] })]);

    await expect(client(impl).listPorts()).resolves.toEqual([]);
    expect(requests).toHaveLength(2);
  });

  it("reports a body that keeps failing as a transient error", async () => {
    const { impl } = fakeFetch([
      brokenBody(new TypeError("terminated")),
      brokenBody(new TypeError("terminated")),
      brokenBody(new TypeError("terminated")),
    ]);

    const error = await client(impl).deletePort("port-1").catch((err: unknown) => err);

    expect(error instanceof CloudError && error.message).toBe("Cloud API request failed (deletePort): terminated");
    expect(error instanceof CloudError && error.transient).toBe(true);
  });
});
