import { describe, it, expect } from "vitest";
import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { HealthClient } from "./healthClient.js";
import { RouteClient } from "./routeClient.js";
import { SessionClient } from "./sessionClient.js";

function stubHttp(data: unknown = {}) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    return { data, status: 200, statusText: "OK", headers: {}, config };
  };
  return { http: axios.create({ adapter }), calls };
}

const baseUrl = "http://localhost:3000";

describe("SessionClient", () => {
  it("puts the depot under the encoded user id", async () => {
    const { http, calls } = stubHttp();
    await new SessionClient({ baseUrl, http }).setDepot("chat 42", { address: "Plaza Mayor" });

    expect(calls[0]!.method).toBe("put");
    expect(calls[0]!.url).toBe("/api/sessions/chat%2042/depot");
    expect(calls[0]!.data).toBe('{"address":"Plaza Mayor"}');
  });

  it("reads and clears the depot", async () => {
    const depot = {
      userId: "u1",
      depot: { coordinate: { lat: 1, lng: 2 }, label: "Depot" },
      updatedAt: "2026-01-02T03:04:05.000Z",
    };
    const { http, calls } = stubHttp(depot);
    const client = new SessionClient({ baseUrl, http });

    await expect(client.getDepot("u1")).resolves.toEqual(depot);
    await expect(client.clearDepot("u1")).resolves.toBeUndefined();
    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      "get /api/sessions/u1/depot",
      "delete /api/sessions/u1/depot",
    ]);
  });

  it("posts stop lists and chat messages", async () => {
    const { http, calls } = stubHttp({ reply: "ok" });
    const client = new SessionClient({ baseUrl, http });

    await client.planRoute("u1", { stops: [{ lat: 0, lng: 1 }], options: { chunkSize: 5 } });
    await client.sendMessage("u1", { text: "/start" });

    expect(calls[0]!.url).toBe("/api/sessions/u1/route");
    expect(calls[0]!.data).toBe('{"stops":[{"lat":0,"lng":1}],"options":{"chunkSize":5}}');
    expect(calls[1]!.url).toBe("/api/sessions/u1/messages");
    expect(calls[1]!.data).toBe('{"text":"/start"}');
  });
});

describe("RouteClient", () => {
  it("posts to /api/routes/optimize", async () => {
    const { http, calls } = stubHttp({ tour: [0] });
    const plan = await new RouteClient({ baseUrl, http }).optimize({
      depot: { lat: 0, lng: 0 },
      stops: [],
    });

    expect(plan).toEqual({ tour: [0] });
    expect(calls[0]!.url).toBe("/api/routes/optimize");
  });
});

describe("HealthClient", () => {
  it("gets /health", async () => {
    const { http, calls } = stubHttp({ status: "ok", uptime: 1, sessions: 0 });
    await expect(new HealthClient({ baseUrl, http }).getHealth()).resolves.toEqual({
      status: "ok",
      uptime: 1,
      sessions: 0,
    });
    expect(calls[0]!.url).toBe("/health");
  });
});
