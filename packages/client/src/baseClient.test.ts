import { describe, it, expect } from "vitest";
import axios, {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type InternalAxiosRequestConfig,
} from "axios";
import { ApiError, BaseClient, type ClientConfig } from "./baseClient.js";

// Expose protected methods for testing via a thin subclass
class TestClient extends BaseClient {
  constructor(resource: string, config: ClientConfig) {
    super(resource, config);
  }
  public exposedBuildPath(params: { path?: string }) {
    return this.buildPath(params);
  }
  public exposedBuildConfig() {
    return this.buildConfig();
  }
}

/** axios instance whose adapter answers in-process and records requests */
function stubHttp(data: unknown = {}, status = 200) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const response = { data, status, statusText: "", headers: new AxiosHeaders(), config };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response,
      );
    }
    return response;
  };
  return { http: axios.create({ adapter }), calls };
}

const baseUrl = "http://localhost:3000";

describe("BaseClient", () => {
  describe("buildPath", () => {
    it("returns resource root when no sub-path", () => {
      const client = new TestClient("health", { baseUrl });
      expect(client.exposedBuildPath({})).toBe("/health");
    });

    it("appends sub-path to resource", () => {
      const client = new TestClient("api/routes", { baseUrl });
      expect(client.exposedBuildPath({ path: "optimize" })).toBe("/api/routes/optimize");
    });
  });

  describe("buildConfig", () => {
    it("sets baseURL and default timeout", () => {
      const config = new TestClient("api/routes", { baseUrl }).exposedBuildConfig();
      expect(config.baseURL).toBe("http://localhost:3000");
      expect(config.timeout).toBe(30000);
    });

    it("uses custom timeout when provided", () => {
      const client = new TestClient("api/routes", { baseUrl, timeout: 5000 });
      expect(client.exposedBuildConfig().timeout).toBe(5000);
    });

    it("sets JSON content headers", () => {
      const config = new TestClient("api/routes", { baseUrl }).exposedBuildConfig();
      expect(config.headers).toEqual({
        "Content-Type": "application/json",
        Accept: "application/json",
      });
    });
  });

  describe("requests", () => {
    it("sends through the configured axios instance", async () => {
      const { http, calls } = stubHttp({ ok: true });
      const client = new BaseClient("api/routes", { baseUrl, http });

      await expect(client.post({ path: "optimize", body: { stops: [] } })).resolves.toEqual({
        ok: true,
      });
      expect(calls).toHaveLength(1);
      expect(calls[0]!.method).toBe("post");
      expect(calls[0]!.baseURL).toBe("http://localhost:3000");
      expect(calls[0]!.url).toBe("/api/routes/optimize");
      expect(calls[0]!.data).toBe('{"stops":[]}');
    });

    it("turns an error response into an ApiError with the server's message", async () => {
      const { http } = stubHttp({ message: "No depot set for user u1" }, 404);
      const client = new BaseClient("api/sessions", { baseUrl, http });

      const error = await client.get({ path: "u1/depot" }).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 404, message: "No depot set for user u1" });
    });

    it("keeps validation details", async () => {
      const details = [{ path: ["stops"], message: "Required" }];
      const { http } = stubHttp({ message: "Validation failed", details }, 422);
      const client = new BaseClient("api/routes", { baseUrl, http });

      const error = await client.post({ path: "optimize", body: {} }).catch((err: unknown) => err);
      expect(error).toMatchObject({ status: 422, message: "Validation failed", details });
    });

    it("falls back to the axios message when the body has none", async () => {
      const { http } = stubHttp("Bad Gateway", 502);
      const client = new BaseClient("health", { baseUrl, http });

      const error = await client.get().catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        status: 502,
        message: "Request failed with status code 502",
      });
    });
  });
});
