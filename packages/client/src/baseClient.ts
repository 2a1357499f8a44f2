import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import type { ErrorResponse } from "./types.js";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** axios instance to send requests with (default: the global axios) */
  http?: AxiosInstance;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
}

/** A non-2xx answer from the API, carrying the server's error body */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;
  protected http: AxiosInstance;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
    this.http = config.http ?? axios;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(): AxiosRequestConfig {
    return {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    return this.send(() => this.http.get<T>(this.buildPath(params), this.buildConfig()));
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    return this.send(() =>
      this.http.post<T>(this.buildPath(params), params.body, this.buildConfig()),
    );
  }

  public async put<T>(params: RequestParams = {}): Promise<T> {
    return this.send(() =>
      this.http.put<T>(this.buildPath(params), params.body, this.buildConfig()),
    );
  }

  public async delete<T>(params: RequestParams = {}): Promise<T> {
    return this.send(() => this.http.delete<T>(this.buildPath(params), this.buildConfig()));
  }

  /** Unwrap the response body; error responses become {@link ApiError} */
  protected async send<T>(request: () => Promise<AxiosResponse<T>>): Promise<T> {
    try {
      const response = await request();
      return response.data;
    } catch (err) {
      if (axios.isAxiosError<Partial<ErrorResponse> | undefined>(err) && err.response) {
        const body = err.response.data;
        const message = typeof body?.message === "string" ? body.message : err.message;
        throw new ApiError(err.response.status, message, body?.details);
      }
      throw err;
    }
  }
}
