import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { OptimizeRouteRequest, OptimizeRouteResponse } from "./types.js";

export class RouteClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/routes", config);
  }

  /** Order stops from a depot and get navigation links */
  public async optimize(request: OptimizeRouteRequest): Promise<OptimizeRouteResponse> {
    return this.client.post<OptimizeRouteResponse>({
      path: "optimize",
      body: request,
    });
  }
}
