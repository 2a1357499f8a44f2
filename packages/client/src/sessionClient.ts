import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  ChatMessageRequest,
  ChatReplyResponse,
  DepotResponse,
  OptimizeRouteResponse,
  PointInput,
  SessionRouteRequest,
} from "./types.js";

/** Per-user depot sessions and the chat endpoint */
export class SessionClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/sessions", config);
  }

  public async getDepot(userId: string): Promise<DepotResponse> {
    return this.client.get<DepotResponse>({ path: `${encodeURIComponent(userId)}/depot` });
  }

  /** Create or overwrite the user's depot */
  public async setDepot(userId: string, depot: PointInput): Promise<DepotResponse> {
    return this.client.put<DepotResponse>({
      path: `${encodeURIComponent(userId)}/depot`,
      body: depot,
    });
  }

  public async clearDepot(userId: string): Promise<void> {
    await this.client.delete<unknown>({ path: `${encodeURIComponent(userId)}/depot` });
  }

  /** Plan stops from the user's stored depot */
  public async planRoute(
    userId: string,
    request: SessionRouteRequest,
  ): Promise<OptimizeRouteResponse> {
    return this.client.post<OptimizeRouteResponse>({
      path: `${encodeURIComponent(userId)}/route`,
      body: request,
    });
  }

  public async sendMessage(
    userId: string,
    message: ChatMessageRequest,
  ): Promise<ChatReplyResponse> {
    return this.client.post<ChatReplyResponse>({
      path: `${encodeURIComponent(userId)}/messages`,
      body: message,
    });
  }
}
