/**
 * Chat-style front end.
 *
 * Mirrors a messaging bot: `/start` explains usage, `/depot <address>` or a
 * shared location sets the depot, and any other text is a stop list with
 * one address (or "lat, lng") per line.
 */

import type { Coordinate, LabeledPoint, RoutePlan } from "@stopwise/types";
import type { AddressResolver } from "@stopwise/geocoding";
import { TooManyStopsError } from "@stopwise/routing";
import type { ChatReplyResponse } from "../models/responses.js";
import type { DepotStore } from "./depot-store.service.js";
import { DEPOT_LABEL, type RouteOptimizationService } from "./route-optimization.service.js";

export interface ChatMessage {
  text?: string;
  location?: Coordinate;
}

export const WELCOME_MESSAGE =
  "Welcome to Stopwise.\n" +
  "Use /depot <address> to set your starting point, or share your location.\n" +
  "Then send your stops, one address per line, to get an optimized route.";

export const DEPOT_USAGE_MESSAGE =
  "Send /depot followed by an address, or share your location.";

export const DEPOT_REQUIRED_MESSAGE =
  "Set a depot first with /depot or by sharing your location.";

export const NO_STOPS_MESSAGE = "Send at least one address, one per line.";

const COMMAND_PATTERN = /^\/(\w+)(?:@\w+)?(?:\s+([\s\S]*))?$/;

export class ConversationService {
  constructor(
    private readonly geocoder: AddressResolver,
    private readonly depots: DepotStore,
    private readonly routes: RouteOptimizationService,
  ) {}

  async handle(userId: string, message: ChatMessage): Promise<ChatReplyResponse> {
    if (message.location) {
      return this.setDepot(userId, message.location);
    }

    const text = message.text?.trim() ?? "";
    const command = COMMAND_PATTERN.exec(text);
    if (command) {
      const [, name = "", args = ""] = command;
      switch (name.toLowerCase()) {
        case "start":
        case "help":
          return { reply: WELCOME_MESSAGE };
        case "depot":
          return this.depotCommand(userId, args.trim());
        default:
          return { reply: `Unknown command: /${name}` };
      }
    }

    return this.planStops(userId, text);
  }

  private async depotCommand(userId: string, address: string): Promise<ChatReplyResponse> {
    if (!address) {
      return { reply: DEPOT_USAGE_MESSAGE };
    }
    let coordinate: Coordinate;
    try {
      coordinate = await this.geocoder.geocode(address);
    } catch (err) {
      return { reply: `Could not geocode the address: ${address}\n${errorMessage(err)}` };
    }
    return this.setDepot(userId, coordinate);
  }

  private async setDepot(userId: string, coordinate: Coordinate): Promise<ChatReplyResponse> {
    await this.depots.set(userId, { coordinate, label: DEPOT_LABEL });
    console.log(`[sessions] Depot set for ${userId}`);
    return {
      reply:
        `Depot set at (${coordinate.lat.toFixed(5)}, ${coordinate.lng.toFixed(5)}). ` +
        "Send your stops to optimize.",
    };
  }

  private async planStops(userId: string, text: string): Promise<ChatReplyResponse> {
    const stored = await this.depots.get(userId);
    if (!stored) {
      return { reply: DEPOT_REQUIRED_MESSAGE };
    }

    const lines = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    if (lines.length === 0) {
      return { reply: NO_STOPS_MESSAGE };
    }

    try {
      this.routes.checkStopCount(lines.length);
    } catch (err) {
      if (err instanceof TooManyStopsError) return { reply: err.message };
      throw err;
    }

    const stops: LabeledPoint[] = [];
    for (const line of lines) {
      try {
        stops.push({ coordinate: await this.geocoder.geocode(line), label: line });
      } catch (err) {
        return { reply: `Could not geocode ${line}: ${errorMessage(err)}` };
      }
    }

    const plan = this.routes.plan(stored.depot, stops);
    return { reply: formatRouteReply(plan), plan };
  }
}

/**
 * Render a plan as chat text: the numbered stop order, then one line per
 * navigation leg.
 */
export function formatRouteReply(plan: RoutePlan): string {
  const order = plan.stops.map((stop) => `${stop.position}. ${stop.label}`).join("\n");
  const legs = plan.legs.map((leg) => `\n\nLeg ${leg.index}: ${leg.url}`).join("");
  return `Optimized stop order:\n${order}${legs}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
