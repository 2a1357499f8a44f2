import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { FakeGeocoder } from "../testing/fake-geocoder.js";
import {
  ConversationService,
  DEPOT_REQUIRED_MESSAGE,
  DEPOT_USAGE_MESSAGE,
  NO_STOPS_MESSAGE,
  WELCOME_MESSAGE,
} from "./conversation.service.js";
import { InMemoryDepotStore } from "./depot-store.service.js";
import { RouteOptimizationService } from "./route-optimization.service.js";

const addresses = {
  "Plaza Mayor": { lat: 0, lng: 0 },
  A: { lat: 0, lng: 1 },
  B: { lat: 0, lng: 2 },
  C: { lat: 1, lng: 0 },
};

function setup() {
  const geocoder = new FakeGeocoder(addresses);
  const depots = new InMemoryDepotStore();
  const routes = new RouteOptimizationService(geocoder);
  return { geocoder, depots, conversation: new ConversationService(geocoder, depots, routes) };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ConversationService commands", () => {
  it("answers /start and /help with usage", async () => {
    const { conversation } = setup();
    await expect(conversation.handle("u1", { text: "/start" })).resolves.toEqual({
      reply: WELCOME_MESSAGE,
    });
    await expect(conversation.handle("u1", { text: "/help" })).resolves.toEqual({
      reply: WELCOME_MESSAGE,
    });
  });

  it("sets the depot from /depot <address>", async () => {
    const { conversation, depots } = setup();
    const result = await conversation.handle("u1", { text: "/depot Plaza Mayor" });
    expect(result.reply).toBe("Depot set at (0.00000, 0.00000). Send your stops to optimize.");
    expect((await depots.get("u1"))?.depot).toEqual({
      coordinate: { lat: 0, lng: 0 },
      label: "Depot",
    });
  });

  it("accepts a bot-name suffix and coordinates after /depot", async () => {
    const { conversation, depots } = setup();
    const result = await conversation.handle("u1", { text: "/depot@StopwiseBot 20.56912, -100.42088" });
    expect(result.reply).toBe(
      "Depot set at (20.56912, -100.42088). Send your stops to optimize.",
    );
    expect((await depots.get("u1"))?.depot.coordinate).toEqual({ lat: 20.56912, lng: -100.42088 });
  });

  it("explains /depot without an address", async () => {
    const { conversation } = setup();
    await expect(conversation.handle("u1", { text: "/depot" })).resolves.toEqual({
      reply: DEPOT_USAGE_MESSAGE,
    });
  });

  it("reports an address that cannot be geocoded and keeps no depot", async () => {
    const { conversation, depots } = setup();
    const result = await conversation.handle("u1", { text: "/depot Nowhere" });
    expect(result.reply).toBe("Could not geocode the address: Nowhere\nAddress not found: Nowhere");
    await expect(depots.get("u1")).resolves.toBeUndefined();
  });

  it("rejects unknown commands", async () => {
    const { conversation } = setup();
    await expect(conversation.handle("u1", { text: "/route" })).resolves.toEqual({
      reply: "Unknown command: /route",
    });
  });

  it("sets the depot from a shared location, overwriting the previous one", async () => {
    const { conversation, depots } = setup();
    await conversation.handle("u1", { text: "/depot Plaza Mayor" });
    const result = await conversation.handle("u1", { location: { lat: -33.45, lng: -70.66667 } });
    expect(result.reply).toBe("Depot set at (-33.45000, -70.66667). Send your stops to optimize.");
    expect((await depots.get("u1"))?.depot.coordinate).toEqual({ lat: -33.45, lng: -70.66667 });
  });
});

describe("ConversationService stop lists", () => {
  it("asks for a depot first", async () => {
    const { conversation, geocoder } = setup();
    await expect(conversation.handle("u1", { text: "A\nB" })).resolves.toEqual({
      reply: DEPOT_REQUIRED_MESSAGE,
    });
    expect(geocoder.queries).toEqual([]);
  });

  it("asks for stops when the message is blank", async () => {
    const { conversation } = setup();
    await conversation.handle("u1", { location: { lat: 0, lng: 0 } });
    await expect(conversation.handle("u1", { text: " \n\n " })).resolves.toEqual({
      reply: NO_STOPS_MESSAGE,
    });
  });

  it("replies with the stop order and one link per leg", async () => {
    const { conversation } = setup();
    await conversation.handle("u1", { location: { lat: 0, lng: 0 } });
    const result = await conversation.handle("u1", { text: "A\r\n\nB\n  C  " });

    expect(result.reply).toBe(
      "Optimized stop order:\n1. Depot\n2. A\n3. B\n4. C\n\n" +
        "Leg 1: https://www.google.com/maps/dir/?api=1&origin=0,0&destination=1,0&waypoints=0,1|0,2",
    );
    expect(result.plan?.tour).toEqual([0, 1, 2, 3]);
  });

  it("names the line that failed to geocode", async () => {
    const { conversation, geocoder } = setup();
    await conversation.handle("u1", { location: { lat: 0, lng: 0 } });
    const result = await conversation.handle("u1", { text: "A\nNowhere\nB" });
    expect(result).toEqual({ reply: "Could not geocode Nowhere: Address not found: Nowhere" });
    expect(geocoder.queries).toEqual(["A", "Nowhere"]);
  });

  it("refuses an oversized stop list without geocoding it", async () => {
    const geocoder = new FakeGeocoder(addresses);
    const depots = new InMemoryDepotStore();
    const routes = new RouteOptimizationService(geocoder, { maxStops: 2 });
    const conversation = new ConversationService(geocoder, depots, routes);
    await conversation.handle("u1", { location: { lat: 0, lng: 0 } });

    const result = await conversation.handle("u1", { text: "A\nB\nC" });
    expect(result).toEqual({ reply: "Too many stops: 3 (limit 2)" });
    expect(geocoder.queries).toEqual([]);
  });

  it("keeps each user's depot separate", async () => {
    const { conversation } = setup();
    await conversation.handle("u1", { location: { lat: 0, lng: 0 } });
    await expect(conversation.handle("u2", { text: "A" })).resolves.toEqual({
      reply: DEPOT_REQUIRED_MESSAGE,
    });
  });
});
