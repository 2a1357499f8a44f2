import { describe, it, expect } from "vitest";
import { buildMapsLinks, formatCoordinate, renderGoogleMapsUrl } from "./maps-url.js";

describe("formatCoordinate", () => {
  it("prints lat,lng without rounding", () => {
    expect(formatCoordinate({ lat: 20.56912, lng: -100.42088 })).toBe("20.56912,-100.42088");
  });
});

describe("renderGoogleMapsUrl", () => {
  it("omits waypoints for a two-point leg", () => {
    const url = renderGoogleMapsUrl({
      origin: { lat: 20.5, lng: -100.4 },
      destination: { lat: 20.6, lng: -100.3 },
      waypoints: [],
    });
    expect(url).toBe(
      "https://www.google.com/maps/dir/?api=1&origin=20.5,-100.4&destination=20.6,-100.3",
    );
  });

  it("joins waypoints with a pipe", () => {
    const url = renderGoogleMapsUrl({
      origin: { lat: 1, lng: 2 },
      destination: { lat: 7, lng: 8 },
      waypoints: [
        { lat: 3, lng: 4 },
        { lat: 5, lng: 6 },
      ],
    });
    expect(url).toBe(
      "https://www.google.com/maps/dir/?api=1&origin=1,2&destination=7,8&waypoints=3,4|5,6",
    );
  });
});

describe("buildMapsLinks", () => {
  it("renders one link per leg", () => {
    const points = Array.from({ length: 12 }, (_, i) => ({ lat: i, lng: -i }));
    const links = buildMapsLinks(points, 10);
    expect(links).toHaveLength(2);
    expect(links[0]).toBe(
      "https://www.google.com/maps/dir/?api=1&origin=0,0&destination=9,-9" +
        "&waypoints=1,-1|2,-2|3,-3|4,-4|5,-5|6,-6|7,-7|8,-8",
    );
    expect(links[1]).toBe("https://www.google.com/maps/dir/?api=1&origin=10,-10&destination=11,-11");
  });

  it("chains legs when asked", () => {
    const points = Array.from({ length: 4 }, (_, i) => ({ lat: i, lng: i }));
    expect(buildMapsLinks(points, 2, { connectLegs: true })).toEqual([
      "https://www.google.com/maps/dir/?api=1&origin=0,0&destination=1,1",
      "https://www.google.com/maps/dir/?api=1&origin=1,1&destination=3,3&waypoints=2,2",
    ]);
  });
});
