import "dotenv/config";
import { createGeocoder } from "@stopwise/geocoding";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { InMemoryDepotStore } from "./services/depot-store.service.js";

const config = loadConfig();

const app = createApp({
  geocoder: createGeocoder(config.geocoder),
  depots: new InMemoryDepotStore(),
  planning: config.planning,
});

const server = app.listen(config.port, () => {
  console.log(`\nStopwise API server running at http://localhost:${config.port}`);
  console.log(`Geocoder order: ${config.geocoder.preference ?? "any"}${config.geocoder.googleApiKey ? "" : " (Google disabled)"}\n`);
});

function shutdown(signal: string): void {
  console.log(`[server] ${signal} received, closing`);
  server.close((err) => {
    if (err) {
      console.error(`[server] Close failed: ${err.message}`);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
