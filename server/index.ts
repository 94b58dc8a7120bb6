import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app";
import { config } from "./config";
import { AIRPORTS } from "./services/destinationRegistry";
import { log } from "./log";

const app = createApp();
const httpServer = createServer(app);

httpServer.listen({ port: config.PORT, host: "0.0.0.0" }, () => {
  log(`serving on port ${config.PORT} (${config.NODE_ENV})`);
  log(`planning journeys to ${AIRPORTS.map((airport) => airport.name).join(", ")}`, "journeys");
  if (!config.TFL_APP_KEY) {
    console.warn("[Startup] TFL_APP_KEY not set - Journey Planner calls are anonymous and heavily rate limited");
  }
});
