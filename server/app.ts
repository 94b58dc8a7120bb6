import express, { type Request, type Response, type NextFunction } from "express";
import compression from "compression";
import journeysRouter from "./routes/journeys";
import { generalRateLimiter } from "./middleware/rateLimiter";
import { serveStatic } from "./static";
import { log } from "./log";

interface HttpError extends Error {
  status?: number;
  statusCode?: number;
}

export function createApp() {
  const app = express();

  // Enable gzip compression for all responses
  app.use(compression({
    level: 6, // Balanced speed/compression
    threshold: 1024, // Only compress responses > 1KB
  }));

  app.use(express.json());

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
      }
    });

    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api", generalRateLimiter, journeysRouter);

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "not_found", message: "Unknown API endpoint" });
  });

  serveStatic(app);

  app.use((err: HttpError, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    const message = err.message || "Internal Server Error";

    console.error("[express] Unhandled error:", err);
    res.status(status).json({ message });
  });

  return app;
}
