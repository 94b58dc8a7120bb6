import express, { type Express } from "express";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const distPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "public");

export function serveStatic(app: Express) {
  if (!fs.existsSync(distPath)) {
    throw new Error(`Could not find the static directory: ${distPath}`);
  }

  app.use(express.static(distPath));

  // fall through to index.html for anything that is not an API call
  app.use("*", (req, res, next) => {
    if (req.originalUrl.startsWith("/api")) return next();
    res.sendFile(path.resolve(distPath, "index.html"));
  });
}
