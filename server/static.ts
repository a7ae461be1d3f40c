import express, { type Express } from "express";
import fs from "fs";
import path from "path";

export function serveStatic(app: Express, clientDistPath: string) {
  const distPath = path.resolve(clientDistPath);
  if (!fs.existsSync(distPath)) {
    throw new Error(
      `Could not find the build directory: ${distPath}, make sure to build the client first`,
    );
  }

  app.use(express.static(distPath));

  // SPA fallback: serve index.html for non-API routes only
  app.use("*", (req, res, next) => {
    if (req.originalUrl.startsWith("/api/") || req.originalUrl === "/healthz") {
      return next();
    }
    res.sendFile(path.resolve(distPath, "index.html"));
  });
}
