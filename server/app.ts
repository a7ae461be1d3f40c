import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import { createServer, type Server } from "http";
import type { CatalogItem } from "@shared/schema";
import { log } from "./logger";
import { registerRoutes } from "./routes";

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

export async function createApp(catalog: readonly CatalogItem[]): Promise<{ app: Express; httpServer: Server }> {
  const app = express();
  const httpServer = createServer(app);

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept'],
    credentials: false
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

  await registerRoutes(httpServer, app, catalog);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    console.error(`[ERROR] ${status} ${message}`);
    res.status(status).json({ message });
  });

  return { app, httpServer };
}
