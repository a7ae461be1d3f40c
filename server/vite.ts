import type { Express } from "express";
import fs from "fs";
import path from "path";
import type { Server } from "http";
import { createServer as createViteServer } from "vite";
import { log } from "./logger";

export async function setupVite(server: Server, app: Express) {
  const vite = await createViteServer({
    configFile: path.resolve("vite.config.ts"),
    server: {
      middlewareMode: true,
      hmr: { server },
    },
    appType: "custom",
  });

  app.use(vite.middlewares);
  app.use("*", async (req, res, next) => {
    const url = req.originalUrl;

    try {
      const clientTemplate = path.resolve("client", "index.html");
      const template = await fs.promises.readFile(clientTemplate, "utf-8");
      const page = await vite.transformIndexHtml(url, template);
      res.status(200).set({ "Content-Type": "text/html" }).end(page);
    } catch (e) {
      if (e instanceof Error) vite.ssrFixStacktrace(e);
      next(e);
    }
  });

  log("vite dev middleware attached", "vite");
}
