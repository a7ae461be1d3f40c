import { createApp } from "./app";
import { loadConfig } from "./config";
import { log } from "./logger";
import { loadCatalog } from "./search";
import { serveStatic } from "./static";

(async () => {
  const config = loadConfig();

  // The catalog is read once; every search shares this snapshot
  const catalog = loadCatalog(config.catalogPath);
  const { app, httpServer } = await createApp(catalog);

  // only setup vite in development and after the API routes
  // so the catch-all route doesn't interfere with them
  if (config.nodeEnv === "production") {
    serveStatic(app, config.clientDistPath);
  } else {
    const { setupVite } = await import("./vite");
    await setupVite(httpServer, app);
  }

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving ${catalog.length} products on port ${config.port}`);
  });
})().catch(error => {
  console.error(`[STARTUP] ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
