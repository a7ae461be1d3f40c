import type { Express } from "express";
import type { Server } from "http";
import { z } from "zod";
import { shopSearchRequestSchema, type CatalogItem, type ShopSearchResponse } from "@shared/schema";
import { parseConstraints, runShopSearch } from "./search";

const constraintsQuerySchema = z.object({
  query: z.string().default(""),
});

function describeZodError(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  catalog: readonly CatalogItem[],
): Promise<Server> {
  // Health check endpoint
  app.get("/healthz", (_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      catalogSize: catalog.length,
    });
  });

  app.post("/api/shop/search", (req, res) => {
    const parsed = shopSearchRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({
        success: false,
        error: "Invalid search request",
        details: describeZodError(parsed.error),
      });
    }

    const { query, limit } = parsed.data;
    const searchStartTime = Date.now();
    const outcome = runShopSearch(query, catalog, limit);

    console.log(
      `[Shop Search] "${query}" limit=${limit}: ${outcome.unfilteredCount} ranked, ` +
        `${outcome.results.length} after constraints ${JSON.stringify(outcome.constraints)} ` +
        `(${Date.now() - searchStartTime}ms)`,
    );

    const response: ShopSearchResponse = {
      success: true,
      query: outcome.query,
      count: outcome.results.length,
      unfilteredCount: outcome.unfilteredCount,
      constraints: outcome.constraints,
      results: outcome.results,
    };
    return res.json(response);
  });

  app.get("/api/shop/constraints", (req, res) => {
    const parsed = constraintsQuerySchema.safeParse({ query: req.query.query });
    if (!parsed.success) {
      return res.status(400).json({
        success: false,
        error: "Invalid query parameters",
        details: describeZodError(parsed.error),
      });
    }

    return res.json({
      success: true,
      query: parsed.data.query,
      constraints: parseConstraints(parsed.data.query),
    });
  });

  return httpServer;
}
