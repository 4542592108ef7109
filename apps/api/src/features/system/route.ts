import { buildOpenApiDocument } from "@app-monitor/contracts";
import type { Express } from "express";
import type { AppContext } from "../../context.js";

export function registerSystemRoutes(app: Express, context: AppContext): void {
  const openapi = buildOpenApiDocument();

  app.get("/health", (_request, response) => {
    response.status(200).json({
      status: "ok",
      timestamp: context.now().toISOString()
    });
  });

  app.get("/openapi.json", (_request, response) => {
    response.status(200).json(openapi);
  });
}
