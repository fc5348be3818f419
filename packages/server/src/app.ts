import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import cors from "cors";
import { DtedTileReader } from "@dted-terrain/dted";
import { RegisterRoutes } from "../build/routes.js";
import type { ServerConfig } from "./config.js";
import { errorHandler } from "./middleware/error-handler.js";
import { ElevationService, setElevationService } from "./services/elevation.service.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function createApp(config: ServerConfig): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  // Controllers built by the generated routes share this service
  setElevationService(
    new ElevationService(
      new DtedTileReader({
        tilesDir: config.tilesDir,
        level: config.level,
        maxCachedTiles: config.maxCachedTiles,
        decode: config.decode,
      }),
    ),
  );

  // Serve the OpenAPI document
  app.get("/api-docs", (_req, res) => {
    const docPath = resolve(__dirname, "..", "build", "swagger.json");
    const openapi: unknown = JSON.parse(readFileSync(docPath, "utf-8"));
    res.json(openapi);
  });

  // Register TSOA-generated routes
  RegisterRoutes(app);

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}

export { loadServerConfig, type ServerConfig } from "./config.js";
