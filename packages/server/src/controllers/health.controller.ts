import { Controller, Get, Route, Tags } from "@tsoa/runtime";
import type { HealthResponse } from "../models/responses.js";
import { ElevationService, getElevationService } from "../services/elevation.service.js";

@Route("health")
@Tags("Health")
export class HealthController extends Controller {
  constructor(private readonly service: ElevationService = getElevationService()) {
    super();
  }

  /** Health check with tile cache statistics */
  @Get()
  public async getHealth(): Promise<HealthResponse> {
    return {
      status: "ok",
      uptime: process.uptime(),
      cache: this.service.cacheStats(),
    };
  }
}
