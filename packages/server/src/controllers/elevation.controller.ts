import { Body, Controller, Get, Post, Query, Route, Tags } from "@tsoa/runtime";
import type { CoordinatesRequest } from "../models/requests.js";
import type { BatchElevationResponse, ElevationResponse } from "../models/responses.js";
import { ElevationService, getElevationService } from "../services/elevation.service.js";

@Route("api/elevation")
@Tags("Elevation")
export class ElevationController extends Controller {
  constructor(private readonly service: ElevationService = getElevationService()) {
    super();
  }

  /**
   * Interpolated elevation at one point; null outside coverage.
   *
   * @param lat Latitude in decimal degrees
   * @param lon Longitude in decimal degrees
   * @minimum lat -90
   * @maximum lat 90
   * @minimum lon -180
   * @maximum lon 180
   */
  @Get()
  public async getElevation(@Query() lat: number, @Query() lon: number): Promise<ElevationResponse> {
    return this.service.getElevation({ lat, lon });
  }

  /** Elevations for many points, in request order */
  @Post()
  public async getElevations(@Body() body: CoordinatesRequest): Promise<BatchElevationResponse> {
    return { results: this.service.getElevations(body.coordinates) };
  }
}
