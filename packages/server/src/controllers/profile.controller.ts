import { Body, Controller, Post, Response, Route, SuccessResponse, Tags } from "@tsoa/runtime";
import type { ElevationProfile } from "@dted-terrain/types";
import type { CoordinatesRequest } from "../models/requests.js";
import type { ErrorResponse } from "../models/responses.js";
import { ElevationService, getElevationService } from "../services/elevation.service.js";

@Route("api/profile")
@Tags("Elevation")
export class ProfileController extends Controller {
  constructor(private readonly service: ElevationService = getElevationService()) {
    super();
  }

  /** Gain, loss and grades along a polyline */
  @Post()
  @SuccessResponse(200, "Profile computed")
  @Response<ErrorResponse>(404, "Fewer than two coordinates have elevation data")
  public async getProfile(@Body() body: CoordinatesRequest): Promise<ElevationProfile> {
    return this.service.getProfile(body.coordinates);
  }
}
