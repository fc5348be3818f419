import { Controller, Get, Query, Response, Route, Tags } from "@tsoa/runtime";
import type { ErrorResponse, TileHeaderResponse } from "../models/responses.js";
import { ElevationService, getElevationService } from "../services/elevation.service.js";

@Route("api/tiles")
@Tags("Tiles")
export class TileController extends Controller {
  constructor(private readonly service: ElevationService = getElevationService()) {
    super();
  }

  /**
   * Header of the tile covering a point. Only the 80-byte header is read.
   *
   * @minimum lat -90
   * @maximum lat 90
   * @minimum lon -180
   * @maximum lon 180
   */
  @Get("header")
  @Response<ErrorResponse>(404, "No tile covers the point")
  public async getTileHeader(@Query() lat: number, @Query() lon: number): Promise<TileHeaderResponse> {
    return this.service.getTileHeader({ lat, lon });
  }
}
