export interface RequestCoordinate {
  /**
   * @minimum -90
   * @maximum 90
   */
  lat: number;
  /**
   * @minimum -180
   * @maximum 180
   */
  lon: number;
}

/** Body of the batch elevation and profile endpoints */
export interface CoordinatesRequest {
  /**
   * @minItems 1
   * @maxItems 10000
   */
  coordinates: RequestCoordinate[];
}
