export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * One element of the OpenWeatherMap `/geo/1.0/direct` response.
 */
export interface OpenWeatherGeocodeResult {
  name: string;
  lat: number;
  lon: number;
  country?: string;
  state?: string;
}
