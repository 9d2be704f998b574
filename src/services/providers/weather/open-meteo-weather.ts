/**
 * Live-data provider using Open-Meteo (no API key). Geocode the location, then fetch current conditions.
 */
import { z } from 'zod';

const GEOCODE_URL = 'https://geocoding-api.open-meteo.com/v1/search';
const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

export interface LiveDataRequest {
  topic: 'weather';
  location: string;
}

export interface CurrentWeather {
  location: string;
  country?: string;
  observedAt: string;
  temperatureC: number;
  feelsLikeC: number;
  condition: string;
  humidityPct: number;
  windSpeedMs: number;
  pressureHpa: number;
}

export type ProviderErrorKind = 'not_found' | 'http' | 'network' | 'malformed';

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly status?: number;

  constructor(kind: ProviderErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ProviderError';
    this.kind = kind;
    this.status = status;
  }
}

export interface LiveDataProvider {
  readonly name: string;
  fetch(request: LiveDataRequest, signal?: AbortSignal): Promise<CurrentWeather>;
}

const geocodeSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string(),
        latitude: z.number(),
        longitude: z.number(),
        country: z.string().optional(),
      }),
    )
    .optional(),
});

const currentSchema = z.object({
  current: z.object({
    time: z.string(),
    temperature_2m: z.number(),
    apparent_temperature: z.number(),
    relative_humidity_2m: z.number(),
    wind_speed_10m: z.number(),
    surface_pressure: z.number(),
    weather_code: z.number(),
  }),
});

/** Map WMO weather code to short condition string. */
export function weatherCodeToCondition(code: number): string {
  if (code === 0) return 'Clear sky';
  if (code >= 1 && code <= 3) return 'Mainly clear to cloudy';
  if (code >= 45 && code <= 48) return 'Foggy';
  if (code >= 51 && code <= 67) return 'Rain';
  if (code >= 71 && code <= 77) return 'Snow';
  if (code >= 80 && code <= 82) return 'Rain showers';
  if (code >= 85 && code <= 86) return 'Snow showers';
  if (code >= 95 && code <= 99) return 'Thunderstorm';
  return 'Variable';
}

type FetchFn = typeof fetch;

export class OpenMeteoWeatherProvider implements LiveDataProvider {
  readonly name = 'open-meteo';

  constructor(private readonly fetchFn: FetchFn = (input, init) => fetch(input, init)) {}

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchFn(url, { signal });
    } catch (err) {
      throw new ProviderError('network', `Request failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!res.ok) throw new ProviderError('http', `Upstream responded ${res.status}`, res.status);
    try {
      return await res.json();
    } catch {
      throw new ProviderError('malformed', 'Upstream body is not JSON');
    }
  }

  async fetch(request: LiveDataRequest, signal?: AbortSignal): Promise<CurrentWeather> {
    const geoRaw = await this.getJson(
      `${GEOCODE_URL}?name=${encodeURIComponent(request.location)}&count=1`,
      signal,
    );
    const geo = geocodeSchema.safeParse(geoRaw);
    if (!geo.success) throw new ProviderError('malformed', 'Unexpected geocoding payload');
    const first = geo.data.results?.[0];
    if (!first) throw new ProviderError('not_found', `No location found: ${request.location}`);

    const url = new URL(FORECAST_URL);
    url.searchParams.set('latitude', String(first.latitude));
    url.searchParams.set('longitude', String(first.longitude));
    url.searchParams.set(
      'current',
      'temperature_2m,apparent_temperature,relative_humidity_2m,wind_speed_10m,surface_pressure,weather_code',
    );
    url.searchParams.set('wind_speed_unit', 'ms');
    url.searchParams.set('timezone', 'auto');

    const parsed = currentSchema.safeParse(await this.getJson(url.toString(), signal));
    if (!parsed.success) throw new ProviderError('malformed', 'Unexpected forecast payload');
    const c = parsed.data.current;

    return {
      location: first.name,
      country: first.country,
      observedAt: c.time,
      temperatureC: c.temperature_2m,
      feelsLikeC: c.apparent_temperature,
      condition: weatherCodeToCondition(c.weather_code),
      humidityPct: c.relative_humidity_2m,
      windSpeedMs: c.wind_speed_10m,
      pressureHpa: c.surface_pressure,
    };
  }
}
