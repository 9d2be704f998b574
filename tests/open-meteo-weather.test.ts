import { describe, expect, it, vi } from 'vitest';
import {
  OpenMeteoWeatherProvider,
  ProviderError,
  weatherCodeToCondition,
} from '@/services/providers/weather/open-meteo-weather';

const GEOCODE_PARIS = {
  results: [{ name: 'Paris', latitude: 48.85, longitude: 2.35, country: 'France' }],
};

const CURRENT_PARIS = {
  current: {
    time: '2026-10-18T12:00',
    temperature_2m: 18.5,
    apparent_temperature: 17.9,
    relative_humidity_2m: 62,
    wind_speed_10m: 3.4,
    surface_pressure: 1012.3,
    weather_code: 2,
  },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('weatherCodeToCondition', () => {
  it('maps WMO codes to short descriptions', () => {
    expect(weatherCodeToCondition(0)).toBe('Clear sky');
    expect(weatherCodeToCondition(2)).toBe('Mainly clear to cloudy');
    expect(weatherCodeToCondition(63)).toBe('Rain');
    expect(weatherCodeToCondition(95)).toBe('Thunderstorm');
    expect(weatherCodeToCondition(42)).toBe('Variable');
  });
});

describe('OpenMeteoWeatherProvider', () => {
  it('geocodes the location then reads current conditions', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse(GEOCODE_PARIS))
      .mockResolvedValueOnce(jsonResponse(CURRENT_PARIS));
    const provider = new OpenMeteoWeatherProvider(fetchFn);

    const weather = await provider.fetch({ topic: 'weather', location: 'Paris' });

    expect(weather).toEqual({
      location: 'Paris',
      country: 'France',
      observedAt: '2026-10-18T12:00',
      temperatureC: 18.5,
      feelsLikeC: 17.9,
      condition: 'Mainly clear to cloudy',
      humidityPct: 62,
      windSpeedMs: 3.4,
      pressureHpa: 1012.3,
    });
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(String(fetchFn.mock.calls[0][0])).toBe(
      'https://geocoding-api.open-meteo.com/v1/search?name=Paris&count=1',
    );
    const forecastUrl = new URL(String(fetchFn.mock.calls[1][0]));
    expect(forecastUrl.searchParams.get('latitude')).toBe('48.85');
    expect(forecastUrl.searchParams.get('longitude')).toBe('2.35');
    expect(forecastUrl.searchParams.get('wind_speed_unit')).toBe('ms');
  });

  it('throws not_found when geocoding has no results', async () => {
    const provider = new OpenMeteoWeatherProvider(vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({})));

    await expect(provider.fetch({ topic: 'weather', location: 'Atlantis' })).rejects.toMatchObject({
      name: 'ProviderError',
      kind: 'not_found',
    });
  });

  it('throws http with the status on a non-2xx response', async () => {
    const provider = new OpenMeteoWeatherProvider(
      vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ reason: 'down' }, 503)),
    );

    await expect(provider.fetch({ topic: 'weather', location: 'Paris' })).rejects.toMatchObject({
      kind: 'http',
      status: 503,
    });
  });

  it('throws network when fetch itself rejects', async () => {
    const provider = new OpenMeteoWeatherProvider(
      vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed')),
    );

    const error = await provider.fetch({ topic: 'weather', location: 'Paris' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ kind: 'network', message: 'Request failed: fetch failed' });
  });

  it('throws malformed when the forecast lacks fields', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse(GEOCODE_PARIS))
      .mockResolvedValueOnce(jsonResponse({ current: { time: '2026-10-18T12:00' } }));
    const provider = new OpenMeteoWeatherProvider(fetchFn);

    await expect(provider.fetch({ topic: 'weather', location: 'Paris' })).rejects.toMatchObject({
      kind: 'malformed',
    });
  });

  it('throws malformed when the body is not JSON', async () => {
    const provider = new OpenMeteoWeatherProvider(
      vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>oops</html>', { status: 200 })),
    );

    await expect(provider.fetch({ topic: 'weather', location: 'Paris' })).rejects.toMatchObject({
      kind: 'malformed',
    });
  });
});
