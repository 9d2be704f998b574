// src/services/live-data-branch.ts — query → structured weather request → normalized text facts
import { LiveDataError, TimeoutError, fail, ok, type Result } from '@/utils/errors';
import { errorMessage } from '@/utils/helpers';
import { withTimeout } from '@/utils/timeout';
import type { ObservabilityContext } from './query-processing-trace';
import {
  ProviderError,
  type CurrentWeather,
  type LiveDataProvider,
  type LiveDataRequest,
} from './providers/weather/open-meteo-weather';

export interface LiveDataFacts {
  location: string;
  text: string;
}

// "in|at|for <place>"; the last one in the query usually names the place.
const PREPOSITION = /(?<![\p{L}\p{N}])(?:in|at|for)\s+/gu;
// Sentence punctuation ends the place name; a dot inside "St. Louis" does not.
const CLAUSE_END = /[?!,;]|\.(?=\s|$)/u;
// "weather Lisbon?"
const TRAILING_PLACE = /(?<![\p{L}\p{N}])(\p{L}[\p{L}\p{M}'-]+)\s*[?.!]?\s*$/u;
const PLACE_SHAPE = /^\p{L}[\p{L}\p{M}\s'.-]*$/u;

const TIME_PHRASE =
  '(?:right now|now|today|tonight|tomorrow|currently|later|the moment|the minute|the weekend|' +
  'this (?:morning|afternoon|evening|week|weekend)|next week)';
const LEADING_TIME = new RegExp(`^${TIME_PHRASE}(?:\\s+|$)`, 'u');
const TRAILING_TIME = new RegExp(`\\s+(?:(?:at|for|in|on|during)\\s+)?${TIME_PHRASE}$`, 'u');

const NOT_A_PLACE = new Set([
  'weather',
  'forecast',
  'temperature',
  'climate',
  'today',
  'tomorrow',
  'tonight',
  'now',
  'outside',
  'like',
  'it',
  'there',
  'here',
  'rain',
  'raining',
  'snow',
  'snowing',
  'wind',
  'windy',
  'humidity',
  'humid',
  'hot',
  'cold',
  'sunny',
]);

function titleCase(s: string): string {
  return s
    .split(/\s+/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

function stripTimePhrases(candidate: string): string {
  let current = candidate.trim();
  let previous: string;
  do {
    previous = current;
    current = current.replace(LEADING_TIME, '').replace(TRAILING_TIME, '').trim();
  } while (current !== previous);
  return current;
}

function asPlace(candidate: string): string | null {
  const place = stripTimePhrases(candidate);
  if (place.length < 2 || NOT_A_PLACE.has(place) || !PLACE_SHAPE.test(place)) return null;
  return titleCase(place);
}

/** Pulls a place name out of a weather question; null when none can be found. */
export function extractLocation(query: string): string | null {
  const lower = query.toLowerCase().trim();
  if (!lower) return null;

  const starts = [...lower.matchAll(PREPOSITION)].map((m) => (m.index ?? 0) + m[0].length);
  for (const start of starts.reverse()) {
    const place = asPlace(lower.slice(start).split(CLAUSE_END)[0]);
    if (place) return place;
  }

  const trailing = lower.match(TRAILING_PLACE);
  return trailing?.[1] ? asPlace(trailing[1]) : null;
}

export function buildLiveDataRequest(query: string): LiveDataRequest | null {
  const location = extractLocation(query);
  return location ? { topic: 'weather', location } : null;
}

export function formatWeather(weather: CurrentWeather): string {
  const place = weather.country ? `${weather.location}, ${weather.country}` : weather.location;
  return [
    `Current weather in ${place}:`,
    `• Temperature: ${weather.temperatureC}°C (feels like ${weather.feelsLikeC}°C)`,
    `• Conditions: ${weather.condition}`,
    `• Humidity: ${weather.humidityPct}%`,
    `• Wind Speed: ${weather.windSpeedMs} m/s`,
    `• Pressure: ${weather.pressureHpa} hPa`,
  ].join('\n');
}

function toLiveDataError(err: unknown, location: string): LiveDataError {
  if (err instanceof TimeoutError) {
    return new LiveDataError('upstream_unavailable', `Live data provider did not respond within ${err.ms}ms`, {
      cause: err,
    });
  }
  if (err instanceof ProviderError) {
    switch (err.kind) {
      case 'not_found':
        return new LiveDataError('not_found', `No live data found for "${location}"`, { cause: err });
      case 'malformed':
        return new LiveDataError('malformed_response', `Live data provider returned an unexpected response`, {
          cause: err,
        });
      case 'http':
        if (err.status === 404) {
          return new LiveDataError('not_found', `No live data found for "${location}"`, { cause: err });
        }
        return new LiveDataError('upstream_unavailable', `Live data provider error: ${err.message}`, { cause: err });
      case 'network':
        return new LiveDataError('upstream_unavailable', `Live data provider unreachable: ${err.message}`, {
          cause: err,
        });
    }
  }
  return new LiveDataError('upstream_unavailable', `Live data fetch failed: ${errorMessage(err)}`, { cause: err });
}

export class LiveDataBranch {
  constructor(
    private readonly provider: LiveDataProvider,
    private readonly timeoutMs: number,
  ) {}

  /** Never throws: every provider failure comes back as a typed LiveDataError. */
  async fetchLive(query: string, obs: ObservabilityContext): Promise<Result<LiveDataFacts, LiveDataError>> {
    const request = buildLiveDataRequest(query);
    if (!request) {
      obs.log.info('live-data:no_location', { query: query.slice(0, 100) });
      return fail(new LiveDataError('not_found', 'Could not find a location in the query. Please name a place.'));
    }

    try {
      const weather = await withTimeout('live-data', this.timeoutMs, () =>
        this.provider.fetch(request, AbortSignal.timeout(this.timeoutMs)),
      );
      const text = formatWeather(weather);
      obs.log.info('live-data:done', { provider: this.provider.name, location: weather.location });
      return ok({ location: weather.location, text });
    } catch (err) {
      const error = toLiveDataError(err, request.location);
      obs.log.warn('live-data:failed', { provider: this.provider.name, code: error.code, reason: error.message });
      return fail(error);
    }
  }
}
