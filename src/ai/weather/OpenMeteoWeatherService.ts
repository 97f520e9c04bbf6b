import type { AxiosInstance } from 'axios';
import type { WeatherResult } from '../../types';
import type { IWeatherService } from './types';
import { LocationNotFoundError } from '../errors';
import { createHttpClient, providerErrorFromAxios } from '../http';
import { describeWeatherCode } from './weatherCodes';
import { closestMatch } from './fuzzy';
import { logger } from '../../config/logger';

const PROVIDER = 'open-meteo';
const GEOCODING_URL = 'https://geocoding-api.open-meteo.com/v1/search';
const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

/** Frequent misspellings the geocoder does not resolve on its own. */
const COMMON_CORRECTIONS: Readonly<Record<string, string>> = {
  tokoyo: 'Tokyo',
  kyouto: 'Kyoto',
  'osaka-shi': 'Osaka',
  newyork: 'New York',
};

const FUZZY_CANDIDATES = [
  'Tokyo', 'Osaka', 'Kyoto', 'Sapporo', 'Nagoya', 'Fukuoka', 'Yokohama',
  'Paris', 'London', 'New York', 'Delhi', 'Mumbai',
  '東京', '大阪', '京都', '札幌', '名古屋', '福岡', '横浜',
];

const FUZZY_CUTOFF = 0.75;

interface GeocodingResponse {
  results?: Array<{
    name: string;
    latitude: number;
    longitude: number;
    country?: string;
  }>;
}

interface ForecastResponse {
  current?: {
    temperature_2m?: number;
    relative_humidity_2m?: number;
    weather_code?: number;
    wind_speed_10m?: number;
  };
}

interface Coordinates {
  latitude: number;
  longitude: number;
  name: string;
}

/** Hiragana, katakana or CJK unified ideographs. */
function containsJapanese(text: string): boolean {
  return /[\u3040-\u309F\u30A0-\u30FF\u4E00-\u9FFF]/.test(text);
}

/**
 * Current weather via Open-Meteo (no API key). Geocodes the free-text location first;
 * when that finds nothing, retries once with a corrected or fuzzy-matched city name.
 */
export class OpenMeteoWeatherService implements IWeatherService {
  private http: AxiosInstance;

  constructor(options: { timeoutMs: number; http?: AxiosInstance }) {
    this.http = options.http ?? createHttpClient({ timeout: options.timeoutMs });
  }

  async getWeather(location: string): Promise<WeatherResult> {
    const query = location.trim();
    if (!query) throw new LocationNotFoundError(location);

    const coords = await this.getCoordinates(query);
    let data: ForecastResponse;
    try {
      const response = await this.http.get<ForecastResponse>(FORECAST_URL, {
        params: {
          latitude: coords.latitude,
          longitude: coords.longitude,
          current: 'temperature_2m,relative_humidity_2m,weather_code,wind_speed_10m',
          timezone: 'auto',
        },
      });
      data = response.data;
    } catch (error) {
      throw providerErrorFromAxios(PROVIDER, error, 'Weather request');
    }

    const current = data.current ?? {};
    const weatherCode = current.weather_code ?? 0;
    return {
      location: coords.name,
      latitude: coords.latitude,
      longitude: coords.longitude,
      temperature: current.temperature_2m ?? null,
      weatherCode,
      weatherDescription: describeWeatherCode(weatherCode),
      windSpeed: current.wind_speed_10m ?? null,
      humidity: current.relative_humidity_2m ?? null,
    };
  }

  async getCoordinates(location: string): Promise<Coordinates> {
    const language = containsJapanese(location) ? 'ja' : 'en';

    let first = await this.geocode(location, language);
    if (!first) {
      const corrected =
        COMMON_CORRECTIONS[location.toLowerCase()] ?? closestMatch(location, FUZZY_CANDIDATES, FUZZY_CUTOFF);
      if (corrected && corrected !== location) {
        logger.debug('Geocoding retry with corrected name', { location, corrected });
        first = await this.geocode(corrected, language);
      }
    }
    if (!first) throw new LocationNotFoundError(location);

    return {
      latitude: first.latitude,
      longitude: first.longitude,
      name: first.country ? `${first.name}, ${first.country}` : first.name,
    };
  }

  private async geocode(name: string, language: string) {
    try {
      const response = await this.http.get<GeocodingResponse>(GEOCODING_URL, {
        params: { name, count: 1, language, format: 'json' },
      });
      return response.data.results?.[0] ?? null;
    } catch (error) {
      throw providerErrorFromAxios(PROVIDER, error, 'Geocoding request');
    }
  }
}

/** One-line summary injected into the conversation after a weather tool call. */
export function formatWeatherForLLM(weather: WeatherResult): string {
  const value = (v: number | null, unit: string) => (v === null ? 'n/a' : `${v}${unit}`);
  return (
    `Location: ${weather.location}, ` +
    `Temperature: ${value(weather.temperature, '°C')}, ` +
    `Condition: ${weather.weatherDescription}, ` +
    `Wind Speed: ${value(weather.windSpeed, ' km/h')}, ` +
    `Humidity: ${value(weather.humidity, '%')}`
  );
}
