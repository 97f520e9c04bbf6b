import type { WeatherResult } from '../../types';

export interface IWeatherService {
  /** Rejects with LocationNotFoundError or ProviderError. */
  getWeather(location: string): Promise<WeatherResult>;
}
