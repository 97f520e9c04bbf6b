import type { AppConfig } from '../../config';
import type { IWeatherService } from './types';
import { OpenMeteoWeatherService } from './OpenMeteoWeatherService';

export function createWeatherService(weather: AppConfig['weather']): IWeatherService {
  return new OpenMeteoWeatherService({ timeoutMs: weather.timeoutMs });
}

export { OpenMeteoWeatherService, formatWeatherForLLM } from './OpenMeteoWeatherService';
export type { IWeatherService } from './types';
