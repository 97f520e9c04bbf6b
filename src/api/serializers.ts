/**
 * Domain -> wire shapes. The HTTP API uses snake_case keys.
 */
import type { ChatResult, ConversationTurn, WeatherAugmentation, WeatherResult } from '../types';

export function weatherToWire(weather: WeatherResult) {
  return {
    location: weather.location,
    latitude: weather.latitude,
    longitude: weather.longitude,
    temperature: weather.temperature,
    weather_code: weather.weatherCode,
    weather_description: weather.weatherDescription,
    wind_speed: weather.windSpeed,
    humidity: weather.humidity,
  };
}

export function augmentationToWire(augmentation: WeatherAugmentation | null) {
  if (!augmentation) return null;
  if (augmentation.status === 'used') {
    return { location: augmentation.location, status: augmentation.status, data: weatherToWire(augmentation.data) };
  }
  return { location: augmentation.location, status: augmentation.status, reason: augmentation.reason };
}

export function chatResultToWire(result: ChatResult, history: ConversationTurn[]) {
  return {
    reply: result.text,
    model_used: result.modelUsed,
    conversation_history: history,
    weather: augmentationToWire(result.weather),
  };
}
