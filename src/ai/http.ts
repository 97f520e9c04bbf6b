/**
 * Shared axios plumbing for the REST providers (weather, speech).
 */
import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { ProviderError, kindFromStatus } from './errors';

export function createHttpClient(defaults: CreateAxiosDefaults): AxiosInstance {
  return axios.create(defaults);
}

/** Collapses axios failures into ProviderError, keeping the upstream status and body excerpt. */
export function providerErrorFromAxios(provider: string, error: unknown, action: string): ProviderError {
  if (error instanceof ProviderError) return error;
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ProviderError(provider, 'timeout', `${action} timed out`, { cause: error });
    }
    const status = error.response?.status;
    const body = describeBody(error.response?.data);
    const detail = status ? `HTTP ${status}${body ? `: ${body}` : ''}` : error.message;
    return new ProviderError(provider, kindFromStatus(status), `${action} failed: ${detail}`, { cause: error, status });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(provider, 'unavailable', `${action} failed: ${message}`, { cause: error });
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null || data === '') return '';
  if (Buffer.isBuffer(data)) return data.toString('utf8').slice(0, 300);
  if (typeof data === 'string') return data.slice(0, 300);
  try {
    return JSON.stringify(data).slice(0, 300);
  } catch {
    return '';
  }
}
