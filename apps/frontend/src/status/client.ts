import type { HealthReport, StatusReport } from './types';

const normalizeBaseUrl = (baseUrl: string) => baseUrl.replace(/\/$/, '');

const buildUrl = (baseUrl: string, path: string) =>
  `${normalizeBaseUrl(baseUrl)}${path.startsWith('/') ? '' : '/'}${path}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const isStatusReport = (value: unknown): value is StatusReport =>
  isRecord(value) &&
  typeof value.timestamp === 'string' &&
  isRecord(value.system) &&
  isRecord(value.security) &&
  (value.bootc_status === null || typeof value.bootc_status === 'string');

const isHealthReport = (value: unknown): value is HealthReport =>
  isRecord(value) &&
  value.status === 'healthy' &&
  typeof value.timestamp === 'string';

const handleResponse = async <T>(
  response: Response,
  guard: (value: unknown) => value is T,
): Promise<T> => {
  if (!response.ok) {
    let message = `Request failed with status ${response.status}`;
    // Error bodies are not always JSON
    const payload: unknown = await response.json().catch(() => null);
    if (isRecord(payload) && typeof payload.message === 'string') {
      message = payload.message;
    }
    throw new Error(message);
  }

  const data: unknown = await response.json();
  if (!guard(data)) {
    throw new Error(`Unexpected response body from ${response.url}`);
  }
  return data;
};

export const fetchStatus = async (baseUrl: string): Promise<StatusReport> => {
  const url = buildUrl(baseUrl, '/api/status');
  const response = await fetch(url, {
    headers: {
      Accept: 'application/json',
    },
  });

  return handleResponse(response, isStatusReport);
};

export const fetchHealth = async (baseUrl: string): Promise<HealthReport> => {
  const url = buildUrl(baseUrl, '/api/health');
  const response = await fetch(url, {
    headers: {
      Accept: 'application/json',
    },
  });

  return handleResponse(response, isHealthReport);
};
