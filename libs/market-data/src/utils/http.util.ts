import axios, { AxiosInstance, isAxiosError } from 'axios';

export const createHttpClient = (baseURL: string, timeoutMs: number): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'market-truth-worker/1.0' },
  });

/** 4xx other than 429 will not get better by asking again. */
export const isRetryableHttpError = (error: unknown): boolean => {
  if (!isAxiosError(error)) return true;
  const status = error.response?.status;
  if (status === undefined) return true;
  return status === 429 || status >= 500;
};

export const describeHttpError = (error: unknown): string => {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    return status ? `HTTP ${status}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : 'Unknown error';
};
