import { isAxiosError } from 'axios';

export type UpstreamFailure =
  | { kind: 'status'; status: number; message: string }
  | { kind: 'timeout'; message: string }
  | { kind: 'network'; message: string }
  | { kind: 'unknown'; message: string };

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function classifyHttpError(error: unknown): UpstreamFailure {
  if (isAxiosError(error)) {
    if (error.response) {
      return { kind: 'status', status: error.response.status, message: error.message };
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return { kind: 'timeout', message: error.message };
    }
    return { kind: 'network', message: error.message };
  }
  return { kind: 'unknown', message: errorMessage(error) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const HTTP_TIMEOUT_MS = 10_000;
