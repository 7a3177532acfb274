import { ErrorDetail } from '../exceptions/app.exception';

export interface Pagination {
  page: number;
  limit: number;
  total: number;
  total_pages: number;
}

export interface ApiError {
  code: string;
  message: string;
  details?: ErrorDetail[];
}

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: ApiError | null;
  pagination: Pagination | null;
  timestamp: string;
}

export function ok<T>(data: T, pagination?: Pagination): ApiResponse<T> {
  return {
    success: true,
    data,
    error: null,
    pagination: pagination ?? null,
    timestamp: new Date().toISOString(),
  };
}

export function fail(error: ApiError): ApiResponse<null> {
  return {
    success: false,
    data: null,
    error,
    pagination: null,
    timestamp: new Date().toISOString(),
  };
}

export function buildPagination(page: number, limit: number, total: number): Pagination {
  return {
    page,
    limit,
    total,
    total_pages: Math.ceil(total / limit),
  };
}
