export const APP_VERSION = '0.1.0';

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiError {
  success: false;
  error: string;
  code: string;
  details?: unknown;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiError;

export function createSuccessResponse<T>(data: T): ApiSuccess<T> {
  return { success: true, data };
}

export function createErrorResponse(
  code: string,
  message: string,
  details?: unknown
): ApiError {
  const response: ApiError = { success: false, error: message, code };
  if (details !== undefined) {
    response.details = details;
  }
  return response;
}
