import { ApiResponse } from '../types/apiResponse';

export function formatApiResponse<T>(
  responseStatus: 'success' | 'error',
  message: string,
  data: T
): ApiResponse<T> {
  return {
    responseStatus,
    message,
    data,
  };
}
