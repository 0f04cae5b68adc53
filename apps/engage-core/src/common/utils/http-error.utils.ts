import { isAxiosError } from 'axios';

/**
 * One-line description of an outbound HTTP failure for logs.
 */
export function describeHttpError(error: unknown): string {
  if (isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}: ${JSON.stringify(error.response.data)}`;
    }
    if (error.code) {
      return `${error.code}: ${error.message || 'Connection error'}`;
    }
  }
  return error instanceof Error ? error.message : String(error);
}
