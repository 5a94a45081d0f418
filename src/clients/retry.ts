export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetries<T>(
  operation: () => Promise<T>,
  options: { retries: number; retryDelayMs: number }
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.retries; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < options.retries) {
        await delay(options.retryDelayMs * attempt);
      }
    }
  }

  throw lastError;
}

export type HealthStatus = "ok" | "error";

export interface HealthReport {
  status: HealthStatus;
  details?: string;
}
