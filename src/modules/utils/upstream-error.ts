import axios from 'axios';

export type UpstreamName = 'geocoder' | 'weather' | 'llm' | 'cache' | 'mqtt';

/**
 * Failure of an external service this application depends on.
 * Components catch these at their own boundary and turn them into
 * an {@link Outcome} or a fallback value.
 */
export abstract class UpstreamError extends Error {
  abstract readonly kind: 'timeout' | 'unavailable';

  constructor(
    readonly upstream: UpstreamName,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  readonly kind = 'timeout';
}

export class UpstreamUnavailableError extends UpstreamError {
  readonly kind = 'unavailable';
}

/**
 * Required setting missing or invalid at startup.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Classify anything thrown by an upstream call.
 */
export function toUpstreamError(
  upstream: UpstreamName,
  error: unknown,
): UpstreamError {
  if (error instanceof UpstreamError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new UpstreamTimeoutError(
        upstream,
        `${upstream} request timed out`,
      );
    }
    const status = error.response?.status;
    return new UpstreamUnavailableError(
      upstream,
      status
        ? `${upstream} responded with HTTP ${status}`
        : `${upstream} unreachable: ${error.message}`,
      status,
    );
  }

  return new UpstreamUnavailableError(
    upstream,
    error instanceof Error ? error.message : String(error),
  );
}
