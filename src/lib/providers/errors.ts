/**
 * Mapping from vendor SDK failures to `ProviderError`
 */
import { ProviderError, ProviderErrorKind } from '../errors';

/**
 * Classify an HTTP status returned by a provider API
 */
export function classifyStatus(status: number | undefined): ProviderErrorKind {
  if (status === undefined) return 'unavailable';
  if (status === 429) return 'rate_limited';
  if (status === 408) return 'timeout';
  if (status === 401 || status === 403) return 'unauthorized';
  if (status >= 500) return 'unavailable';
  return 'malformed';
}

/**
 * Shape shared by the OpenAI and Anthropic SDK error hierarchies
 */
export interface SdkErrorClasses {
  APIError: new (...args: never[]) => Error & { status?: number };
  APIConnectionError: new (...args: never[]) => Error;
  APIConnectionTimeoutError: new (...args: never[]) => Error;
}

/**
 * Convert an error thrown by a vendor SDK into a `ProviderError`.
 * Anything that did not come from the SDK is returned unchanged.
 */
export function toProviderError(error: unknown, provider: string, sdk: SdkErrorClasses): unknown {
  if (error instanceof ProviderError) return error;

  if (error instanceof sdk.APIConnectionTimeoutError) {
    return new ProviderError('timeout', provider, error.message, { cause: error });
  }
  if (error instanceof sdk.APIConnectionError) {
    return new ProviderError('unavailable', provider, error.message, { cause: error });
  }
  if (error instanceof sdk.APIError) {
    return new ProviderError(classifyStatus(error.status), provider, error.message, {
      cause: error,
      status: error.status,
    });
  }
  return error;
}
