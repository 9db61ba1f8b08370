import { types } from 'util';

// Errors thrown by Node internals can come from another realm, so
// `instanceof Error` is not reliable for them.
export function toError(error: unknown): Error {
  return types.isNativeError(error) ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return types.isNativeError(error) ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return types.isNativeError(error) && 'code' in error;
}
