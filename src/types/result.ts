export type ServiceErrorKind =
  | "NotFound"
  | "ValidationError"
  | "OutOfStock"
  | "StateConflict"
  | "Unauthorized"
  | "Forbidden";

export interface ServiceError {
  kind: ServiceErrorKind;
  message: string;
  details?: unknown;
}

export type ServiceResult<T> =
  | { isSuccess: true; data: T }
  | { isSuccess: false; error: ServiceError };

export function ok<T>(data: T): ServiceResult<T> {
  return { isSuccess: true, data };
}

export function fail(
  kind: ServiceErrorKind,
  message: string,
  details?: unknown
): ServiceResult<never> {
  return {
    isSuccess: false,
    error: details === undefined ? { kind, message } : { kind, message, details },
  };
}
