/**
 * Error Type Guards
 */

import type {
  AppError,
  AuthoringError,
  InputError,
  DataError,
  ConfigurationError,
  ResourceError,
} from './app-error.js';

export function isAppError(e: unknown): e is AppError {
  return typeof e === 'object' && e !== null && '_tag' in e && 'message' in e;
}

export function isAuthoringError(e: AppError): e is AuthoringError {
  return e._tag === 'UnknownOperator'
    || e._tag === 'MalformedNode'
    || e._tag === 'CyclicTree'
    || e._tag === 'InvalidReference';
}

export function isInputError(e: AppError): e is InputError {
  return e._tag === 'UnansweredQuestion' || e._tag === 'NoMatchingBranch';
}

export function isResourceError(e: AppError): e is ResourceError {
  return e._tag === 'TreeNotFound';
}

export function isDataError(e: AppError): e is DataError {
  return e._tag === 'ParseFailed' || e._tag === 'ValidationFailed';
}

export function isConfigurationError(e: AppError): e is ConfigurationError {
  return e._tag === 'ConfigInvalid';
}

/**
 * Exhaustiveness helper for discriminated unions.
 * Use in the `default` branch of a `switch` so a new union member fails to compile.
 */
export function assertNever(value: never): never {
  throw new Error(`Unreachable code reached: ${JSON.stringify(value)}`);
}
