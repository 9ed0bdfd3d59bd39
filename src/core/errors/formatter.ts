/**
 * Error Formatting for CLI output and logs
 */

import type { AppError } from './app-error.js';
import { assertNever } from './type-guards.js';

export interface FormattedError {
  readonly error: string;
  readonly message: string;
  readonly details: readonly string[];
  readonly suggestions: readonly string[];
}

export function formatAppError(error: AppError): FormattedError {
  switch (error._tag) {
    case 'UnknownOperator':
      return {
        error: error._tag,
        message: error.message,
        details: [`Registered operators: ${error.registered.join(', ')}`],
        suggestions: [`Register "${error.symbol}" before evaluating trees that use it`],
      };

    case 'MalformedNode':
      return {
        error: error._tag,
        message: error.message,
        details: [error.details],
        suggestions: ['A question node needs a text "question" and an ordered, non-empty "branches" list'],
      };

    case 'CyclicTree':
      return {
        error: error._tag,
        message: error.message,
        details: [`Location: ${error.location}`],
        suggestions: ['Copy the shared subtree instead of referencing an ancestor'],
      };

    case 'InvalidReference':
      return {
        error: error._tag,
        message: error.message,
        details: [],
        suggestions: [`Use an array, set, map, string or range as the reference for "${error.symbol}"`],
      };

    case 'UnansweredQuestion':
      return {
        error: error._tag,
        message: error.message,
        details: error.variable ? [`Expected input: ${error.variable}`] : [],
        suggestions: error.variable
          ? [`Provide "${error.variable}"`]
          : ['Declare a "variable" on the question, or enable substring binding'],
      };

    case 'NoMatchingBranch':
      return {
        error: error._tag,
        message: error.message,
        details: [],
        suggestions: [`Check the value supplied for ${error.subject}`],
      };

    case 'TreeNotFound':
      return {
        error: error._tag,
        message: error.message,
        details: [],
        suggestions: error.suggestions.length > 0
          ? error.suggestions.slice(0, 3).map(s => `Try "${s}"`)
          : [`Run "branchwise list" to see all ${error.availableCount} trees`],
      };

    case 'ParseFailed':
      return {
        error: error._tag,
        message: error.message,
        details: error.details.split('\n'),
        suggestions: [`Fix the tree definition in ${error.source}`],
      };

    case 'ValidationFailed':
      return {
        error: error._tag,
        message: error.message,
        details: [...error.issues],
        suggestions: [`Check the ${error.field} and try again`],
      };

    case 'ConfigInvalid':
      return {
        error: error._tag,
        message: error.message,
        details: error.issues.length
          ? error.issues.map(i => `${i.path}: ${i.message}`)
          : ['(no details)'],
        suggestions: ['Fix the BRANCHWISE_* environment variables and restart'],
      };

    default:
      return assertNever(error);
  }
}

export function formatErrorForLogs(error: AppError): Record<string, unknown> {
  const base: Record<string, unknown> = {
    errorTag: error._tag,
    message: error.message,
  };

  for (const [key, value] of Object.entries(error)) {
    if (key !== '_tag' && key !== 'message') {
      base[key] = value;
    }
  }

  return base;
}
