/**
 * Error Factories - Consistent Error Construction
 *
 * `Err` namespace for all error constructors so messages stay uniform.
 */

import type {
  UnknownOperatorError,
  MalformedNodeError,
  CyclicTreeError,
  InvalidReferenceError,
  UnansweredQuestionError,
  NoMatchingBranchError,
  TreeNotFoundError,
  ParseFailedError,
  ValidationFailedError,
  ConfigInvalidError,
  ConfigIssue,
} from './app-error.js';

export const Err = {
  // ==========================================================================
  // Authoring Errors
  // ==========================================================================

  unknownOperator: (symbol: string, registered: readonly string[]): UnknownOperatorError => ({
    _tag: 'UnknownOperator',
    symbol,
    registered,
    message: `Unsupported operator "${symbol}". Register it first (registered: ${registered.join(', ')}).`,
  }),

  malformedNode: (location: string, details: string): MalformedNodeError => ({
    _tag: 'MalformedNode',
    location,
    details,
    message: `Malformed node at ${location}: ${details}`,
  }),

  cyclicTree: (location: string): CyclicTreeError => ({
    _tag: 'CyclicTree',
    location,
    message: `Tree node at ${location} is its own ancestor`,
  }),

  invalidReference: (symbol: string, reference: string): InvalidReferenceError => ({
    _tag: 'InvalidReference',
    symbol,
    reference,
    message: `Operator "${symbol}" cannot use ${reference} as a reference`,
  }),

  // ==========================================================================
  // Input Errors
  // ==========================================================================

  unansweredQuestion: (question: string, variable?: string): UnansweredQuestionError => ({
    _tag: 'UnansweredQuestion',
    question,
    variable,
    message: `Question "${question}" could not be answered with supplied arguments.`,
  }),

  noMatchingBranch: (subject: string, value: string): NoMatchingBranchError => ({
    _tag: 'NoMatchingBranch',
    subject,
    value,
    message: `Invalid value for ${subject}: ${value}`,
  }),

  // ==========================================================================
  // Resource Errors
  // ==========================================================================

  treeNotFound: (
    treeId: string,
    suggestions: readonly string[] = [],
    availableCount: number = 0
  ): TreeNotFoundError => ({
    _tag: 'TreeNotFound',
    treeId,
    suggestions,
    availableCount,
    message: suggestions.length > 0
      ? `Tree "${treeId}" not found. Did you mean: ${suggestions.slice(0, 3).join(', ')}?`
      : `Tree "${treeId}" not found (${availableCount} trees available)`,
  }),

  // ==========================================================================
  // Data Errors
  // ==========================================================================

  parseFailed: (source: string, details: string): ParseFailedError => ({
    _tag: 'ParseFailed',
    source,
    details,
    message: `Failed to parse ${source}: ${details}`,
  }),

  validationFailed: (field: string, issues: readonly string[]): ValidationFailedError => ({
    _tag: 'ValidationFailed',
    field,
    issues,
    message: `Invalid ${field}: ${issues.join('; ')}`,
  }),

  // ==========================================================================
  // Configuration Errors
  // ==========================================================================

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),
} as const;
