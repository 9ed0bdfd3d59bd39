/**
 * Error Hierarchy - Discriminated Unions
 *
 * Errors are data. Each category maps to who has to act on it:
 * tree authors (AuthoringError), callers supplying inputs (InputError),
 * whoever feeds files or CLI arguments (DataError), and operators of the
 * process (ConfigurationError).
 */

// ============================================================================
// Error Categories
// ============================================================================

export type AppError =
  | AuthoringError
  | InputError
  | ResourceError
  | DataError
  | ConfigurationError;

// ============================================================================
// Authoring Errors (defects in a tree or in registry setup - always thrown)
// ============================================================================

export type AuthoringError =
  | UnknownOperatorError
  | MalformedNodeError
  | CyclicTreeError
  | InvalidReferenceError;

export interface UnknownOperatorError {
  readonly _tag: 'UnknownOperator';
  readonly symbol: string;
  readonly registered: readonly string[];
  readonly message: string;
}

export interface MalformedNodeError {
  readonly _tag: 'MalformedNode';
  /** Location of the offending node, e.g. `$.branches[1].then` */
  readonly location: string;
  readonly details: string;
  readonly message: string;
}

export interface CyclicTreeError {
  readonly _tag: 'CyclicTree';
  readonly location: string;
  readonly message: string;
}

export interface InvalidReferenceError {
  readonly _tag: 'InvalidReference';
  readonly symbol: string;
  readonly reference: string;
  readonly message: string;
}

// ============================================================================
// Input Errors (end-user data problems - recovered into an Error decision)
// ============================================================================

export type InputError =
  | UnansweredQuestionError
  | NoMatchingBranchError;

export interface UnansweredQuestionError {
  readonly _tag: 'UnansweredQuestion';
  readonly question: string;
  readonly variable?: string;
  readonly message: string;
}

export interface NoMatchingBranchError {
  readonly _tag: 'NoMatchingBranch';
  readonly subject: string;
  /** Rendered form of the rejected value */
  readonly value: string;
  readonly message: string;
}

// ============================================================================
// Resource Errors
// ============================================================================

export type ResourceError = TreeNotFoundError;

export interface TreeNotFoundError {
  readonly _tag: 'TreeNotFound';
  readonly treeId: string;
  readonly suggestions: readonly string[];
  readonly availableCount: number;
  readonly message: string;
}

// ============================================================================
// Data Errors (validation/parsing at I/O boundaries)
// ============================================================================

export type DataError =
  | ParseFailedError
  | ValidationFailedError;

export interface ParseFailedError {
  readonly _tag: 'ParseFailed';
  readonly source: string;
  readonly details: string;
  readonly message: string;
}

export interface ValidationFailedError {
  readonly _tag: 'ValidationFailed';
  readonly field: string;
  readonly issues: readonly string[];
  readonly message: string;
}

// ============================================================================
// Configuration Errors
// ============================================================================

export type ConfigurationError = ConfigInvalidError;

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export interface ConfigInvalidError {
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}
