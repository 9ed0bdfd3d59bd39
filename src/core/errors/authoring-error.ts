import type { AuthoringError } from './app-error.js';

/**
 * Thrown for defects in a tree or in registry setup.
 *
 * Authoring problems are never turned into an "Error" decision: they surface
 * as exceptions so they are caught while trees are written and tested.
 * The structured issue travels on `.issue`.
 */
export class DecisionTreeAuthoringError extends Error {
  public readonly issue: AuthoringError;

  constructor(issue: AuthoringError) {
    super(issue.message);
    this.name = 'DecisionTreeAuthoringError';
    this.issue = issue;
  }
}

export function isDecisionTreeAuthoringError(e: unknown): e is DecisionTreeAuthoringError {
  return e instanceof DecisionTreeAuthoringError;
}
