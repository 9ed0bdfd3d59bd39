/**
 * Error System Exports
 */

export type * from './app-error.js';
export * from './factories.js';
export * from './type-guards.js';
export * from './formatter.js';
export * from './boundary-validation.js';
export * from './authoring-error.js';
