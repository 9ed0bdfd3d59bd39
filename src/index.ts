import 'reflect-metadata';

// Engine: compile, evaluate, extend
export * from './engine/index.js';

// Errors
export * from './core/errors/index.js';

// Logging
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/types.js';
export { PinoLoggerFactory } from './core/logging/create-logger.js';

// Configuration
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig, LoadConfigOptions } from './config/app-config.js';

// Tree catalog and bundled trees
export * from './infrastructure/trees/index.js';
export { BUNDLED_DEFINITIONS, BUNDLED_TREES_DIR, createBundledCatalog } from './trees/bundled.js';
export { LOAN_DECISION_TREE, loanDecisionDefinition } from './trees/loan.js';
export { LoanPurpose, LOAN_PURPOSE_TREE, loanPurposeDefinition } from './trees/loan-purpose.js';
export { BLOOD_PRESSURE_TREE, bloodPressureDefinition } from './trees/cardiology/blood-pressure.js';
export { ATRIAL_FIBRILLATION_TREE, atrialFibrillationDefinition } from './trees/cardiology/atrial-fibrillation.js';
export { meanArterialPressure, hemodynamicStability, withHemodynamicStability } from './trees/cardiology/hemodynamics.js';

// Services
export * from './application/services/index.js';

// DI container
export { bootstrap, initializeContainer, container, resetContainer } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';
