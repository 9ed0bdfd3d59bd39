/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by layer, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Register it in di/container.ts
 * 3. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // ENGINE
  // ═══════════════════════════════════════════════════════════════════
  Engine: {
    /** Process-wide operator registry */
    Operators: Symbol('Engine.Operators'),
    /** Evaluator options (input binding mode) */
    Options: Symbol('Engine.Options'),
    /** Decision tree evaluator */
    Evaluator: Symbol('Engine.Evaluator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // TREES
  // ═══════════════════════════════════════════════════════════════════
  Trees: {
    /** Merged catalog (bundled + directory) */
    Catalog: Symbol('Trees.Catalog'),
    /** JSON tree file loader */
    FileLoader: Symbol('Trees.FileLoader'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** List, describe and evaluate catalog trees */
    Trees: Symbol('Services.Trees'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  Runtime: {
    /** Runtime mode (cli/library/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated) */
    App: Symbol('Config.App'),
  },
} as const;
