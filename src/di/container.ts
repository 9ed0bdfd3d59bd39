import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import { loadConfig, type ValidatedConfig } from '../config/app-config.js';
import { formatAppError, formatErrorForLogs } from '../core/errors/formatter.js';
import { getBootstrapLogger } from '../core/logging/bootstrap.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { getDefaultOperatorRegistry } from '../engine/default-engine.js';
import { DecisionTreeEvaluator, type EvaluatorOptions } from '../engine/evaluator.js';
import type { OperatorRegistry } from '../engine/operator-registry.js';
import { FileTreeLoader } from '../infrastructure/trees/file-tree-loader.js';
import { CompositeTreeCatalog } from '../infrastructure/trees/composite-tree-catalog.js';
import { DirectoryTreeCatalog } from '../infrastructure/trees/directory-tree-catalog.js';
import type { ITreeCatalog } from '../infrastructure/trees/types.js';
import { createBundledCatalog } from '../trees/bundled.js';
import { DefaultTreeService } from '../application/services/tree-service.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment read for configuration (defaults to process.env) */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): void {
  // Tests may inject config before initialization; do not overwrite it.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: options.env ?? process.env });
  if (configResult.isErr()) {
    const formatted = formatAppError(configResult.error);
    getBootstrapLogger().error(formatErrorForLogs(configResult.error), 'Configuration rejected');
    throw new Error(`${formatted.message}: ${formatted.details.join('; ')}`);
  }
  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), not in services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'library' };
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerEngine(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory(() => new PinoLoggerFactory()),
    });
  }

  // Shared with the module-level registerOperator()/evaluate() API.
  if (!container.isRegistered(DI.Engine.Operators)) {
    container.register<OperatorRegistry>(DI.Engine.Operators, { useValue: getDefaultOperatorRegistry() });
  }

  container.register<EvaluatorOptions>(DI.Engine.Options, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return { inputBinding: config.engine.inputBinding };
    }),
  });

  container.register(DI.Engine.Evaluator, {
    useFactory: instanceCachingFactory((c) => c.resolve(DecisionTreeEvaluator)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// TREE CATALOG REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerTrees(): void {
  container.register(DI.Trees.FileLoader, {
    useFactory: instanceCachingFactory((c) => c.resolve(FileTreeLoader)),
  });

  if (container.isRegistered(DI.Trees.Catalog)) return;

  // Bundled first, configured directory second: directory trees override by id.
  container.register<ITreeCatalog>(DI.Trees.Catalog, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const loader = c.resolve<FileTreeLoader>(DI.Trees.FileLoader);
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      const bundled = createBundledCatalog(loader);
      return config.trees.directory === null
        ? bundled
        : new CompositeTreeCatalog([bundled, new DirectoryTreeCatalog(loader, config.trees.directory)]);
    }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  container.register(DI.Services.Trees, {
    useFactory: instanceCachingFactory((c) => c.resolve(DefaultTreeService)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container. Idempotent; registration is synchronous, so
 * there is no window for concurrent callers to interleave.
 *
 * Throws when configuration is invalid.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;

  registerRuntime(options);
  registerConfig(options);
  registerEngine();
  registerTrees();
  registerServices();
  initialized = true;
}

/**
 * Entry point helper: initialize and hand back the container.
 */
export function bootstrap(options: ContainerInitOptions = {}): DependencyContainer {
  initializeContainer(options);
  return container;
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
