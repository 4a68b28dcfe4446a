import 'reflect-metadata';
import { container } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<ValidatedConfig, ConfigInvalidError> {
  // Allow tests to inject config explicitly before container initialization.
  // This prevents the composition root from overwriting test-provided values.
  if (container.isRegistered(DI.Config.App)) {
    return ok(container.resolve<ValidatedConfig>(DI.Config.App));
  }

  const configResult = loadConfig({ env });
  if (configResult.isErr()) return err(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(configResult.value);
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // Single source of truth for runtime inference.
  // Env access is allowed here (composition root), but should not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
}

function registerRuntime(mode: RuntimeMode): void {
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

function registerLogging(config: ValidatedConfig): void {
  if (container.isRegistered(DI.Logging.Factory)) return;
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useValue: new PinoLoggerFactory(config.logging.level),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Register config, logging and runtime ports.
 * Idempotent; config errors are returned, not thrown.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const env = options.env ?? process.env;
  const configResult = registerConfig(env);
  if (configResult.isErr()) {
    createBootstrapLogger('di').error({ issues: configResult.error.issues }, 'Configuration rejected');
    return err(configResult.error);
  }

  registerRuntime(options.runtimeMode ?? detectRuntimeMode(env));
  registerLogging(configResult.value);
  initialized = true;
  return ok(undefined);
}

/**
 * Reset container state (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
