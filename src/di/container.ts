import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { ByteReaderPort, ByteWriterPort } from '../ports/byte-stream.port.js';
import type { FileOpenerPort } from '../ports/file-opener.port.js';
import { STDIN, describeInputSource } from '../domain/input-source.js';
import { NodeStreamReader } from '../infra/node/stream-reader.js';
import { NodeStreamWriter } from '../infra/node/stream-writer.js';
import { NodeFileOpener } from '../infra/node/file-opener.js';
import type { ResolveSource } from '../application/use-cases/resolve-source.js';
import { createResolveSource } from '../application/use-cases/resolve-source.js';
import type { TransformInput } from '../application/use-cases/transform-input.js';
import { createTransformInputUseCase } from '../application/use-cases/transform-input.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but must not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();

  // Tests may pre-register their own terminator.
  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION + LOGGING REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // Tests inject config explicitly before initialization; never overwrite it.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: process.env });

  if (configResult.isErr()) {
    createBootstrapLogger('container').error({ issues: configResult.error.issues }, 'Configuration rejected');
    console.error(formatAppError(configResult.error));
    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    return terminator.terminate({ kind: 'failure' });
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;

  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory(
      (c: DependencyContainer) => new PinoLoggerFactory(c.resolve<ValidatedConfig>(DI.Config.App).logging.level)
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// I/O + USE CASE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerIo(): void {
  if (!container.isRegistered(DI.Io.Stdin)) {
    container.register<ByteReaderPort>(DI.Io.Stdin, {
      useFactory: instanceCachingFactory(() => new NodeStreamReader(process.stdin, describeInputSource(STDIN))),
    });
  }
  if (!container.isRegistered(DI.Io.Stdout)) {
    container.register<ByteWriterPort>(DI.Io.Stdout, {
      useFactory: instanceCachingFactory(() => new NodeStreamWriter(process.stdout, '<stdout>')),
    });
  }
  if (!container.isRegistered(DI.Io.FileOpener)) {
    container.register<FileOpenerPort>(DI.Io.FileOpener, {
      useFactory: instanceCachingFactory(() => new NodeFileOpener()),
    });
  }
}

function registerUseCases(): void {
  container.register<ResolveSource>(DI.UseCases.ResolveSource, {
    useFactory: instanceCachingFactory((c: DependencyContainer) =>
      createResolveSource({
        stdin: c.resolve<ByteReaderPort>(DI.Io.Stdin),
        files: c.resolve<FileOpenerPort>(DI.Io.FileOpener),
      })
    ),
  });

  container.register<TransformInput>(DI.UseCases.TransformInput, {
    useFactory: instanceCachingFactory((c: DependencyContainer) =>
      createTransformInputUseCase({
        resolveSource: c.resolve<ResolveSource>(DI.UseCases.ResolveSource),
        output: c.resolve<ByteWriterPort>(DI.Io.Stdout),
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('transform-input'),
      })
    ),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wire the container. Idempotent.
 * Order matters: the config failure path needs the terminator.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;

  registerRuntime(options);
  registerConfig();
  registerLogging();
  registerIo();
  registerUseCases();

  initialized = true;
}

export function isInitialized(): boolean {
  return initialized;
}

/**
 * Tests only: drop every registration so the next initialization starts clean.
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export { container };
