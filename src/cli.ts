#!/usr/bin/env node
/**
 * b64url CLI - Composition Root
 *
 * 1. Parses arguments (commander, see src/cli/program.ts)
 * 2. Wires dependencies through the container
 * 3. Interprets the CliResult into process termination
 *
 * Transform logic lives in src/cli/commands and src/application.
 */

import 'reflect-metadata';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { TransformInput } from './application/use-cases/transform-input.js';
import { interpretCliResult } from './cli/interpret-result.js';
import { executeTransformCommand } from './cli/commands/index.js';
import { createProgram } from './cli/program.js';

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

const program = createProgram(async (options) => {
  initializeContainer({ runtimeMode: { kind: 'cli' } });

  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  const transformInput = container.resolve<TransformInput>(DI.UseCases.TransformInput);

  const result = await executeTransformCommand(options, { transformInput });

  interpretCliResult(result, terminator);
});

await program.parseAsync();
