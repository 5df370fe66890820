/**
 * CLI Commands - Public API
 */

export {
  executeTransformCommand,
  type TransformCommandDeps,
  type TransformCommandOptions,
} from './transform.js';
