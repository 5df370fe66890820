/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for container tokens, grouped by layer.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete validated application configuration */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** ILoggerFactory (pino in production) */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // I/O PORTS
  // ═══════════════════════════════════════════════════════════════════
  Io: {
    /** ByteReaderPort over standard input */
    Stdin: Symbol('Io.Stdin'),
    /** ByteWriterPort over standard output */
    Stdout: Symbol('Io.Stdout'),
    /** FileOpenerPort for named input files */
    FileOpener: Symbol('Io.FileOpener'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // USE CASES
  // ═══════════════════════════════════════════════════════════════════
  UseCases: {
    ResolveSource: Symbol('UseCases.ResolveSource'),
    TransformInput: Symbol('UseCases.TransformInput'),
  },
} as const;
