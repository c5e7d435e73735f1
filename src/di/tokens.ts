/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by concern.
 *
 * ADDING A NEW SERVICE:
 * 1. Add a token here under the matching namespace
 * 2. Register it in container.ts
 * 3. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated error-handling configuration */
    Errors: Symbol('Config.Errors'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Component logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RECOVERY
  // ═══════════════════════════════════════════════════════════════════
  Recovery: {
    /** Blocking file-system port used by strategies */
    FileSystem: Symbol('Recovery.FileSystem'),
    /** Builds a fresh list of the built-in strategies for each session */
    StrategyFactory: Symbol('Recovery.StrategyFactory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SESSIONS
  // ═══════════════════════════════════════════════════════════════════
  Sessions: {
    /** Builds one independent ErrorHandlingSession per document */
    Factory: Symbol('Sessions.Factory'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
