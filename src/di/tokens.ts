/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for DI tokens, grouped by layer.
 * Consumers use `@inject(DI.<Layer>.<Name>)`; constructor parameters are
 * always injected by token, never by emitted type metadata.
 */
export const DI = {
  Config: {
    /** Validated application config */
    App: Symbol('Config.App'),
  },

  Logging: {
    /** Component logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  Services: {
    /** Compile / validate / search facade over the formula engine */
    Formula: Symbol('Services.Formula'),
  },
} as const;
