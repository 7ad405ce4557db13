import { logger } from './logger.js';

// ---------------------------------------------------------------------------
// Flag registry
// ---------------------------------------------------------------------------

const FLAG_REGISTRY = {
  openGroups:           { prod: true,  dev: false, desc: 'Default open-group room retrieval on launch' },
  pushNotifications:    { prod: true,  dev: false, desc: 'Register the push token with the push server' },
  poller:               { prod: true,  dev: true,  desc: 'Poll the server inbox and enqueue receive jobs' },
  disappearingMessages: { prod: true,  dev: true,  desc: 'Recurring deletion of expired messages' },
} as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Union of all known flag names. */
export type FeatureFlag = keyof typeof FLAG_REGISTRY;

/** Operating mode: prod (default) or dev. */
export type RelaypostMode = 'prod' | 'dev';

/** Resolved feature flag interface. */
export interface Features {
  /** The active operating mode (prod or dev). */
  readonly mode: RelaypostMode;
  /** Check if a specific feature flag is enabled. */
  isEnabled(flag: FeatureFlag): boolean;
  /** Return a snapshot of all resolved flag values. */
  allFlags(): Record<string, boolean>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Convert a camelCase flag name to FEATURE_SCREAMING_SNAKE env var name.
 *
 * e.g. pushNotifications → FEATURE_PUSH_NOTIFICATIONS
 */
export function toEnvKey(flag: string): string {
  const snake = flag.replace(/[A-Z]/g, (ch) => `_${ch}`).toUpperCase();
  return `FEATURE_${snake}`;
}

function resolveMode(raw: string | undefined): RelaypostMode {
  return raw === 'dev' ? 'dev' : 'prod';
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a Features instance by resolving flags from:
 * 1. FEATURE_<SCREAMING_SNAKE> env var override (if set)
 * 2. Mode profile default from FLAG_REGISTRY
 *
 * Mode is determined by RELAYPOST_MODE env var; defaults to 'prod'.
 */
export function createFeatures(): Features {
  const mode = resolveMode(process.env.RELAYPOST_MODE);

  const resolved = new Map<string, boolean>();
  const known = new Set<string>();

  for (const [flag, config] of Object.entries(FLAG_REGISTRY)) {
    const envKey = toEnvKey(flag);
    known.add(envKey);
    const envVal = process.env[envKey];

    if (envVal !== undefined) {
      // Env var override: treat 'true'/'1' as true, everything else as false
      resolved.set(flag, envVal === 'true' || envVal === '1');
    } else {
      resolved.set(flag, config[mode]);
    }
  }

  const unknownVars = Object.keys(process.env).filter((key) => key.startsWith('FEATURE_') && !known.has(key));
  if (unknownVars.length > 0) {
    logger.warn({ unknownVars }, 'unknown FEATURE_* env vars detected, they have no effect');
  }

  logger.info({ mode, flags: Object.fromEntries(resolved) }, 'feature flags resolved');

  return {
    mode,
    isEnabled(flag: FeatureFlag): boolean {
      return resolved.get(flag) ?? false;
    },
    allFlags(): Record<string, boolean> {
      return Object.fromEntries(resolved);
    },
  };
}

// ---------------------------------------------------------------------------
// Singleton (convenience export)
// ---------------------------------------------------------------------------

export const features: Features = createFeatures();
