import { describe, it, expect, vi, beforeEach } from 'vitest';

// features.ts exports a singleton, so every test re-imports it after vi.resetModules().

vi.mock('../logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnValue({
      info: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
    }),
  },
}));

describe('features', () => {
  beforeEach(() => {
    vi.resetModules();
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('FEATURE_') || key === 'RELAYPOST_MODE') {
        delete process.env[key];
      }
    }
  });

  describe('mode resolution', () => {
    it('defaults to prod when RELAYPOST_MODE is unset', async () => {
      const { createFeatures } = await import('../features.js');
      const f = createFeatures();
      expect(f.mode).toBe('prod');
      expect(f.isEnabled('openGroups')).toBe(true);
    });

    it('respects RELAYPOST_MODE=dev', async () => {
      process.env.RELAYPOST_MODE = 'dev';
      const { createFeatures } = await import('../features.js');
      const f = createFeatures();
      expect(f.mode).toBe('dev');
      expect(f.isEnabled('openGroups')).toBe(false);
    });

    it('treats an unrecognised mode as prod', async () => {
      process.env.RELAYPOST_MODE = 'staging';
      const { createFeatures } = await import('../features.js');
      expect(createFeatures().mode).toBe('prod');
    });
  });

  describe('env var overrides', () => {
    it('FEATURE_PUSH_NOTIFICATIONS=true overrides the dev default', async () => {
      process.env.RELAYPOST_MODE = 'dev';
      process.env.FEATURE_PUSH_NOTIFICATIONS = 'true';
      const { createFeatures } = await import('../features.js');
      expect(createFeatures().isEnabled('pushNotifications')).toBe(true);
    });

    it('FEATURE_POLLER=0 overrides the prod default', async () => {
      process.env.FEATURE_POLLER = '0';
      const { createFeatures } = await import('../features.js');
      expect(createFeatures().isEnabled('poller')).toBe(false);
    });
  });

  describe('allFlags()', () => {
    it('returns dev values with overrides applied', async () => {
      process.env.RELAYPOST_MODE = 'dev';
      process.env.FEATURE_OPEN_GROUPS = '1';
      process.env.FEATURE_DISAPPEARING_MESSAGES = 'false';
      const { createFeatures } = await import('../features.js');
      expect(createFeatures().allFlags()).toEqual({
        openGroups: true,
        pushNotifications: false,
        poller: true,
        disappearingMessages: false,
      });
    });
  });

  describe('toEnvKey()', () => {
    it('converts camelCase flag names to FEATURE_SCREAMING_SNAKE', async () => {
      const { toEnvKey } = await import('../features.js');
      expect(toEnvKey('disappearingMessages')).toBe('FEATURE_DISAPPEARING_MESSAGES');
      expect(toEnvKey('poller')).toBe('FEATURE_POLLER');
    });
  });

  describe('unknown FEATURE_* env vars', () => {
    it('warns about unknown FEATURE_* env vars', async () => {
      process.env.FEATURE_NONEXISTENT = 'true';
      const { logger } = await import('../logger.js');
      const { createFeatures } = await import('../features.js');
      createFeatures();
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ unknownVars: ['FEATURE_NONEXISTENT'] }),
        expect.stringContaining('unknown'),
      );
    });
  });
});
