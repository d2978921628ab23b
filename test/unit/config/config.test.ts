import pino from 'pino';
import { configure, defineConfig, getConfig, resetConfig, resolveConfig } from '../../../src/config/index.js';
import { Shell } from '../../../src/execution/shell.js';
import { Identify } from '../../../src/tool/identify.js';
import { logger } from '../../../src/logger.js';
import { FakeBackend } from '../../support/fake-backend.js';

describe('defineConfig', () => {
  it('fills in the defaults', () => {
    expect(defineConfig()).toEqual({
      timeoutMs: null,
      validateOnCreate: true,
      whiny: true,
      logger,
      shellApi: 'execa',
    });
  });

  it('keeps explicit values, including false', () => {
    const config = defineConfig({ whiny: false, validateOnCreate: false, timeoutMs: 1500, shellApi: 'child-process' });
    expect(config.whiny).toBe(false);
    expect(config.validateOnCreate).toBe(false);
    expect(config.timeoutMs).toBe(1500);
    expect(config.shellApi).toBe('child-process');
  });
});

describe('process default config', () => {
  afterEach(() => {
    resetConfig();
  });

  it('creates the default lazily and returns the same object', () => {
    expect(getConfig()).toBe(getConfig());
    expect(getConfig().whiny).toBe(true);
  });

  it('merges an object update over the current settings', () => {
    configure({ timeoutMs: 5000 });
    configure({ whiny: false });
    expect(getConfig().timeoutMs).toBe(5000);
    expect(getConfig().whiny).toBe(false);
  });

  it('lets a callback edit the settings in place', () => {
    const returned = configure((config) => {
      config.validateOnCreate = false;
    });
    expect(returned).toBe(getConfig());
    expect(getConfig().validateOnCreate).toBe(false);
  });

  it('goes back to the defaults after resetConfig()', () => {
    configure({ timeoutMs: 10 });
    resetConfig();
    expect(getConfig().timeoutMs).toBeNull();
  });

  it('is the fallback when no config is passed', async () => {
    const backend = new FakeBackend(() => ({ stdout: 'ok\n' }));
    configure({ shellApi: backend, logger: pino({ level: 'silent' }) });

    expect(new Shell().config).toBe(getConfig());
    await expect(Identify.run((identify) => identify.arg('a.dcm'))).resolves.toBe('ok');
    expect(backend.commands()).toEqual([['gdcminfo', 'a.dcm']]);
  });

  it('prefers an explicit config over the process default', () => {
    const explicit = defineConfig({ whiny: false });
    configure({ whiny: true });
    expect(resolveConfig(explicit)).toBe(explicit);
    expect(resolveConfig()).toBe(getConfig());
  });
});
