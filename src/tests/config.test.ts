import { afterEach, describe, expect, it, vi } from 'vitest';
import { defaultConfig, resolveConfig } from '../lib/config';
import { getLogLevel, log, setLogLevel } from '../lib/log';

describe('resolveConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(resolveConfig({})).toEqual(defaultConfig);
  });

  it('reads and normalizes overrides', () => {
    expect(
      resolveConfig({
        DOGDOG_DATA_DIR: '/tmp/dogdog-test',
        DOGDOG_QUESTIONS_PATH: 'fixtures/questions.json',
        DOGDOG_LOCALE: ' DE ',
        DOGDOG_LOG_LEVEL: 'WARN'
      })
    ).toEqual({ dataDir: '/tmp/dogdog-test', questionsPath: 'fixtures/questions.json', locale: 'de', logLevel: 'warn' });
  });

  it('ignores unknown locales and levels', () => {
    const config = resolveConfig({ DOGDOG_LOCALE: 'fr', DOGDOG_LOG_LEVEL: 'loud', DOGDOG_DATA_DIR: '   ' });
    expect(config.locale).toBe('en');
    expect(config.logLevel).toBe('info');
    expect(config.dataDir).toBe('.dogdog');
  });
});

describe('log', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('drops messages below the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');
    log.info('hidden');
    log.warn('shown', 3);
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[dogdog] shown', 3);
  });

  it('stays quiet when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('silent');
    log.error('nothing');
    expect(error).not.toHaveBeenCalled();
  });
});
