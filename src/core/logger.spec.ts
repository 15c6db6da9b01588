import { SettingsService } from '../services/settingsService';
import { logger } from './logger';

describe('logger', () => {
  afterEach(() => {
    SettingsService.reset();
    jest.restoreAllMocks();
  });

  it('should prefix messages with time, level and name', () => {
    SettingsService.reset({ logLevel: 'debug' });
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

    logger('Reader').debug('opened', 42);

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toMatch(/^vsfile \d{2}:\d{2}:\d{2}\.\d{3} \[DBG\] Reader: opened$/);
    expect(debug.mock.calls[0][1]).toBe(42);
  });

  it('should drop messages below the configured level', () => {
    SettingsService.reset({ logLevel: 'warn' });
    const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const log = logger('Reader');
    log.info('skipped');
    log.warn('kept');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('[WRN] Reader: kept'));
  });

  it('should write nothing when silent', () => {
    SettingsService.reset({ logLevel: 'silent' });
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    logger('Reader').error('failed');

    expect(error).not.toHaveBeenCalled();
  });
});
