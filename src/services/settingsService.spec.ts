import { SKIP_DIRECTORIES } from '../core/constants';
import { SettingsService } from './settingsService';

describe('SettingsService', () => {
  afterEach(() => {
    SettingsService.reset();
  });

  describe('load', () => {
    it('should use defaults for an empty source', () => {
      expect(SettingsService.load({})).toEqual({
        logLevel: 'warn',
        recursiveSearch: false,
        excludeDirectories: SKIP_DIRECTORIES
      });
    });

    it('should read prefixed variables', () => {
      expect(SettingsService.load({
        VSFILE_LOG_LEVEL: ' DEBUG ',
        VSFILE_RECURSIVE_SEARCH: '1',
        VSFILE_EXCLUDE_DIRECTORIES: 'bin, obj,,dist'
      })).toEqual({
        logLevel: 'debug',
        recursiveSearch: true,
        excludeDirectories: ['bin', 'obj', 'dist']
      });
    });

    it('should fall back to defaults for values it does not recognise', () => {
      const settings = SettingsService.load({
        VSFILE_LOG_LEVEL: 'verbose',
        VSFILE_RECURSIVE_SEARCH: 'yes',
        VSFILE_EXCLUDE_DIRECTORIES: ' , '
      });

      expect(settings).toEqual(SettingsService.defaults());
    });

    it('should read false and 0 as disabled', () => {
      expect(SettingsService.load({ VSFILE_RECURSIVE_SEARCH: 'False' }).recursiveSearch).toBe(false);
      expect(SettingsService.load({ VSFILE_RECURSIVE_SEARCH: '0' }).recursiveSearch).toBe(false);
    });
  });

  describe('current', () => {
    it('should return the same settings until reset', () => {
      const first = SettingsService.current();

      expect(SettingsService.current()).toBe(first);

      SettingsService.reset();
      expect(SettingsService.current()).not.toBe(first);
    });

    it('should apply overrides passed to reset', () => {
      SettingsService.reset({ recursiveSearch: true, logLevel: 'silent' });

      expect(SettingsService.current().recursiveSearch).toBe(true);
      expect(SettingsService.current().logLevel).toBe('silent');
    });
  });
});
