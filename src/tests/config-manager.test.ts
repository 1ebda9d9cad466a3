/**
 * Tests for the configuration manager — defaults, overrides, settings files.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  applySettings,
  getConfig,
  getFullConfig,
  loadSettingsFile,
  resetConfig,
  updateConfig,
} from '../config/ConfigManager';
import { defaultConfig } from '../config/defaults';
import { DeckParser } from '../deck/DeckParser';
import { StructuralParseError } from '../deck/errors';
import { SkipLevelPolicy } from '../types';

afterEach(() => {
  resetConfig();
  vi.restoreAllMocks();
});

describe('ConfigManager', () => {
  it('falls back to the defaults', () => {
    expect(getFullConfig()).toEqual(defaultConfig);
    expect(getConfig('tabWidth')).toBeUndefined();
  });

  it('merges stored values over the defaults', () => {
    updateConfig('tabWidth', 2);
    updateConfig('openLinksInNewTab', false);
    const config = getFullConfig();
    expect(config.parser.tabWidth).toBe(2);
    expect(config.style.openLinksInNewTab).toBe(false);
    expect(config.style.enableLinkify).toBe(defaultConfig.style.enableLinkify);
  });

  it('feeds new components', () => {
    updateConfig('skipLevelHeaders', SkipLevelPolicy.Strict);
    expect(() => new DeckParser().parse('* A\n*** C\n')).toThrow(StructuralParseError);
  });

  it('lets constructor overrides win over stored values', () => {
    updateConfig('skipLevelHeaders', SkipLevelPolicy.Strict);
    const parser = new DeckParser({
      parser: { skipLevelHeaders: SkipLevelPolicy.Forgiving, tabWidth: 4 },
    });
    expect(parser.parse('* A\n*** C\n').document.sections).toHaveLength(1);
  });

  it('keeps valid settings and skips the rest', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const applied = applySettings({ tabWidth: 0, colour: 'blue', enableLinkify: true });
    expect(applied).toEqual({ enableLinkify: true });
    expect(getFullConfig().parser.tabWidth).toBe(defaultConfig.parser.tabWidth);
    expect(warn).toHaveBeenCalledWith('Ignoring unknown talkdeck setting "colour"');
    expect(warn).toHaveBeenCalledWith(
      expect.stringContaining('Ignoring invalid talkdeck setting "tabWidth"'),
    );
  });

  it('ignores settings that are not a mapping', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    updateConfig('tabWidth', 2);
    expect(applySettings('tabWidth: 2')).toEqual({});
    expect(getConfig('tabWidth')).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(applySettings(null)).toEqual({});
  });

  it('loads settings from a YAML file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'talkdeck-'));
    const file = path.join(dir, 'settings.yaml');
    fs.writeFileSync(
      file,
      'skipLevelHeaders: strict\nlineBreak: "<br/>"\nplayableLanguages:\n  - go\n',
    );
    try {
      loadSettingsFile(file);
      const config = getFullConfig();
      expect(config.parser.skipLevelHeaders).toBe(SkipLevelPolicy.Strict);
      expect(config.render.lineBreak).toBe('<br/>');
      expect(config.codeChunk.playableLanguages).toEqual(['go']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
