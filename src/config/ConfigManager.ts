/**
 * Configuration manager for talkdeck
 * Keeps the settings store and merges it over the defaults
 */

import * as fs from 'node:fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { type SlideDeckConfig, SkipLevelPolicy } from '../types';
import { defaultConfig } from './defaults';

const settingsSchema = z
  .object({
    skipLevelHeaders: z.nativeEnum(SkipLevelPolicy),
    tabWidth: z.number().int().positive(),
    enableTypographer: z.boolean(),
    enableLinkify: z.boolean(),
    openLinksInNewTab: z.boolean(),
    lineBreak: z.string(),
    titleSlide: z.boolean(),
    enableScriptExecution: z.boolean(),
    playableLanguages: z.array(z.string()),
  })
  .partial();

export type DeckSettings = z.infer<typeof settingsSchema>;
export type DeckSettingKey = keyof DeckSettings;

let settings: DeckSettings = {};

/**
 * Get a single value from the settings store
 */
export function getConfig<K extends DeckSettingKey>(key: K): DeckSettings[K] {
  return settings[key];
}

/**
 * Update a single value in the settings store
 */
export function updateConfig<K extends DeckSettingKey>(
  key: K,
  value: DeckSettings[K],
): void {
  const next: DeckSettings = { ...settings };
  next[key] = value;
  settings = next;
}

/**
 * Drop every stored setting so the defaults apply again
 */
export function resetConfig(): void {
  settings = {};
}

/**
 * Replace the settings store with an untrusted mapping.
 * Invalid or unknown entries are logged and skipped; the rest are kept.
 */
export function applySettings(raw: unknown): DeckSettings {
  if (raw === null || raw === undefined) {
    settings = {};
    return settings;
  }

  const mapping = z.record(z.unknown()).safeParse(raw);
  if (!mapping.success) {
    console.warn(
      'Ignoring talkdeck settings: expected a mapping of setting names to values',
    );
    settings = {};
    return settings;
  }

  const candidate: Record<string, unknown> = { ...mapping.data };
  for (const key of Object.keys(candidate)) {
    if (!(key in settingsSchema.shape)) {
      console.warn(`Ignoring unknown talkdeck setting "${key}"`);
      delete candidate[key];
    }
  }

  let result = settingsSchema.safeParse(candidate);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const key = String(issue.path[0]);
      console.warn(`Ignoring invalid talkdeck setting "${key}": ${issue.message}`);
      delete candidate[key];
    }
    result = settingsSchema.safeParse(candidate);
  }

  settings = result.success ? result.data : {};
  return settings;
}

/**
 * Load the settings store from a YAML file
 */
export function loadSettingsFile(filePath: string): DeckSettings {
  const source = fs.readFileSync(filePath, 'utf-8');
  return applySettings(yaml.parse(source));
}

/**
 * Get the complete configuration object
 */
export function getFullConfig(): SlideDeckConfig {
  return {
    parser: {
      skipLevelHeaders:
        getConfig('skipLevelHeaders') ??
        defaultConfig.parser.skipLevelHeaders,
      tabWidth: getConfig('tabWidth') ?? defaultConfig.parser.tabWidth,
    },

    style: {
      enableTypographer:
        getConfig('enableTypographer') ??
        defaultConfig.style.enableTypographer,
      enableLinkify:
        getConfig('enableLinkify') ?? defaultConfig.style.enableLinkify,
      openLinksInNewTab:
        getConfig('openLinksInNewTab') ??
        defaultConfig.style.openLinksInNewTab,
    },

    render: {
      lineBreak: getConfig('lineBreak') ?? defaultConfig.render.lineBreak,
      titleSlide: getConfig('titleSlide') ?? defaultConfig.render.titleSlide,
    },

    codeChunk: {
      enableScriptExecution:
        getConfig('enableScriptExecution') ??
        defaultConfig.codeChunk.enableScriptExecution,
      playableLanguages:
        getConfig('playableLanguages') ??
        defaultConfig.codeChunk.playableLanguages,
    },
  };
}
