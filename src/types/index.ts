/**
 * Type definitions for talkdeck
 */

// Handling of headers that jump more than one level deeper than the open section
export enum SkipLevelPolicy {
  Forgiving = 'forgiving',
  Strict = 'strict',
}

// Main configuration interface
export interface SlideDeckConfig {
  parser: {
    skipLevelHeaders: SkipLevelPolicy;
    tabWidth: number;
  };

  style: {
    enableTypographer: boolean;
    enableLinkify: boolean;
    openLinksInNewTab: boolean;
  };

  render: {
    lineBreak: string;
    titleSlide: boolean;
  };

  codeChunk: {
    enableScriptExecution: boolean;
    playableLanguages: string[];
  };
}

// Deck author from front matter
export interface DeckAuthor {
  name: string;
  email?: string;
  url?: string;
}

// Deck metadata read from YAML front matter
export interface DeckMetadata {
  title?: string;
  subtitle?: string;
  date?: string;
  summary?: string;
  tags: string[];
  authors: DeckAuthor[];
}

// Fence info string split into language + attributes
export interface CodeFenceInfo {
  language: string;
  attrs: Record<string, string>;
}
