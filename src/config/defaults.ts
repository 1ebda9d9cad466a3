/**
 * Default configuration values for talkdeck
 */

import { type SlideDeckConfig, SkipLevelPolicy } from '../types';

export const defaultConfig: SlideDeckConfig = {
  parser: {
    skipLevelHeaders: SkipLevelPolicy.Forgiving,
    tabWidth: 4,
  },

  style: {
    enableTypographer: false,
    enableLinkify: false,
    openLinksInNewTab: true,
  },

  render: {
    lineBreak: '<br>\n',
    titleSlide: true,
  },

  codeChunk: {
    enableScriptExecution: false,
    playableLanguages: [
      'go',
      'javascript',
      'js',
      'typescript',
      'ts',
      'python',
      'python3',
      'ruby',
      'bash',
      'sh',
      'rust',
    ],
  },
};
