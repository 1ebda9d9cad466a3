/**
 * Capability queries the renderer asks about nodes. Answers come from the
 * caller; the defaults here only read configuration.
 */

import type { CodeElement } from '../deck/model';
import type { SlideDeckConfig } from '../types';

/**
 * Whether a code block may be handed to an execution service
 */
export type PlayableQuery = (code: CodeElement) => boolean;

export const neverPlayable: PlayableQuery = () => false;

/**
 * Playable when script execution is enabled, the block is not empty, its
 * language is one the execution service runs, and it was not opted out with
 * `play=false`.
 */
export function createPlayableQuery(
  options: SlideDeckConfig['codeChunk'],
): PlayableQuery {
  if (!options.enableScriptExecution) {
    return neverPlayable;
  }
  const languages = new Set(
    options.playableLanguages.map((language) => language.toLowerCase()),
  );
  return (code) =>
    code.text.trim() !== '' &&
    languages.has(code.language.toLowerCase()) &&
    code.attrs.play !== 'false';
}

/**
 * Whether the rendered block should be marked editable
 */
export function hasEditFlag(code: CodeElement): boolean {
  return code.edit;
}
