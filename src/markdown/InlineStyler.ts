/**
 * Inline style engine - wraps markdown-it inline rendering
 */

import MarkdownIt from 'markdown-it';
import { getFullConfig } from '../config/ConfigManager';
import { StyleEngineWarning } from '../deck/errors';
import type { SlideDeckConfig } from '../types';

type CoreRule = Parameters<MarkdownIt['core']['ruler']['push']>[1];
type StateCore = Parameters<CoreRule>[0];
type Token = StateCore['tokens'][number];

export type StyleWarningHandler = (warning: StyleEngineWarning) => void;

export interface InlineStylerOptions {
  onWarning?: StyleWarningHandler;
}

// Per-call scratch space handed to markdown-it as `env`
interface StyleEnv {
  unmatched: string[];
}

function isStyleEnv(env: unknown): env is StyleEnv {
  return (
    typeof env === 'object' &&
    env !== null &&
    'unmatched' in env &&
    Array.isArray(env.unmatched)
  );
}

// Deck link pattern: [[url]] or [[url][label]]
const DECK_LINK_PATTERN = /\[\[([^\s[\]]+)\](?:\[([^\]]*)\])?\]/g;

// Delimiters that mean something only in pairs; one left in plain text was not understood
const UNMATCHED_SEQUENCES = ['[[', '**', '*', '`'];

const defaultWarningHandler: StyleWarningHandler = (warning) => {
  console.warn('Inline style warning:', warning.message);
};

/**
 * Create and configure a markdown-it instance for inline styling
 */
export function createInlineMarkdown(config: SlideDeckConfig): MarkdownIt {
  const md = new MarkdownIt({
    // Prose is never trusted with raw HTML; .html directives are the only way in
    html: false,
    linkify: config.style.enableLinkify,
    typographer: config.style.enableTypographer,
  });

  enableDeckLinks(md, config);

  md.core.ruler.before('text_join', 'unmatched_delimiters', (state) => {
    const env: unknown = state.env;
    if (!isStyleEnv(env)) return;
    for (const token of state.tokens) {
      for (const child of token.children ?? []) {
        if (child.type !== 'text') continue;
        for (const sequence of UNMATCHED_SEQUENCES) {
          if (
            child.content.includes(sequence) &&
            !env.unmatched.includes(sequence) &&
            !coveredByLongerSequence(child.content, sequence, env.unmatched)
          ) {
            env.unmatched.push(sequence);
          }
        }
      }
    }
  });

  return md;
}

// "*" inside an already reported "**" is the same problem, not a second one
function coveredByLongerSequence(
  content: string,
  sequence: string,
  reported: readonly string[],
): boolean {
  const longer = reported.filter(
    (other) => other.length > sequence.length && other.includes(sequence),
  );
  if (longer.length === 0) return false;
  let rest = content;
  for (const other of longer) {
    rest = rest.split(other).join('');
  }
  return !rest.includes(sequence);
}

/**
 * Turn [[url]] / [[url][label]] inside text tokens into links
 */
function enableDeckLinks(md: MarkdownIt, config: SlideDeckConfig): void {
  md.core.ruler.before('text_join', 'deck_link', (state) => {
    for (const blockToken of state.tokens) {
      const inlineTokens = blockToken.children;
      if (blockToken.type !== 'inline' || !inlineTokens) continue;

      for (let j = 0; j < inlineTokens.length; j++) {
        const token = inlineTokens[j];
        if (token.type !== 'text') continue;

        const content = token.content;
        const matches = [...content.matchAll(DECK_LINK_PATTERN)];
        if (matches.length === 0) continue;

        const newTokens: Token[] = [];
        let lastIndex = 0;

        for (const match of matches) {
          const [fullMatch, rawUrl = '', label] = match;
          const matchIndex = match.index ?? 0;
          const href = md.normalizeLink(rawUrl);
          if (!md.validateLink(href)) continue;

          if (matchIndex > lastIndex) {
            const textToken = new state.Token('text', '', 0);
            textToken.content = content.slice(lastIndex, matchIndex);
            newTokens.push(textToken);
          }

          const linkOpen = new state.Token('link_open', 'a', 1);
          linkOpen.attrs = [['href', href]];
          if (config.style.openLinksInNewTab) {
            linkOpen.attrSet('target', '_blank');
          }
          newTokens.push(linkOpen);

          const textToken = new state.Token('text', '', 0);
          textToken.content = label ? label : md.normalizeLinkText(rawUrl);
          newTokens.push(textToken);

          newTokens.push(new state.Token('link_close', 'a', -1));
          lastIndex = matchIndex + fullMatch.length;
        }

        if (newTokens.length === 0) continue;

        if (lastIndex < content.length) {
          const textToken = new state.Token('text', '', 0);
          textToken.content = content.slice(lastIndex);
          newTokens.push(textToken);
        }

        inlineTokens.splice(j, 1, ...newTokens);
        j += newTokens.length - 1;
      }
    }
  });
}

export class InlineStyler {
  private md: MarkdownIt;
  private config: SlideDeckConfig;
  private readonly onWarning: StyleWarningHandler;

  constructor(
    configOverrides?: Partial<SlideDeckConfig>,
    options: InlineStylerOptions = {},
  ) {
    this.config = { ...getFullConfig(), ...configOverrides };
    this.md = createInlineMarkdown(this.config);
    this.onWarning = options.onWarning ?? defaultWarningHandler;
  }

  /**
   * Style one raw string. Must be applied exactly once per string: the
   * output is HTML, and styling it again would escape it a second time.
   */
  style(text: string): string {
    const env: StyleEnv = { unmatched: [] };
    const html = this.md.renderInline(text, env);
    for (const sequence of env.unmatched) {
      this.onWarning(new StyleEngineWarning(sequence, text));
    }
    return html;
  }

  /**
   * Get the markdown-it instance for advanced customization
   */
  getMarkdownIt(): MarkdownIt {
    return this.md;
  }

  /**
   * Update configuration
   */
  updateConfig(configOverrides: Partial<SlideDeckConfig>): void {
    this.config = { ...this.config, ...configOverrides };
    this.md = createInlineMarkdown(this.config);
  }
}
