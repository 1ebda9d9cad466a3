/**
 * Default HTML render rules
 */

import MarkdownIt from 'markdown-it';
import { getFullConfig } from '../../config/ConfigManager';
import type { MediaSize } from '../../deck/model';
import type { DeckAuthor, SlideDeckConfig } from '../../types';
import { escapeHtml } from '../../utils';
import type { RenderRules } from '../RenderRuleRegistry';

function sizeAttributes(size: MediaSize): string {
  const height = size.height !== undefined ? ` height="${size.height}"` : '';
  const width = size.width !== undefined ? ` width="${size.width}"` : '';
  return height + width;
}

/**
 * Normalize a URL the way markdown-it does for inline links. Returns null for
 * the schemes markdown-it refuses (javascript:, vbscript:, file:, data:).
 */
function safeUrl(md: MarkdownIt, url: string): string | null {
  const href = md.normalizeLink(url);
  return md.validateLink(href) ? href : null;
}

// Quotes and parentheses would end a CSS url('...') token
function cssUrl(href: string): string {
  return href.replace(
    /['()]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * One span per line, numbered from 1
 */
function numberedLines(text: string): string {
  return text
    .split('\n')
    .map(
      (line, i) =>
        `<span class="code-line"><span class="line-number">${
          i + 1
        }</span><span class="line-content">${escapeHtml(
          line,
        )}</span></span>`,
    )
    .join('\n');
}

/**
 * Build the rule set that renders a deck as a sequence of `<section>` slides.
 * Everything taken from the deck text is escaped except styled strings,
 * which the style engine already escaped, and `.html` payloads.
 */
export function createHtmlRenderRules(
  configOverrides?: Partial<SlideDeckConfig>,
): RenderRules {
  const config = { ...getFullConfig(), ...configOverrides };
  const linkTarget = config.style.openLinksInNewTab ? ' target="_blank"' : '';
  const md = new MarkdownIt();

  const author = ({ name, url, email }: DeckAuthor): string => {
    const href = url ? safeUrl(md, url) : null;
    if (href) {
      return `<a href="${escapeHtml(href)}">${escapeHtml(name)}</a>`;
    }
    if (email) {
      return `<a href="mailto:${escapeHtml(email)}">${escapeHtml(name)}</a>`;
    }
    return escapeHtml(name);
  };

  return {
    titleSlide: ({ metadata, title, subtitle }) => {
      let html = `<section class="slide title-slide">\n<h1>${title}</h1>\n`;
      if (subtitle !== undefined) {
        html += `<h2>${subtitle}</h2>\n`;
      }
      if (metadata.date !== undefined) {
        html += `<p class="date">${escapeHtml(metadata.date)}</p>\n`;
      }
      for (const entry of metadata.authors) {
        html += `<p class="author">${author(entry)}</p>\n`;
      }
      return `${html}</section>\n`;
    },

    section: ({ formattedNumber, depth, title, body }) => {
      const id = `section-${formattedNumber.replace(/\./g, '-')}`;
      const attrs = `id="${id}" data-number="${formattedNumber}"`;
      if (depth === 1) {
        return `<section class="slide" ${attrs}>\n<h1>${title}</h1>\n${body}</section>\n`;
      }
      const level = Math.min(depth, 6);
      return `<div class="subsection" ${attrs}>\n<h${level}>${title}</h${level}>\n${body}</div>\n`;
    },

    list: ({ items }) =>
      `<ul>\n${items.map((item) => `<li>${item}</li>\n`).join('')}</ul>\n`,

    text: ({ node, content }) =>
      node.pre
        ? `<pre>${escapeHtml(content)}</pre>\n`
        : `<p>${content}</p>\n`,

    code: ({ node, playable, edit }) => {
      const classes = ['code'];
      if (playable) classes.push('playground');
      if (node.attrs.class) classes.push(node.attrs.class);

      const lang = node.language
        ? ` data-lang="${escapeHtml(node.language)}"`
        : '';
      const editable = edit ? ' contenteditable="true" spellcheck="false"' : '';
      const pre = node.numbers ? '<pre data-line-numbers>' : '<pre>';
      const code = node.numbers ? numberedLines(node.text) : escapeHtml(node.text);

      return `<div class="${escapeHtml(classes.join(' '))}"${lang}${editable}>${pre}<code>${code}</code></pre></div>\n`;
    },

    image: ({ node }) =>
      `<img src="${escapeHtml(node.url)}"${sizeAttributes(node)}>\n`,

    video: ({ node }) =>
      `<video${sizeAttributes(node)} controls>\n<source src="${escapeHtml(
        node.url,
      )}" type="${escapeHtml(node.sourceType)}">\n</video>\n`,

    background: ({ node }) => {
      const href = safeUrl(md, node.url);
      if (href === null) {
        return '<div class="background"></div>\n';
      }
      return `<div class="background" style="background-image: url('${escapeHtml(
        cssUrl(href),
      )}')"></div>\n`;
    },

    iframe: ({ node }) => {
      const href = safeUrl(md, node.url);
      const src = href === null ? '' : ` src="${escapeHtml(href)}"`;
      return `<iframe${src}${sizeAttributes(node)}></iframe>\n`;
    },

    // Refused URLs keep their label as plain text
    link: ({ node, label }) => {
      const href = safeUrl(md, node.url);
      if (href === null) {
        return `<p class="link">${label}</p>\n`;
      }
      return `<p class="link"><a href="${escapeHtml(href)}"${linkTarget}>${label}</a></p>\n`;
    },

    // Trust boundary: copied as is
    html: ({ node }) => `${node.html}\n`,

    caption: ({ text }) => `<figcaption>${text}</figcaption>\n`,
  };
}
