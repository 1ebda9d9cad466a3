import type { CodeFenceInfo } from '../types';

// `lang {attrs}` or a bare `lang`; anything else is taken whole as the language
const INFO_PATTERN = /^([^\s{]*)\s*(?:\{(.*)\})?$/;

// `.class`, or `key` with an optional `=value` (double-quoted, single-quoted or bare)
const ATTRIBUTE_PATTERN =
  /\.([\w-]+)|([\w-]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s}]+)))?/g;

/**
 * Fence info string → language and attributes.
 * `go {edit numbers play=false .wide}` gives language "go" and
 * `{ edit: 'true', numbers: 'true', play: 'false', class: 'wide' }`.
 */
export function parseInfoString(info: string): CodeFenceInfo {
  const trimmed = info.trim();
  const match = INFO_PATTERN.exec(trimmed);
  if (!match) {
    return { language: trimmed, attrs: {} };
  }

  const attrs: Record<string, string> = {};
  for (const [, cls, key, doubled, single, bare] of (match[2] ?? '').matchAll(
    ATTRIBUTE_PATTERN,
  )) {
    if (cls) {
      attrs.class = attrs.class ? `${attrs.class} ${cls}` : cls;
    } else if (key) {
      attrs[key] = doubled ?? single ?? bare ?? 'true';
    }
  }

  return { language: match[1] ?? '', attrs };
}
