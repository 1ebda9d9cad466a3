/**
 * YAML front matter → deck metadata
 */

import * as yaml from 'yaml';
import { z } from 'zod';
import type { DeckMetadata } from '../types';

const FRONT_MATTER_PATTERN = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

const authorSchema = z.union([
  z.string().transform((name) => ({ name })),
  z.object({
    name: z.string(),
    email: z.string().optional(),
    url: z.string().optional(),
  }),
]);

const metadataSchema = z.object({
  title: z.string().optional(),
  subtitle: z.string().optional(),
  date: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .optional(),
  summary: z.string().optional(),
  tags: z.array(z.string()).default([]),
  authors: z.array(authorSchema).default([]),
});

export interface FrontMatterSplit {
  metadata: DeckMetadata | null;
  // Deck text after the front matter block
  body: string;
  // Lines taken by the front matter block, delimiters included
  lineOffset: number;
}

/**
 * Split leading front matter off a deck. A block that does not parse or does
 * not describe deck metadata is logged and dropped; the deck body is kept.
 */
export function extractFrontMatter(source: string): FrontMatterSplit {
  const match = FRONT_MATTER_PATTERN.exec(source);
  if (!match) {
    return { metadata: null, body: source, lineOffset: 0 };
  }

  const body = source.substring(match[0].length);
  const lineOffset =
    match[0].split('\n').length - (match[0].endsWith('\n') ? 1 : 0);

  let parsed: unknown;
  try {
    parsed = yaml.parse(match[1] ?? '');
  } catch (error) {
    console.warn('Failed to parse front matter:', error);
    return { metadata: null, body, lineOffset };
  }

  const result = metadataSchema.safeParse(parsed ?? {});
  if (!result.success) {
    console.warn(
      'Ignoring front matter that does not describe a deck:',
      result.error.issues.map((issue) => issue.message).join('; '),
    );
    return { metadata: null, body, lineOffset };
  }

  return { metadata: result.data, body, lineOffset };
}
