import type { DirectiveName } from './LineClassifier';
import type { RuleKind } from './model';

/**
 * Fatal problem with the deck text. The whole parse is abandoned.
 */
export class StructuralParseError extends Error {
  constructor(
    public readonly line: number,
    public readonly reason: string,
    public readonly directive?: DirectiveName,
  ) {
    super(
      directive
        ? `line ${line}: .${directive}: ${reason}`
        : `line ${line}: ${reason}`,
    );
    this.name = 'StructuralParseError';
  }
}

/**
 * A renderer was asked to render node kinds it has no rule for
 */
export class ConfigurationError extends Error {
  constructor(public readonly missingKinds: readonly RuleKind[]) {
    super(`no render rule registered for: ${missingKinds.join(', ')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Inline markup the style engine could not make sense of. Reported, never
 * thrown: the sequence is rendered as literal text.
 */
export class StyleEngineWarning extends Error {
  constructor(
    public readonly sequence: string,
    public readonly source: string,
  ) {
    super(`unrecognized inline markup "${sequence}" in "${source}"`);
    this.name = 'StyleEngineWarning';
  }
}
