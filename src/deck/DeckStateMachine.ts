/**
 * Parser state machine. Pure: it only knows states and line kinds, the
 * DeckParser applies the effects of each transition to the tree.
 */

import type { LineKind } from './LineClassifier';

export type ParserState =
  | 'TopLevel'
  | 'InSection'
  | 'InList'
  | 'InCodeFence'
  | 'InText';

type TransitionRow = Readonly<Partial<Record<LineKind, ParserState>>>;

// Entries shared by every state that sits inside a section
const IN_SECTION_ROW: TransitionRow = {
  blank: 'InSection',
  comment: 'InSection',
  header: 'InSection',
  bullet: 'InList',
  directive: 'InSection',
  fenceOpen: 'InCodeFence',
  prose: 'InText',
  pre: 'InText',
};

/**
 * (state, line kind) → next state. A missing entry is an illegal transition.
 */
export const TRANSITIONS: Readonly<Record<ParserState, TransitionRow>> = {
  TopLevel: {
    blank: 'TopLevel',
    comment: 'TopLevel',
    header: 'InSection',
  },
  InSection: IN_SECTION_ROW,
  InList: { ...IN_SECTION_ROW, comment: 'InList' },
  InText: { ...IN_SECTION_ROW, comment: 'InText' },
  InCodeFence: {
    fenceBody: 'InCodeFence',
    fenceClose: 'InSection',
  },
};

// States in which the input may legally end
const ACCEPTING_STATES: ReadonlySet<ParserState> = new Set<ParserState>([
  'TopLevel',
  'InSection',
  'InList',
  'InText',
]);

export function nextState(
  state: ParserState,
  kind: LineKind,
): ParserState | undefined {
  return TRANSITIONS[state][kind];
}

export function isAccepting(state: ParserState): boolean {
  return ACCEPTING_STATES.has(state);
}

export interface Transition {
  from: ParserState;
  to: ParserState;
  kind: LineKind;
}

export class DeckStateMachine {
  private current: ParserState = 'TopLevel';

  get state(): ParserState {
    return this.current;
  }

  /**
   * Advance on one line kind. Returns undefined, and stays put, when the
   * table has no entry for it.
   */
  feed(kind: LineKind): Transition | undefined {
    const to = nextState(this.current, kind);
    if (to === undefined) {
      return undefined;
    }
    const transition = { from: this.current, to, kind };
    this.current = to;
    return transition;
  }

  reset(): void {
    this.current = 'TopLevel';
  }
}

/**
 * Run a synthetic sequence of line kinds through a fresh machine and list the
 * state after each one. Throws on the first illegal transition.
 */
export function traceStates(kinds: readonly LineKind[]): ParserState[] {
  const machine = new DeckStateMachine();
  return kinds.map((kind, index) => {
    const transition = machine.feed(kind);
    if (!transition) {
      throw new Error(
        `illegal transition at step ${index}: ${kind} in state ${machine.state}`,
      );
    }
    return transition.to;
  });
}
