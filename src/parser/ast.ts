import type { Location } from '../utils/types';
import type { AutomatonKind } from '../automaton/model';

// Node shapes produced by src/grammar/automaton.peg. Every node keeps the
// source location so the builder can point at the offending index.

export interface CountNode {
  type: 'Count';
  value: number;
  location: Location;
}

export interface KindNode {
  type: 'Kind';
  value: AutomatonKind;
  location: Location;
}

export interface SizedAlphabetNode {
  type: 'SizedAlphabet';
  size: number;
  location: Location;
}

export interface NamedAlphabetNode {
  type: 'NamedAlphabet';
  letters: string;
  location: Location;
}

export type AlphabetNode = SizedAlphabetNode | NamedAlphabetNode;

export interface NumArrayNode {
  type: 'NumArray';
  items: CountNode[];
  location: Location;
}

/** The destinations of one source state, one cell per letter. */
export interface LetterBlockNode {
  type: 'LetterBlock';
  cells: NumArrayNode[];
  location: Location;
}

export interface TransitionTableNode {
  type: 'TransitionTable';
  rows: LetterBlockNode[];
  location: Location;
}

export interface CoreNode {
  type: 'Core';
  kind: KindNode;
  stateCount: CountNode;
  alphabet: AlphabetNode;
  transitions: TransitionTableNode;
  initial: NumArrayNode;
  final: NumArrayNode;
  location: Location;
}

export type WrapperStyle = 'brace' | 'call';

export interface AutomatonSourceNode {
  type: 'AutomatonSource';
  wrapper: WrapperStyle;
  trailingSemicolons: number;
  core: CoreNode;
  location: Location;
}

export function isAutomatonSourceNode(value: unknown): value is AutomatonSourceNode {
  return !!value && typeof value === 'object' && 'type' in value && value.type === 'AutomatonSource';
}
