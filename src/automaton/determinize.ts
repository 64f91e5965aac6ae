import { Automaton } from './model';
import { StateSet } from './state-set';

export interface DeterminizeOptions {
  /**
   * Materialize the empty subset as a sink state so every cell outside the
   * epsilon slot has exactly one destination. Off by default.
   */
  complete?: boolean;
}

/**
 * Subset construction. Each reachable set of source states becomes one
 * deterministic state, numbered in breadth-first discovery order from the
 * epsilon-closed initial set.
 *
 * By default the empty set is never materialized: a move that reaches no state
 * stays an empty cell, so the result is a partial automaton over the same
 * alphabet. With `complete` the empty set is numbered like any other subset and
 * loops to itself. The epsilon letter, if any, maps to empty cells everywhere,
 * which keeps the accepted words identical.
 */
export function determinize(automaton: Automaton, options: DeterminizeOptions = {}): Automaton {
  if (automaton.kind === 'det') return automaton;

  const complete = options.complete ?? false;
  const { stateCount, alphabetSize, epsilonLetter } = automaton;
  const start = automaton.initialActiveSet();
  if (start.isEmpty() && !complete) {
    return new Automaton({
      kind: 'det',
      stateCount: 1,
      alphabet: automaton.alphabet,
      transitions: [Array.from({ length: alphabetSize }, () => [])],
      initialStates: [],
      finalStates: [],
    });
  }

  const subsets: StateSet[] = [];
  const numbering = new Map<string, number>();
  const register = (subset: StateSet): number => {
    const key = subset.key();
    const known = numbering.get(key);
    if (known !== undefined) return known;
    const id = subsets.length;
    numbering.set(key, id);
    subsets.push(subset);
    return id;
  };

  register(start);
  const transitions: number[][][] = [];
  // `subsets` grows while it is walked; the index doubles as the BFS queue head.
  for (let current = 0; current < subsets.length; current++) {
    const source = subsets[current];
    const row: number[][] = [];
    for (let letter = 0; letter < alphabetSize; letter++) {
      if (letter === epsilonLetter) {
        row.push([]);
        continue;
      }
      const target = new StateSet(stateCount);
      source.forEach((state) => {
        for (const destination of automaton.destinations(state, letter)) target.add(destination);
      });
      automaton.closeInPlace(target);
      row.push(target.isEmpty() && !complete ? [] : [register(target)]);
    }
    transitions.push(row);
  }

  const finalStates = subsets.flatMap((subset, id) => (automaton.intersectsFinal(subset) ? [id] : []));

  return new Automaton({
    kind: 'det',
    stateCount: subsets.length,
    alphabet: automaton.alphabet,
    transitions,
    initialStates: [0],
    finalStates,
  });
}
