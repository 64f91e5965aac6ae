import { StateSet } from './state-set';

type EpsilonDestinations = (state: number) => readonly number[];

/**
 * Epsilon closures over one automaton's epsilon edges.
 *
 * Sets are closed with a single worklist pass from their members, so closing
 * costs the states and edges reached rather than a per-state table. Closures of
 * single states are kept once asked for.
 */
export class EpsilonClosure {
  private readonly stateCount: number;
  private readonly epsilonDestinations: EpsilonDestinations;
  private readonly memo = new Map<number, readonly number[]>();

  private constructor(stateCount: number, epsilonDestinations: EpsilonDestinations) {
    this.stateCount = stateCount;
    this.epsilonDestinations = epsilonDestinations;
  }

  static compute(stateCount: number, epsilonDestinations: EpsilonDestinations): EpsilonClosure {
    return new EpsilonClosure(stateCount, epsilonDestinations);
  }

  /**
   * Worklist closure of `seed`, following epsilon edges until nothing new is
   * found. Mutates and returns `seed`.
   */
  static reach(seed: StateSet, epsilonDestinations: EpsilonDestinations): StateSet {
    const worklist = seed.toArray();
    while (worklist.length > 0) {
      const state = worklist.pop();
      if (state === undefined) break;
      for (const destination of epsilonDestinations(state)) {
        if (seed.add(destination)) worklist.push(destination);
      }
    }
    return seed;
  }

  /** Closure of a single state, ascending. */
  of(state: number): number[] {
    let closed = this.memo.get(state);
    if (closed === undefined) {
      closed = EpsilonClosure.reach(StateSet.of(this.stateCount, [state]), this.epsilonDestinations).toArray();
      this.memo.set(state, closed);
    }
    return [...closed];
  }

  closure(states: StateSet): StateSet {
    const closed = states.clone();
    this.closeInPlace(closed);
    return closed;
  }

  closeInPlace(states: StateSet): void {
    EpsilonClosure.reach(states, this.epsilonDestinations);
  }
}
