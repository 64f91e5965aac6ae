import { AutomatonRuntimeError } from './errors';
import type { Automaton } from './model';
import { StateSet } from './state-set';

export interface ExecutionStep {
  /** Number of symbols consumed so far; 0 for the initial step. */
  readonly index: number;
  /** The symbol consumed to reach this step, `undefined` for the initial step. */
  readonly symbol: number | undefined;
  /** Active states after the step, ascending. Empty once the run is stuck. */
  readonly states: readonly number[];
  readonly accepting: boolean;
}

/** Lazy run: one step for the start plus one per symbol; returns the decision. */
export type ExecutionTrace = Generator<ExecutionStep, boolean, undefined>;

interface Stepper {
  accepts(input: readonly number[]): boolean;
  trace(input: readonly number[]): ExecutionTrace;
}

const STUCK = -1;

class DeterministicStepper implements Stepper {
  private readonly start: number;

  constructor(private readonly automaton: Automaton) {
    this.start = automaton.initialStates.length > 0 ? automaton.initialStates[0] : STUCK;
  }

  accepts(input: readonly number[]): boolean {
    const { automaton } = this;
    const table = automaton.transitions;
    let state = this.start;
    if (state === STUCK) return false;
    for (let i = 0; i < input.length; i++) {
      const symbol = input[i];
      if (!automaton.isConsumable(symbol)) return false;
      const cell = table[state][symbol];
      if (cell.length === 0) return false;
      state = cell[0];
    }
    return automaton.isFinal(state);
  }

  *trace(input: readonly number[]): ExecutionTrace {
    const { automaton } = this;
    let state = this.start;
    const snapshot = (index: number, symbol: number | undefined): ExecutionStep => ({
      index,
      symbol,
      states: state === STUCK ? [] : [state],
      accepting: state !== STUCK && automaton.isFinal(state),
    });

    yield snapshot(0, undefined);
    for (let i = 0; i < input.length; i++) {
      const symbol = input[i];
      if (state !== STUCK) {
        const cell = automaton.isConsumable(symbol) ? automaton.destinations(state, symbol) : [];
        state = cell.length === 0 ? STUCK : cell[0];
      }
      yield snapshot(i + 1, symbol);
    }
    return state !== STUCK && automaton.isFinal(state);
  }
}

/**
 * Simulates every path at once over a bitset of active states. With `closing`
 * set, the set is epsilon-closed before the first symbol and after each step.
 */
class StateSetStepper implements Stepper {
  constructor(
    private readonly automaton: Automaton,
    private readonly closing: boolean
  ) {}

  private advance(current: StateSet, next: StateSet, symbol: number): void {
    next.clear();
    if (!this.automaton.isConsumable(symbol)) return;
    const table = this.automaton.transitions;
    current.forEach((state) => {
      const cell = table[state][symbol];
      for (let i = 0; i < cell.length; i++) next.add(cell[i]);
    });
    if (this.closing) this.automaton.closeInPlace(next);
  }

  accepts(input: readonly number[]): boolean {
    const { automaton } = this;
    let current = automaton.initialActiveSet();
    let next = new StateSet(automaton.stateCount);
    for (let i = 0; i < input.length; i++) {
      if (current.isEmpty()) return false;
      this.advance(current, next, input[i]);
      const previous = current;
      current = next;
      next = previous;
    }
    return automaton.intersectsFinal(current);
  }

  *trace(input: readonly number[]): ExecutionTrace {
    const { automaton } = this;
    let current = automaton.initialActiveSet();
    let next = new StateSet(automaton.stateCount);
    const snapshot = (index: number, symbol: number | undefined): ExecutionStep => ({
      index,
      symbol,
      states: current.toArray(),
      accepting: automaton.intersectsFinal(current),
    });

    yield snapshot(0, undefined);
    for (let i = 0; i < input.length; i++) {
      if (current.isEmpty()) {
        yield snapshot(i + 1, input[i]);
        continue;
      }
      this.advance(current, next, input[i]);
      [current, next] = [next, current];
      yield snapshot(i + 1, input[i]);
    }
    return automaton.intersectsFinal(current);
  }
}

function createStepper(automaton: Automaton): Stepper {
  switch (automaton.kind) {
    case 'det':
      return new DeterministicStepper(automaton);
    case 'nondet':
      return new StateSetStepper(automaton, false);
    case 'epsilon':
      return new StateSetStepper(automaton, true);
  }
}

function assertSymbols(input: readonly number[]): void {
  for (let i = 0; i < input.length; i++) {
    if (!Number.isInteger(input[i])) {
      throw new AutomatonRuntimeError(`Input symbol at position ${i} is not a letter index: ${input[i]}`, i);
    }
  }
}

/**
 * Runs one automaton against any number of inputs. The kind is dispatched once
 * here, so the deterministic path never touches bitsets.
 *
 * Integer symbols the automaton cannot consume (negative, past the alphabet, or
 * the epsilon letter) reject the input. Non-integers throw
 * `AutomatonRuntimeError`.
 */
export class AutomatonExecutor {
  readonly automaton: Automaton;
  private readonly stepper: Stepper;

  constructor(automaton: Automaton) {
    this.automaton = automaton;
    this.stepper = createStepper(automaton);
  }

  accepts(input: readonly number[]): boolean {
    assertSymbols(input);
    return this.stepper.accepts(input);
  }

  run(input: readonly number[]): ExecutionTrace {
    assertSymbols(input);
    return this.stepper.trace(input);
  }
}

export function createExecutor(automaton: Automaton): AutomatonExecutor {
  return new AutomatonExecutor(automaton);
}

export function accepts(automaton: Automaton, input: readonly number[]): boolean {
  return createExecutor(automaton).accepts(input);
}

export function run(automaton: Automaton, input: readonly number[]): ExecutionTrace {
  return createExecutor(automaton).run(input);
}
