// tests/closure.test.ts
import { accepts, Automaton, EpsilonClosure, parseAutomaton, run, StateSet } from '../src/index';

const cycle: ReadonlyArray<readonly number[]> = [[1], [2], [0], []];

describe('EpsilonClosure', () => {
  const closures = EpsilonClosure.compute(4, (state) => cycle[state]);

  it('computes the closure of every state', () => {
    expect(closures.of(0)).toEqual([0, 1, 2]);
    expect(closures.of(2)).toEqual([0, 1, 2]);
    expect(closures.of(3)).toEqual([3]);
  });

  it('hands out copies of remembered closures', () => {
    const first = closures.of(1);
    first.push(99);
    expect(closures.of(1)).toEqual([0, 1, 2]);
  });

  it('closes sets without touching the argument', () => {
    const seed = StateSet.of(4, [3, 1]);
    const closed = closures.closure(seed);
    expect(closed.toArray()).toEqual([0, 1, 2, 3]);
    expect(seed.toArray()).toEqual([1, 3]);
  });

  it('is idempotent', () => {
    const once = closures.closure(StateSet.of(4, [2]));
    expect(closures.closure(once).equals(once)).toBe(true);
  });

  it('closes in place', () => {
    const chain: ReadonlyArray<readonly number[]> = [[3], [], [], [1]];
    const chained = EpsilonClosure.compute(4, (state) => chain[state]);
    const set = StateSet.of(4, [0]);
    chained.closeInPlace(set);
    expect(set.toArray()).toEqual([0, 1, 3]);
  });

  it('reaches from an arbitrary seed', () => {
    expect(EpsilonClosure.reach(StateSet.of(4, [3]), (state) => cycle[state]).toArray()).toEqual([3]);
    expect(EpsilonClosure.reach(StateSet.of(4, [1]), (state) => cycle[state]).toArray()).toEqual([0, 1, 2]);
  });
});

describe('Automaton closure', () => {
  it('follows epsilon moves of an epsilon automaton', () => {
    const automaton = parseAutomaton('{"epsilon", 3, 2, [[[1], []], [[2], []], [[], [0]]], [0], [2]}');
    expect(automaton.closureOf(0)).toEqual([0, 1, 2]);
    expect(automaton.closureOf(2)).toEqual([2]);
    expect(automaton.initialActiveSet().toArray()).toEqual([0, 1, 2]);
  });

  it('is the identity for other kinds', () => {
    const automaton = parseAutomaton('{"nondet", 2, 1, [[[1]], [[]]], [0], [1]}');
    const set = StateSet.of(2, [0]);
    const closed = automaton.closure(set);
    expect(closed.toArray()).toEqual([0]);
    expect(closed).not.toBe(set);
    expect(automaton.closureOf(1)).toEqual([1]);
  });

  it('builds a long epsilon chain in linear time', () => {
    const stateCount = 20_000;
    const transitions = Array.from({ length: stateCount }, (_, state) =>
      state + 1 < stateCount ? [[state + 1], []] : [[], []]
    );
    const automaton = new Automaton({
      kind: 'epsilon',
      stateCount,
      alphabet: { type: 'sized', size: 2 },
      transitions,
      initialStates: [0],
      finalStates: [stateCount - 1],
    });
    expect(automaton.initialActiveSet().size).toBe(stateCount);
    expect(accepts(automaton, [])).toBe(true);
    expect(accepts(automaton, [1])).toBe(false);
    expect(automaton.closureOf(stateCount - 2)).toEqual([stateCount - 2, stateCount - 1]);
  });

  it('parses and runs a chain read from text', () => {
    const stateCount = 3_000;
    const rows = Array.from({ length: stateCount }, (_, state) =>
      state + 1 < stateCount ? `[[${state + 1}], [${state}]]` : '[[], []]'
    );
    const automaton = parseAutomaton(`{"epsilon", ${stateCount}, 2, [${rows.join(', ')}], [0], [0]}`);
    expect(accepts(automaton, [1, 1])).toBe(true);
    const steps = Array.from(run(automaton, []));
    expect(steps).toHaveLength(1);
    expect(steps[0].states).toHaveLength(stateCount);
    expect(steps[0].accepting).toBe(true);
  });
});
