import { Automaton, SIZED_EPSILON_LETTER } from './model';

/**
 * Generators for the transition graphs of small sorting machines. Tokens enter
 * in increasing order and are known only by their rank among the tokens the
 * machine currently holds; emitting a token reads the letter equal to its rank
 * (1-based) and lowers the ranks above it. Internal moves are epsilon moves on
 * letter 0.
 *
 * Each generated automaton is an `epsilon` automaton over a sized alphabet of
 * `capacity + 1` letters. The empty machine is state 0, the only initial and
 * final state, so the accepted words are the rank sequences of every complete
 * pass of tokens through the machine.
 */

type Move<C> = readonly [letter: number, next: C];

interface MachineSpec<C> {
  start: C;
  capacity: number;
  keyOf(configuration: C): string;
  moves(configuration: C): Move<C>[];
}

function assertCapacity(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

function lowerAbove(rank: number): (token: number) => number {
  return (token) => (token > rank ? token - 1 : token);
}

/** Breadth-first walk from the empty machine; configurations are numbered in discovery order. */
function explore<C>(spec: MachineSpec<C>): Automaton {
  const alphabetSize = spec.capacity + 1;
  const numbering = new Map<string, number>();
  const queue: C[] = [];
  const transitions: number[][][] = [];

  const register = (configuration: C): number => {
    const key = spec.keyOf(configuration);
    const known = numbering.get(key);
    if (known !== undefined) return known;
    const id = queue.length;
    numbering.set(key, id);
    queue.push(configuration);
    transitions.push(Array.from({ length: alphabetSize }, () => []));
    return id;
  };

  register(spec.start);
  for (let current = 0; current < queue.length; current++) {
    for (const [letter, next] of spec.moves(queue[current])) {
      const destination = register(next);
      transitions[current][letter].push(destination);
    }
  }

  return new Automaton({
    kind: 'epsilon',
    stateCount: queue.length,
    alphabet: { type: 'sized', size: alphabetSize },
    transitions,
    initialStates: [0],
    finalStates: [0],
  });
}

interface BufferAndStack {
  /** Ranks in the buffer, ascending. */
  buffer: readonly number[];
  /** Ranks on the stack, top first. */
  stack: readonly number[];
}

/**
 * A buffer holding up to `bufferSize` tokens in any order, feeding a stack of
 * depth `stackSize` that emits from its top.
 */
export function generateBufferAndStack(bufferSize: number, stackSize: number): Automaton {
  assertCapacity('Buffer size', bufferSize);
  assertCapacity('Stack size', stackSize);

  return explore<BufferAndStack>({
    start: { buffer: [], stack: [] },
    capacity: bufferSize + stackSize,
    keyOf: ({ buffer, stack }) => `${buffer.join(',')}|${stack.join(',')}`,
    moves: ({ buffer, stack }) => {
      const moves: Move<BufferAndStack>[] = [];
      if (stack.length > 0) {
        const top = stack[0];
        const lower = lowerAbove(top);
        moves.push([top, { buffer: buffer.map(lower), stack: stack.slice(1).map(lower) }]);
      }
      if (stack.length < stackSize) {
        for (const token of buffer) {
          moves.push([SIZED_EPSILON_LETTER, { buffer: buffer.filter((t) => t !== token), stack: [token, ...stack] }]);
        }
      }
      if (buffer.length < bufferSize) {
        const incoming = buffer.length + stack.length + 1;
        moves.push([SIZED_EPSILON_LETTER, { buffer: [...buffer, incoming], stack }]);
      }
      return moves;
    },
  });
}

interface TwoStacks {
  /** Both stacks top first. */
  first: readonly number[];
  second: readonly number[];
}

/**
 * Two stacks in series: input is pushed on the first (depth `firstSize`), its top
 * moves to the second (depth `secondSize`), and the second emits from its top.
 */
export function generateTwoStack(firstSize: number, secondSize: number): Automaton {
  assertCapacity('First stack size', firstSize);
  assertCapacity('Second stack size', secondSize);

  return explore<TwoStacks>({
    start: { first: [], second: [] },
    capacity: firstSize + secondSize,
    keyOf: ({ first, second }) => `${first.join(',')}|${second.join(',')}`,
    moves: ({ first, second }) => {
      const moves: Move<TwoStacks>[] = [];
      if (second.length > 0) {
        const top = second[0];
        const lower = lowerAbove(top);
        moves.push([top, { first: first.map(lower), second: second.slice(1).map(lower) }]);
      }
      if (first.length > 0 && second.length < secondSize) {
        moves.push([SIZED_EPSILON_LETTER, { first: first.slice(1), second: [first[0], ...second] }]);
      }
      if (first.length < firstSize) {
        moves.push([SIZED_EPSILON_LETTER, { first: [first.length + second.length + 1, ...first], second }]);
      }
      return moves;
    },
  });
}
