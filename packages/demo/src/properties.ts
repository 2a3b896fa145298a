import { isDeepStrictEqual } from "node:util";

import { defineProperty, type RunEnvironment, type TestRegistry } from "@sweepcheck/core";
import { array, integer, lazy, map, nullable, oneOf, pair, suchThat, type Gen } from "@sweepcheck/rand";

export type Tree = { readonly left: Tree; readonly right: Tree } | number | null;

const leaf: Gen<Tree> = nullable(integer(0, 99));

// Two leaf alternatives against one branch keep the expected tree size finite.
export const tree: Gen<Tree> = oneOf<Tree>(
  leaf,
  leaf,
  lazy(() => map(pair(tree, tree), ([left, right]) => ({ left, right }))),
);

export function countLeaves(node: Tree): number {
  if (node === null) {
    return 0;
  }
  if (typeof node === "number") {
    return 1;
  }
  return countLeaves(node.left) + countLeaves(node.right);
}

export function flatten(node: Tree): number[] {
  if (node === null) {
    return [];
  }
  if (typeof node === "number") {
    return [node];
  }
  return [...flatten(node.left), ...flatten(node.right)];
}

export function registerExamples(registry: TestRegistry, env: RunEnvironment): void {
  const numbers = array(integer(-1000, 1000));

  registry.add(
    defineProperty(env, {
      suite: "lists",
      name: "reverse_involutive",
      arbitrary: numbers,
      predicate: (xs) => isDeepStrictEqual([...xs].reverse().reverse(), xs),
    }),
  );

  registry.add(
    defineProperty(env, {
      suite: "lists",
      name: "sort_ordered",
      arbitrary: numbers,
      predicate: (xs) => {
        const sorted = [...xs].sort((a, b) => a - b);
        return sorted.every((value, index) => index === 0 || (sorted[index - 1] ?? value) <= value);
      },
    }),
  );

  registry.add(
    defineProperty(env, {
      suite: "arith",
      name: "add_commutative",
      arbitrary: pair(integer(), integer()),
      predicate: ([a, b]) => a + b === b + a,
    }),
  );

  registry.add(
    defineProperty(env, {
      suite: "arith",
      name: "even_halves",
      arbitrary: suchThat(integer(0, 10_000), (value) => value % 2 === 0),
      predicate: (value) => (value / 2) * 2 === value && Number.isInteger(value / 2),
    }),
  );

  registry.add(
    defineProperty(env, {
      suite: "trees",
      name: "flatten_keeps_leaves",
      arbitrary: tree,
      predicate: (node) => flatten(node).length === countLeaves(node),
      runs: 50,
    }),
  );
}
