import { DepthExceededError, DiscardError } from "./errors.js";
import type { SeededStream } from "./stream.js";

export interface Gen<T> {
  generate(stream: SeededStream): T;
}

export interface ArrayOptions {
  readonly minLength?: number;
  readonly maxLength?: number;
}

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

const gen = <T>(generate: (stream: SeededStream) => T): Gen<T> => ({ generate });

export const integer = (min: number = INT32_MIN, max: number = INT32_MAX): Gen<number> =>
  gen((stream) => stream.between(min, max));

export const boolean = (): Gen<boolean> => gen((stream) => stream.below(2) === 1);

export const constant = <T>(value: T): Gen<T> => gen(() => value);

export const element = <T>(values: readonly T[]): Gen<T> => {
  if (values.length === 0) {
    throw new RangeError("element() needs at least one value");
  }
  return gen((stream) => {
    const picked = values[stream.below(values.length)];
    if (picked === undefined) {
      throw new RangeError("element() index out of range");
    }
    return picked;
  });
};

/** Lengths are capped by the stream's `maxSize`, never below `minLength`. */
export const array = <T>(item: Gen<T>, options: ArrayOptions = {}): Gen<T[]> =>
  gen((stream) => {
    const minLength = options.minLength ?? 0;
    const cap = Math.min(options.maxLength ?? stream.tuning.maxSize, stream.tuning.maxSize);
    const length = stream.between(minLength, Math.max(minLength, cap));
    const items: T[] = [];
    for (let index = 0; index < length; index += 1) {
      items.push(item.generate(stream));
    }
    return items;
  });

export const nullable = <T>(item: Gen<T>): Gen<T | null> =>
  gen((stream) => {
    const { sizedNull, maxSize, nullInEvery } = stream.tuning;
    const odds = sizedNull ? maxSize + 1 : nullInEvery;
    if (stream.below(odds) === 0) {
      return null;
    }
    return item.generate(stream);
  });

export const map = <A, B>(source: Gen<A>, fn: (value: A) => B): Gen<B> =>
  gen((stream) => fn(source.generate(stream)));

export const chain = <A, B>(source: Gen<A>, next: (value: A) => Gen<B>): Gen<B> =>
  gen((stream) => next(source.generate(stream)).generate(stream));

export const pair = <A, B>(first: Gen<A>, second: Gen<B>): Gen<[A, B]> =>
  gen((stream) => [first.generate(stream), second.generate(stream)]);

export const triple = <A, B, C>(first: Gen<A>, second: Gen<B>, third: Gen<C>): Gen<[A, B, C]> =>
  gen((stream) => [first.generate(stream), second.generate(stream), third.generate(stream)]);

export const suchThat = <T>(source: Gen<T>, predicate: (value: T) => boolean): Gen<T> =>
  gen((stream) => {
    const attempts = stream.tuning.allowedSizeSplitBacktracks + 1;
    for (let attempt = 0; attempt < attempts; attempt += 1) {
      const value = source.generate(stream);
      if (predicate(value)) {
        return value;
      }
    }
    throw new DiscardError(attempts);
  });

/** Defers construction so generators can refer to themselves. */
export const lazy = <T>(thunk: () => Gen<T>): Gen<T> =>
  gen((stream) => {
    const depth = stream.enter();
    try {
      if (depth > stream.tuning.maxDepth) {
        throw new DepthExceededError(stream.tuning.maxDepth);
      }
      return thunk().generate(stream);
    } finally {
      stream.leave();
    }
  });

export const oneOf = <T>(...alternatives: ReadonlyArray<Gen<T>>): Gen<T> => {
  if (alternatives.length === 0) {
    throw new RangeError("oneOf() needs at least one alternative");
  }
  return gen((stream) => {
    let failures = 0;
    while (true) {
      const picked = alternatives[stream.below(alternatives.length)];
      if (picked === undefined) {
        throw new RangeError("oneOf() index out of range");
      }
      try {
        return picked.generate(stream);
      } catch (error) {
        if (!(error instanceof DepthExceededError)) {
          throw error;
        }
        failures += 1;
        if (failures > stream.tuning.allowedDepthFailures) {
          throw error;
        }
      }
    }
  });
};
