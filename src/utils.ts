import type { MappingKey } from "./types";

export function range(count: number): number[] {
  return Array.from({ length: count }, (_, index) => index);
}

/**
 * Ensure a 0-based index is within the half-open range `[0, stop)`.
 *
 * With `wrap` the index wraps around (so `-1` is the last slot), otherwise
 * it saturates at either end.
 */
export function clamp_idx(idx: number, stop: number, wrap = true): number {
  if (!Number.isInteger(stop) || stop <= 0) {
    throw new RangeError(`stop must be a positive integer, received ${stop}.`);
  }
  if (!Number.isInteger(idx)) {
    throw new RangeError(`idx must be an integer, received ${idx}.`);
  }

  if (wrap) {
    return ((idx % stop) + stop) % stop;
  }
  return Math.max(Math.min(idx, stop - 1), 0);
}

export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
  const n = items.length;
  if (!Number.isInteger(size) || size < 0 || size > n) {
    return;
  }

  const positions = range(size);
  while (true) {
    yield items.filter((_, position) => positions.includes(position));

    let pivot = size - 1;
    while (pivot >= 0 && positions[pivot] === pivot + n - size) {
      pivot -= 1;
    }
    if (pivot < 0) {
      return;
    }

    let next = (positions[pivot] ?? 0) + 1;
    for (let j = pivot; j < size; j += 1) {
      positions[j] = next;
      next += 1;
    }
  }
}

/**
 * `powerset([1, 2, 3])` → `[] [1] [2] [3] [1,2] [1,3] [2,3] [1,2,3]`
 *
 * The input is read once; the result can be iterated any number of times.
 */
export function powerset<T>(items: Iterable<T>): Iterable<T[]> {
  const snapshot = [...items];
  return {
    *[Symbol.iterator]() {
      for (let size = 0; size <= snapshot.length; size += 1) {
        yield* combinations(snapshot, size);
      }
    },
  };
}

export function textWidth(text: string): number {
  return Array.from(text).length;
}

export function ljust(text: string, width: number, pad = " "): string {
  const missing = width - textWidth(text);
  return missing > 0 ? text + pad.repeat(missing) : text;
}

export function compareOrdinal(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  if (left > right) {
    return 1;
  }
  return 0;
}

export function compareMappingKeys(left: MappingKey, right: MappingKey): number {
  if (typeof left === "string" && typeof right === "string") {
    return compareOrdinal(left, right);
  }
  if (
    (typeof left === "number" || typeof left === "bigint") &&
    (typeof right === "number" || typeof right === "bigint")
  ) {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (typeof left === "boolean" && typeof right === "boolean") {
    return Number(left) - Number(right);
  }
  throw new TypeError(
    `Cannot order mapping keys of type '${typeof left}' and '${typeof right}'.`
  );
}
