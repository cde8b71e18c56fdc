import type { NumericArray, NumericSequence } from "@spatialmath/contracts";
import { DimensionMismatchError, ShapeError } from "@spatialmath/contracts";
import { squeeze, toNdArray } from "./ndarray";

/**
 * Squeezes the input and checks that the result is one-dimensional.
 *
 * Scalars (and inputs that squeeze down to one element) become a
 * length-1 sequence. Anything with more than one non-singleton
 * dimension throws.
 *
 * @throws ShapeError if the input is ragged or genuinely multi-dimensional
 */
export function asArray1d(input: NumericArray): NumericSequence {
  const nd = toNdArray(input);
  const squeezed = squeeze(nd);

  if (squeezed.shape.length > 1) {
    throw new ShapeError("array must be one-dimensional", nd.shape);
  }

  return squeezed.data;
}

/**
 * Broadcasts one-dimensional sequences against each other: length-1
 * sequences are repeated to the common length, every other length must
 * already match it.
 *
 * @throws DimensionMismatchError if two lengths other than 1 differ
 */
export function broadcast1d(...sequences: NumericSequence[]): NumericSequence[] {
  const lengths = sequences.map((s) => s.length);
  const target = lengths.find((n) => n !== 1) ?? 1;

  if (lengths.some((n) => n !== 1 && n !== target)) {
    throw new DimensionMismatchError(
      "sequences cannot be broadcast together",
      ...lengths.map((n) => [n])
    );
  }

  return sequences.map((s) =>
    s.length === target ? s : new Array<number>(target).fill(s[0])
  );
}
