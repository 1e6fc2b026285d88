import { ConfigurationError } from "./errors.js";

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function l2Norm(vector: readonly number[]): number {
  return Math.sqrt(dot(vector, vector));
}

/**
 * Scales a vector to unit length.
 * @throws {ConfigurationError} For zero, NaN or infinite vectors, which have no direction.
 */
export function normalize(vector: readonly number[]): number[] {
  const norm = l2Norm(vector);
  if (norm === 0 || !Number.isFinite(norm)) {
    throw new ConfigurationError("Cannot normalize a zero or non-finite vector.");
  }
  return vector.map((value) => value / norm);
}

/** Cosine similarity of two vectors of equal length. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ConfigurationError(`Vector dimension mismatch: ${a.length} vs ${b.length}.`);
  }
  return dot(normalize(a), normalize(b));
}
