/**
 * @module filters/tone
 * Tone curves on float planes in [0, 1].
 * All functions return new buffers and do NOT modify the input.
 */

function clamp01(v: number): number {
  return v < 0 ? 0 : v > 1 ? 1 : v;
}

/**
 * Raise every value to `power`.
 * @param power - Exponent. Must be > 0; 1 is a no-op.
 */
export function gammaPlane(src: Float32Array, power: number): Float32Array {
  const result = new Float32Array(src.length);
  for (let i = 0; i < src.length; i++) {
    result[i] = Math.pow(clamp01(src[i]), power);
  }
  return result;
}

/**
 * Scale the distance of every value from `pivot`, then clamp to [0, 1].
 * @param amount - Multiplier; 1 is a no-op, > 1 increases contrast.
 * @param pivot - Value left unchanged (mid-gray by default).
 */
export function contrastPlane(src: Float32Array, amount: number, pivot = 0.5): Float32Array {
  const result = new Float32Array(src.length);
  for (let i = 0; i < src.length; i++) {
    result[i] = clamp01((src[i] - pivot) * amount + pivot);
  }
  return result;
}
