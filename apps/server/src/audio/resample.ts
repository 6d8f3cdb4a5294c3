/**
 * Linear resampler for mono float samples. Good enough for speech recognition
 * input; clients should ideally send the target rate directly.
 */
export function resampleLinear(args: {
  input: Float32Array;
  inSampleRateHz: number;
  outSampleRateHz: number;
}): Float32Array {
  const { input, inSampleRateHz, outSampleRateHz } = args;
  if (inSampleRateHz === outSampleRateHz) return input;
  if (input.length === 0) return input;

  const ratio = outSampleRateHz / inSampleRateHz;
  const outLength = Math.max(1, Math.floor(input.length * ratio));
  const out = new Float32Array(outLength);

  for (let i = 0; i < outLength; i++) {
    const srcIndex = i / ratio;
    const i0 = Math.floor(srcIndex);
    const i1 = Math.min(input.length - 1, i0 + 1);
    const frac = srcIndex - i0;

    const s0 = input[i0] ?? 0;
    const s1 = input[i1] ?? s0;
    out[i] = s0 + (s1 - s0) * frac;
  }

  return out;
}
