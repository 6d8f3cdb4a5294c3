/**
 * Streaming tunables. They are process-wide (set from server configuration),
 * never negotiated per session.
 */

export const DEFAULT_SAMPLE_RATE_HZ = 16_000;
export const DEFAULT_INTERIM_THRESHOLD_BYTES = 32_768;
export const DEFAULT_MIN_AUDIO_MS = 500;

export type StreamingTuning = {
  /**
   * Buffered compressed bytes needed before an interim pass is attempted.
   */
  interimThresholdBytes: number;
  /**
   * Decoded audio shorter than this is not transcribed; the bytes stay buffered
   * so the utterance can complete.
   */
  minAudioMs: number;
  /**
   * Rate the decoder normalises to.
   */
  sampleRateHz: number;
};

export const DEFAULT_STREAMING_TUNING: StreamingTuning = {
  interimThresholdBytes: DEFAULT_INTERIM_THRESHOLD_BYTES,
  minAudioMs: DEFAULT_MIN_AUDIO_MS,
  sampleRateHz: DEFAULT_SAMPLE_RATE_HZ,
};

export function minSampleCount(tuning: Pick<StreamingTuning, "minAudioMs" | "sampleRateHz">) {
  return Math.ceil((tuning.minAudioMs * tuning.sampleRateHz) / 1000);
}
