import type { ChunkDecoder, StreamFraming } from "@parley/shared";
import { createLogger } from "../util/log.js";
import { resampleLinear } from "./resample.js";
import { isWav, parseWav, wavToMonoFloat32 } from "./wav.js";

const log = createLogger("decoder");

export type PcmChunkDecoderOptions = {
  /**
   * Rate every decoded result is normalised to.
   */
  sampleRateHz: number;
  /**
   * Rate assumed for headerless little-endian PCM16.
   */
  rawSampleRateHz: number;
};

/**
 * Decodes RIFF/WAVE containers and falls back to headerless PCM16.
 *
 * A WAV streamed over several passes loses its header with the first drain;
 * `probeStream` hands the header and frame size to the session, which puts the
 * header back in front of later fragments.
 */
export class PcmChunkDecoder implements ChunkDecoder {
  constructor(private readonly opts: PcmChunkDecoderOptions) {}

  async decode(bytes: Uint8Array): Promise<Float32Array> {
    if (bytes.length < 2) return new Float32Array(0);

    if (isWav(bytes)) {
      const wav = parseWav(bytes);
      if (!wav) {
        log.debug("RIFF header without fmt/data chunks", { bytes: bytes.length });
        return new Float32Array(0);
      }
      const mono = wavToMonoFloat32(wav);
      return resampleLinear({
        input: mono,
        inSampleRateHz: wav.sampleRateHz,
        outSampleRateHz: this.opts.sampleRateHz,
      });
    }

    return resampleLinear({
      input: rawPcm16ToFloat32(bytes),
      inSampleRateHz: this.opts.rawSampleRateHz,
      outSampleRateHz: this.opts.sampleRateHz,
    });
  }

  probeStream(head: Uint8Array): StreamFraming | null {
    if (!isWav(head)) return null;
    const wav = parseWav(head);
    if (!wav) return null;
    const frameBytes = (wav.bitsPerSample / 8) * wav.channels;
    if (!Number.isInteger(frameBytes) || frameBytes < 1) return null;
    return { header: head.slice(0, wav.dataOffset), frameBytes };
  }
}

export function rawPcm16ToFloat32(bytes: Uint8Array): Float32Array {
  // An odd trailing byte is padded with zero rather than dropped.
  const padded = bytes.length % 2 === 0 ? bytes : concatPad(bytes);
  const view = new DataView(padded.buffer, padded.byteOffset, padded.byteLength);
  const out = new Float32Array(padded.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = view.getInt16(i * 2, true) / 32768;
  }
  return out;
}

function concatPad(bytes: Uint8Array) {
  const out = new Uint8Array(bytes.length + 1);
  out.set(bytes, 0);
  return out;
}
