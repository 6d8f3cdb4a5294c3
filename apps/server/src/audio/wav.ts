export type WavFormat = {
  audioFormat: number;
  channels: number;
  sampleRateHz: number;
  bitsPerSample: number;
};

export type ParsedWav = WavFormat & {
  /**
   * Sample data as found in the file; may be cut short when the container was
   * streamed in pieces.
   */
  data: Uint8Array;
  /**
   * Offset of the first sample byte; everything before it is header.
   */
  dataOffset: number;
};

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export function isWav(bytes: Uint8Array): boolean {
  return bytes.length >= 12 && readAscii(bytes, 0, 4) === "RIFF" && readAscii(bytes, 8, 4) === "WAVE";
}

/**
 * Walk the RIFF chunks for `fmt ` and `data`. Returns null if either is missing.
 */
export function parseWav(bytes: Uint8Array): ParsedWav | null {
  if (!isWav(bytes)) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  let format: WavFormat | null = null;
  let offset = 12;
  while (offset + 8 <= bytes.length) {
    const id = readAscii(bytes, offset, 4);
    const size = view.getUint32(offset + 4, true);
    const body = offset + 8;

    if (id === "fmt " && body + 16 <= bytes.length) {
      let audioFormat = view.getUint16(body, true);
      // WAVE_FORMAT_EXTENSIBLE keeps the real tag at the start of the sub-format GUID.
      if (audioFormat === WAVE_FORMAT_EXTENSIBLE && size >= 26 && body + 26 <= bytes.length) {
        audioFormat = view.getUint16(body + 24, true);
      }
      format = {
        audioFormat,
        channels: view.getUint16(body + 2, true),
        sampleRateHz: view.getUint32(body + 4, true),
        bitsPerSample: view.getUint16(body + 14, true),
      };
    } else if (id === "data") {
      if (!format) return null;
      // Streaming writers often leave the size at 0 (or 0xffffffff) until the end.
      const end = size === 0 ? bytes.length : Math.min(bytes.length, body + size);
      return { ...format, data: bytes.subarray(body, end), dataOffset: body };
    }

    // Chunks are word aligned.
    offset = body + size + (size % 2);
  }
  return null;
}

/**
 * Interleaved samples → mono floats in [-1, 1].
 */
export function wavToMonoFloat32(wav: ParsedWav): Float32Array {
  const { channels, bitsPerSample, audioFormat, data } = wav;
  if (channels < 1) throw new Error("WAV declares zero channels.");

  let bytesPerSample: number;
  let read: (view: DataView, at: number) => number;
  if (audioFormat === WAVE_FORMAT_PCM && bitsPerSample === 16) {
    bytesPerSample = 2;
    read = (view, at) => view.getInt16(at, true) / 32768;
  } else if (audioFormat === WAVE_FORMAT_IEEE_FLOAT && bitsPerSample === 32) {
    bytesPerSample = 4;
    read = (view, at) => view.getFloat32(at, true);
  } else {
    throw new Error(`Unsupported WAV encoding (format=${audioFormat}, bits=${bitsPerSample}).`);
  }

  const frameBytes = bytesPerSample * channels;
  const frames = Math.floor(data.length / frameBytes);
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const out = new Float32Array(frames);
  for (let f = 0; f < frames; f++) {
    let sum = 0;
    for (let c = 0; c < channels; c++) {
      sum += read(view, f * frameBytes + c * bytesPerSample);
    }
    out[f] = sum / channels;
  }
  return out;
}

export function pcm16MonoToWavBytes(args: { pcm16: Int16Array; sampleRateHz: number }): Uint8Array {
  const { pcm16, sampleRateHz } = args;

  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const blockAlign = numChannels * (bitsPerSample / 8);
  const dataSize = pcm16.length * 2;

  const buffer = new ArrayBuffer(44 + dataSize);
  const view = new DataView(buffer);

  writeAscii(view, 0, "RIFF");
  view.setUint32(4, 36 + dataSize, true);
  writeAscii(view, 8, "WAVE");

  writeAscii(view, 12, "fmt ");
  view.setUint32(16, 16, true);
  view.setUint16(20, WAVE_FORMAT_PCM, true);
  view.setUint16(22, numChannels, true);
  view.setUint32(24, sampleRateHz, true);
  view.setUint32(28, byteRate, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, bitsPerSample, true);

  writeAscii(view, 36, "data");
  view.setUint32(40, dataSize, true);

  for (let i = 0; i < pcm16.length; i++) {
    view.setInt16(44 + i * 2, pcm16[i] ?? 0, true);
  }
  return new Uint8Array(buffer);
}

export function float32ToPcm16(samples: Float32Array): Int16Array {
  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i] ?? 0));
    out[i] = s < 0 ? Math.round(s * 32768) : Math.round(s * 32767);
  }
  return out;
}

function writeAscii(view: DataView, offset: number, text: string) {
  for (let i = 0; i < text.length; i++) {
    view.setUint8(offset + i, text.charCodeAt(i));
  }
}

function readAscii(bytes: Uint8Array, offset: number, length: number) {
  let out = "";
  for (let i = 0; i < length; i++) out += String.fromCharCode(bytes[offset + i] ?? 0);
  return out;
}
