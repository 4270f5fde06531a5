/**
 * Minimal RIFF/WAVE container helpers: mono header around a raw payload.
 *
 * Two encodings are written:
 * - pcm16: canonical 44-byte header, format 1, 16 bits per sample
 * - mulaw: format 7, 8 bits per sample, 18-byte fmt chunk plus a fact chunk
 *   (non-PCM formats carry one), 58-byte header
 */

export type WavEncoding = "pcm16" | "mulaw";

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_MULAW = 7;

export interface WavInfo {
  /** WAVE format tag: 1 = PCM, 7 = μ-law. */
  readonly format: number;
  readonly sampleRate: number;
  readonly channels: number;
  readonly bitsPerSample: number;
  readonly data: Buffer;
}

/** Wrap `payload` in a mono WAV header. */
export function encodeWav(
  payload: Buffer,
  sampleRate = 16_000,
  encoding: WavEncoding = "pcm16",
): Buffer {
  return encoding === "mulaw" ? mulawHeader(payload, sampleRate) : pcmHeader(payload, sampleRate);
}

function pcmHeader(payload: Buffer, sampleRate: number): Buffer {
  const channels = 1;
  const bitsPerSample = 16;
  const blockAlign = channels * (bitsPerSample / 8);
  const header = Buffer.alloc(44);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + payload.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(payload.length, 40);

  return Buffer.concat([header, payload]);
}

function mulawHeader(payload: Buffer, sampleRate: number): Buffer {
  const header = Buffer.alloc(58);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(50 + payload.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(18, 16);
  header.writeUInt16LE(WAVE_FORMAT_MULAW, 20);
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate, 28); // one byte per sample
  header.writeUInt16LE(1, 32);
  header.writeUInt16LE(8, 34);
  header.writeUInt16LE(0, 36); // cbSize
  header.write("fact", 38, "ascii");
  header.writeUInt32LE(4, 42);
  header.writeUInt32LE(payload.length, 46); // sample count
  header.write("data", 50, "ascii");
  header.writeUInt32LE(payload.length, 54);

  return Buffer.concat([header, payload]);
}

/** True when `buf` starts with a RIFF/WAVE signature. */
export function isWav(buf: Buffer): boolean {
  return (
    buf.length >= 12 &&
    buf.toString("ascii", 0, 4) === "RIFF" &&
    buf.toString("ascii", 8, 12) === "WAVE"
  );
}

/**
 * Parse a WAV buffer, walking chunks until `data`.
 * Returns null when the buffer is not a RIFF/WAVE container.
 */
export function decodeWav(buf: Buffer): WavInfo | null {
  if (!isWav(buf)) return null;

  let format = 0;
  let sampleRate = 0;
  let channels = 0;
  let bitsPerSample = 0;
  let offset = 12;

  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt " && body + 16 <= buf.length) {
      format = buf.readUInt16LE(body);
      channels = buf.readUInt16LE(body + 2);
      sampleRate = buf.readUInt32LE(body + 4);
      bitsPerSample = buf.readUInt16LE(body + 14);
    } else if (id === "data") {
      if (sampleRate === 0) return null;
      const end = Math.min(body + size, buf.length);
      return { format, sampleRate, channels, bitsPerSample, data: buf.subarray(body, end) };
    }

    // Chunks are word-aligned.
    offset = body + size + (size % 2);
  }

  return null;
}
