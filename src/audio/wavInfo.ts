/**
 * Minimal RIFF/WAVE header codec. Only PCM headers are written; parsing walks
 * the chunk list so backends that emit extra chunks before `data` still parse.
 */

export const WAV_HEADER_BYTES = 44;

export interface WavInfo {
  audioFormat: number;
  channels: number;
  sampleRateHz: number;
  bitsPerSample: number;
  /** Declared size of the data chunk, when the header reached it. */
  dataBytes?: number;
}

export function encodeWavHeader(opts: {
  sampleRateHz: number;
  channels: number;
  bitsPerSample: number;
  dataBytes: number;
}): Buffer {
  const blockAlign = opts.channels * (opts.bitsPerSample / 8);
  const byteRate = opts.sampleRateHz * blockAlign;
  const buf = Buffer.alloc(WAV_HEADER_BYTES);
  let offset = 0;

  // RIFF header
  buf.write('RIFF', offset); offset += 4;
  buf.writeUInt32LE(WAV_HEADER_BYTES - 8 + opts.dataBytes, offset); offset += 4;
  buf.write('WAVE', offset); offset += 4;

  // fmt chunk
  buf.write('fmt ', offset); offset += 4;
  buf.writeUInt32LE(16, offset); offset += 4;
  buf.writeUInt16LE(1, offset); offset += 2; // PCM
  buf.writeUInt16LE(opts.channels, offset); offset += 2;
  buf.writeUInt32LE(opts.sampleRateHz, offset); offset += 4;
  buf.writeUInt32LE(byteRate, offset); offset += 4;
  buf.writeUInt16LE(blockAlign, offset); offset += 2;
  buf.writeUInt16LE(opts.bitsPerSample, offset); offset += 2;

  // data chunk
  buf.write('data', offset); offset += 4;
  buf.writeUInt32LE(opts.dataBytes, offset);

  return buf;
}

export function parseWavInfo(buf: Buffer): WavInfo {
  if (buf.length < 12 || buf.toString('ascii', 0, 4) !== 'RIFF' || buf.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('wav: missing RIFF/WAVE signature');
  }

  let fmt: Omit<WavInfo, 'dataBytes'> | undefined;
  let offset = 12;
  while (offset + 8 <= buf.length) {
    const id = buf.toString('ascii', offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      if (body + 16 > buf.length) break;
      fmt = {
        audioFormat: buf.readUInt16LE(body),
        channels: buf.readUInt16LE(body + 2),
        sampleRateHz: buf.readUInt32LE(body + 4),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
    } else if (id === 'data') {
      if (!fmt) break;
      return { ...fmt, dataBytes: size };
    }

    // chunks are word aligned
    offset = body + size + (size % 2);
  }

  if (!fmt) {
    throw new Error('wav: fmt chunk not found');
  }
  return fmt;
}
