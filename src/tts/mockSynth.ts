import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { encodeWavHeader, WAV_HEADER_BYTES } from '../audio/wavInfo';
import { log } from '../log';

export interface MockToneOptions {
  durationSeconds?: number;
  /** Older spelling of `durationSeconds`; wins when both are set. */
  seconds?: number;
  frequencyHz?: number;
  sampleRate?: number;
}

const DEFAULT_DURATION_SECONDS = 1.2;
const DEFAULT_FREQUENCY_HZ = 660;
const DEFAULT_SAMPLE_RATE = 24_000;
const AMPLITUDE = 32767 * 0.25;

/** Renders a mono 16-bit PCM sine tone. Same options, same bytes. */
export function renderMockTone(opts: MockToneOptions = {}): Buffer {
  const duration =
    typeof opts.seconds === 'number' && Number.isFinite(opts.seconds)
      ? opts.seconds
      : opts.durationSeconds ?? DEFAULT_DURATION_SECONDS;
  const frequencyHz = opts.frequencyHz ?? DEFAULT_FREQUENCY_HZ;
  const sampleRate = opts.sampleRate ?? DEFAULT_SAMPLE_RATE;

  const frames = Math.max(0, Math.round(sampleRate * duration));
  const dataBytes = frames * 2;
  const buf = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);
  encodeWavHeader({ sampleRateHz: sampleRate, channels: 1, bitsPerSample: 16, dataBytes }).copy(buf, 0);

  for (let i = 0; i < frames; i++) {
    const sample = Math.trunc(AMPLITUDE * Math.sin((2 * Math.PI * frequencyHz * i) / sampleRate));
    buf.writeInt16LE(sample, WAV_HEADER_BYTES + i * 2);
  }
  return buf;
}

/**
 * Writes the mock tone to `filePath`, replacing whatever is there.
 * Storage errors propagate: this is the last fallback.
 */
export async function synthesizeMockTone(filePath: string, opts: MockToneOptions = {}): Promise<number> {
  const audio = renderMockTone(opts);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, audio);
  log.info({ event: 'mock_tts_synthesize', path: filePath, size_bytes: audio.length }, 'mock tone written');
  return audio.length;
}
