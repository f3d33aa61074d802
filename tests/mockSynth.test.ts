import assert from 'node:assert/strict';
import { readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, test } from 'node:test';
import { parseWavInfo } from '../src/audio/wavInfo';
import { renderMockTone, synthesizeMockTone } from '../src/tts/mockSynth';
import { makeTempDir } from './helpers';

describe('mock synthesizer', () => {
  let tmp: Awaited<ReturnType<typeof makeTempDir>>;

  beforeEach(async () => {
    tmp = await makeTempDir();
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  test('default tone is 1.2s of mono 16-bit PCM at 24 kHz', () => {
    const audio = renderMockTone();

    // 28800 frames * 2 bytes + 44-byte header
    assert.equal(audio.length, 57_644);
    assert.deepEqual(parseWavInfo(audio), {
      audioFormat: 1,
      channels: 1,
      sampleRateHz: 24000,
      bitsPerSample: 16,
      dataBytes: 57_600,
    });
  });

  test('samples follow a quarter-scale sine', () => {
    const audio = renderMockTone({ frequencyHz: 6000, sampleRate: 24000, durationSeconds: 0.01 });

    // 6 kHz at 24 kHz: one quarter period per sample
    assert.equal(audio.readInt16LE(44), 0);
    assert.equal(audio.readInt16LE(46), 8191);
    assert.equal(audio.readInt16LE(50), -8191);
  });

  test('identical parameters render identical bytes', () => {
    const a = renderMockTone({ durationSeconds: 0.5, frequencyHz: 440, sampleRate: 16000 });
    const b = renderMockTone({ durationSeconds: 0.5, frequencyHz: 440, sampleRate: 16000 });
    assert.ok(a.equals(b));
  });

  test('seconds is a synonym for durationSeconds and wins', () => {
    const viaSeconds = renderMockTone({ seconds: 0.5 });
    const both = renderMockTone({ durationSeconds: 2, seconds: 0.5 });

    assert.equal(viaSeconds.length, 44 + 12_000 * 2);
    assert.ok(both.equals(viaSeconds));
  });

  test('writes the tone to disk, overwriting existing content', async () => {
    const target = path.join(tmp.dir, 'nested', 'tone.wav');
    const size = await synthesizeMockTone(target);
    assert.equal(size, 57_644);
    assert.equal((await stat(target)).size, 57_644);

    await writeFile(target, 'garbage');
    await synthesizeMockTone(target);
    assert.ok((await readFile(target)).equals(renderMockTone()));
  });

  test('storage errors propagate', async () => {
    const blocker = path.join(tmp.dir, 'not-a-dir');
    await writeFile(blocker, 'file');

    await assert.rejects(synthesizeMockTone(path.join(blocker, 'tone.wav')));
  });
});
