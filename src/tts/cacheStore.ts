import { createHash } from 'crypto';
import { mkdirSync } from 'fs';
import { open, stat } from 'fs/promises';
import path from 'path';
import { parseWavInfo, type WavInfo } from '../audio/wavInfo';
import { log } from '../log';
import type {
  ArtifactProvenance,
  ArtifactVariant,
  AudioArtifact,
  CacheLookup,
  Fingerprint,
} from './types';

/** Anything smaller is treated as silent or truncated audio. */
export const MIN_VIABLE_AUDIO_BYTES = 20 * 1024;

const HEADER_PROBE_BYTES = 128;

export interface CacheStoreOptions {
  minViableBytes?: number;
}

/**
 * Content-addressed WAV store. Files are named by the MD5 of the spoken text;
 * mock tones carry a `_mock` suffix so they never collide with a real render
 * of the same text. Nothing is ever evicted.
 */
export class CacheStore {
  readonly root: string;
  readonly minViableBytes: number;

  constructor(root: string, opts: CacheStoreOptions = {}) {
    this.root = path.resolve(root);
    this.minViableBytes = opts.minViableBytes ?? MIN_VIABLE_AUDIO_BYTES;
  }

  /** Creates the root directory. Throws when storage is unwritable. */
  ensureRoot(): this {
    mkdirSync(this.root, { recursive: true });
    return this;
  }

  fingerprint(spokenText: string): Fingerprint {
    return fingerprintOf(spokenText);
  }

  pathFor(fingerprint: Fingerprint, variant: ArtifactVariant): string {
    const name = variant === 'mock' ? `${fingerprint}_mock.wav` : `${fingerprint}.wav`;
    return path.join(this.root, name);
  }

  /**
   * Primary renders win over mock tones. Undersized files are skipped, not
   * repaired: the next synthesis overwrites them.
   */
  async lookup(fingerprint: Fingerprint): Promise<CacheLookup> {
    for (const variant of ['primary', 'mock'] as const) {
      const filePath = this.pathFor(fingerprint, variant);
      let sizeBytes: number;
      try {
        sizeBytes = (await stat(filePath)).size;
      } catch (error) {
        if (isNotFound(error)) continue;
        return { kind: 'storage_failure', error };
      }

      if (sizeBytes < this.minViableBytes) {
        log.warn(
          { event: 'tts_cache_undersized', fingerprint, variant, size_bytes: sizeBytes },
          'cached audio below minimum size, ignoring',
        );
        continue;
      }

      try {
        return { kind: 'hit', artifact: await this.describe(filePath, 'cache', variant) };
      } catch (error) {
        return { kind: 'storage_failure', error };
      }
    }
    return { kind: 'miss' };
  }

  isViable(sizeBytes: number): boolean {
    return sizeBytes >= this.minViableBytes;
  }

  async describe(filePath: string, provenance: ArtifactProvenance, variant: ArtifactVariant): Promise<AudioArtifact> {
    const { size } = await stat(filePath);
    const artifact: AudioArtifact = { path: filePath, sizeBytes: size, provenance, variant };
    const format = await readWavFormat(filePath);
    if (format) artifact.format = format;
    return artifact;
  }
}

export function fingerprintOf(spokenText: string): Fingerprint {
  return createHash('md5').update(spokenText, 'utf8').digest('hex');
}

async function readWavFormat(filePath: string): Promise<WavInfo | undefined> {
  const handle = await open(filePath, 'r');
  try {
    const buf = Buffer.alloc(HEADER_PROBE_BYTES);
    const { bytesRead } = await handle.read(buf, 0, HEADER_PROBE_BYTES, 0);
    return parseWavInfo(buf.subarray(0, bytesRead));
  } catch (err) {
    // header metadata is informational; the size check is what gates validity
    log.debug({ err, path: filePath }, 'wav header not parseable');
    return undefined;
  } finally {
    await handle.close();
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
