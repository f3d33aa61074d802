import { writeFile } from 'fs/promises';
import { z } from 'zod';
import { log } from '../log';
import type { CacheStore } from './cacheStore';
import type { PrimarySynthesizer, SynthesisAttempt } from './types';

export interface VoicevoxConfig {
  endpoint: string;
  speaker: number;
  probeTimeoutMs?: number;
  queryTimeoutMs?: number;
  synthesisTimeoutMs?: number;
}

/** VOICEVOX audio_query document; passed back to /synthesis as-is apart from the tuning fields. */
export type AudioQuery = Record<string, unknown>;

export interface VoicevoxSpeaker {
  name: string;
  styles: Array<{ id: number; name: string }>;
}

export const VOLUME_SCALE_FLOOR = 0.8;

const QUERY_DEFAULTS = {
  volumeScale: 1.0,
  intonationScale: 1.0,
  speedScale: 1.0,
  pitchScale: 0.0,
  prePhonemeLength: 0.1,
  postPhonemeLength: 0.1,
} as const;

const audioQuerySchema = z.record(z.unknown());

const speakersSchema = z.array(
  z.object({
    name: z.string(),
    styles: z.array(z.object({ id: z.number(), name: z.string() })),
  }),
);

function numberField(query: AudioQuery, field: keyof typeof QUERY_DEFAULTS): number {
  const raw = query[field];
  if (raw === undefined || raw === null) return QUERY_DEFAULTS[field];
  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`voicevox audio_query: ${field} is not numeric`);
  }
  return value;
}

/**
 * Fills in tuning fields the engine may omit and lifts the volume to a floor.
 * Some engine builds answer audio_query with volumeScale near zero, which
 * renders a valid but inaudible WAV.
 */
export function hardenAudioQuery(query: AudioQuery): AudioQuery {
  return {
    ...query,
    volumeScale: Math.max(VOLUME_SCALE_FLOOR, numberField(query, 'volumeScale')),
    intonationScale: numberField(query, 'intonationScale'),
    speedScale: numberField(query, 'speedScale'),
    pitchScale: numberField(query, 'pitchScale'),
    prePhonemeLength: numberField(query, 'prePhonemeLength'),
    postPhonemeLength: numberField(query, 'postPhonemeLength'),
  };
}

/**
 * VOICEVOX engine client: audio_query, then synthesis. Renders land in the
 * cache store under the text's fingerprint.
 */
export class VoicevoxClient implements PrimarySynthesizer {
  readonly name = 'voicevox' as const;
  private readonly endpoint: string;
  private readonly speaker: number;
  private readonly probeTimeoutMs: number;
  private readonly queryTimeoutMs: number;
  private readonly synthesisTimeoutMs: number;

  constructor(
    config: VoicevoxConfig,
    private readonly cache: CacheStore,
  ) {
    this.endpoint = config.endpoint.replace(/\/+$/, '');
    this.speaker = config.speaker;
    this.probeTimeoutMs = config.probeTimeoutMs ?? 3_000;
    this.queryTimeoutMs = config.queryTimeoutMs ?? 10_000;
    this.synthesisTimeoutMs = config.synthesisTimeoutMs ?? 30_000;
  }

  async available(): Promise<boolean> {
    try {
      const res = await fetch(`${this.endpoint}/version`, {
        method: 'GET',
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
      return res.ok;
    } catch (err) {
      log.debug({ err, event: 'voicevox_probe_failed', endpoint: this.endpoint }, 'voicevox not reachable');
      return false;
    }
  }

  async synthesize(spokenText: string): Promise<SynthesisAttempt> {
    let audio: Buffer;
    try {
      const fetched = await this.render(spokenText);
      if (!(fetched instanceof Buffer)) return fetched;
      audio = fetched;
    } catch (err) {
      log.warn({ err, event: 'voicevox_error', endpoint: this.endpoint }, 'voicevox request failed');
      return { kind: 'backend_unavailable', reason: err instanceof Error ? err.message : String(err) };
    }

    const fingerprint = this.cache.fingerprint(spokenText);
    const filePath = this.cache.pathFor(fingerprint, 'primary');
    try {
      await writeFile(filePath, audio);
      const artifact = await this.cache.describe(filePath, 'primary', 'primary');
      if (!this.cache.isViable(artifact.sizeBytes)) {
        log.warn(
          { event: 'voicevox_audio_undersized', fingerprint, size_bytes: artifact.sizeBytes },
          'voicevox returned audio below minimum size',
        );
        return { kind: 'corrupt', sizeBytes: artifact.sizeBytes };
      }
      log.info(
        { event: 'voicevox_synthesized', fingerprint, size_bytes: artifact.sizeBytes, speaker: this.speaker },
        'voicevox synthesis complete',
      );
      return { kind: 'ok', artifact };
    } catch (error) {
      log.error({ err: error, event: 'voicevox_write_failed', path: filePath }, 'failed to store voicevox audio');
      return { kind: 'storage_failure', error };
    }
  }

  async listSpeakers(): Promise<VoicevoxSpeaker[]> {
    try {
      const res = await fetch(`${this.endpoint}/speakers`, {
        method: 'GET',
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
      if (!res.ok) return [];
      const parsed = speakersSchema.safeParse(await res.json());
      return parsed.success ? parsed.data : [];
    } catch (err) {
      log.debug({ err, event: 'voicevox_speakers_failed' }, 'voicevox speakers unavailable');
      return [];
    }
  }

  /** Returns the rendered bytes, or an attempt describing why there are none. */
  private async render(spokenText: string): Promise<Buffer | SynthesisAttempt> {
    const queryParams = new URLSearchParams({ text: spokenText, speaker: String(this.speaker) });
    const queryRes = await fetch(`${this.endpoint}/audio_query?${queryParams.toString()}`, {
      method: 'POST',
      signal: AbortSignal.timeout(this.queryTimeoutMs),
    });
    if (!queryRes.ok) {
      log.warn({ event: 'voicevox_query_failed', status: queryRes.status }, 'voicevox audio_query rejected');
      return { kind: 'backend_unavailable', reason: `audio_query ${queryRes.status}` };
    }

    const query = hardenAudioQuery(audioQuerySchema.parse(await queryRes.json()));

    const synthParams = new URLSearchParams({
      speaker: String(this.speaker),
      enable_interrogative_upspeak: 'true',
    });
    const synthRes = await fetch(`${this.endpoint}/synthesis?${synthParams.toString()}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(query),
      signal: AbortSignal.timeout(this.synthesisTimeoutMs),
    });
    if (!synthRes.ok) {
      log.warn({ event: 'voicevox_synthesis_failed', status: synthRes.status }, 'voicevox synthesis rejected');
      return { kind: 'backend_unavailable', reason: `synthesis ${synthRes.status}` };
    }

    return Buffer.from(await synthRes.arrayBuffer());
  }
}
