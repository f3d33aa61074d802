import type { Env } from '../env';
import { log } from '../log';
import { CacheStore } from './cacheStore';
import { SynthesisResolver } from './resolver';
import { VoicevoxClient } from './voicevox';

export interface TtsStack {
  cache: CacheStore;
  voicevox: VoicevoxClient;
  resolver: SynthesisResolver;
}

/** Builds the cache store, VOICEVOX client and resolver once at process start. */
export function createTtsStack(config: Env): TtsStack {
  const cache = new CacheStore(config.VOICES_DIR, { minViableBytes: config.TTS_MIN_AUDIO_BYTES }).ensureRoot();
  const voicevox = new VoicevoxClient(
    {
      endpoint: config.VOICEVOX_ENDPOINT,
      speaker: config.VOICEVOX_SPEAKER,
      probeTimeoutMs: config.VOICEVOX_PROBE_TIMEOUT_MS,
      queryTimeoutMs: config.VOICEVOX_QUERY_TIMEOUT_MS,
      synthesisTimeoutMs: config.VOICEVOX_SYNTHESIS_TIMEOUT_MS,
    },
    cache,
  );
  const resolver = new SynthesisResolver({
    cache,
    primary: voicevox,
    preferredBackend: config.TTS_BACKEND,
  });

  log.info(
    {
      event: 'tts_config',
      voices_dir: cache.root,
      backend: config.TTS_BACKEND,
      voicevox_endpoint: config.VOICEVOX_ENDPOINT,
      speaker: config.VOICEVOX_SPEAKER,
    },
    'tts stack ready',
  );

  return { cache, voicevox, resolver };
}
