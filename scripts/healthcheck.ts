/**
 * Checks that Ollama and VOICEVOX answer. A missing VOICEVOX is only a warning:
 * /tts falls back to the mock tone.
 *
 * Usage: npm run healthcheck
 */

import { env } from '../src/env';
import { checkUrl } from '../src/routes/health';
import { VoicevoxClient } from '../src/tts/voicevox';
import { CacheStore } from '../src/tts/cacheStore';

const API_PATHS = ['/chat', '/qwen3', '/reply_bi', '/tts', '/say', '/pat', '/health'];

async function main(): Promise<number> {
  const ollama = env.OLLAMA_ENDPOINT.replace(/\/+$/, '');
  const voicevox = env.VOICEVOX_ENDPOINT.replace(/\/+$/, '');

  const [ollamaCheck, voicevoxCheck] = await Promise.all([
    checkUrl(`${ollama}/api/tags`, 2000),
    checkUrl(`${voicevox}/version`, 2000),
  ]);

  console.log(`[HealthCheck] Ollama (${ollama}/api/tags): ${ollamaCheck.ok ? 'OK' : 'FAIL'}`);
  if (voicevoxCheck.ok) {
    console.log(`[HealthCheck] VOICEVOX (${voicevox}/version): OK`);
    const client = new VoicevoxClient(
      { endpoint: voicevox, speaker: env.VOICEVOX_SPEAKER, probeTimeoutMs: 2000 },
      new CacheStore(env.VOICES_DIR),
    );
    const speakers = await client.listSpeakers();
    const style = speakers
      .flatMap((speaker) => speaker.styles.map((s) => ({ speaker: speaker.name, ...s })))
      .find((s) => s.id === env.VOICEVOX_SPEAKER);
    console.log(
      style
        ? `[HealthCheck] VOICEVOX speaker ${env.VOICEVOX_SPEAKER}: ${style.speaker} (${style.name})`
        : `[HealthCheck] VOICEVOX speaker ${env.VOICEVOX_SPEAKER}: not listed`,
    );
  } else {
    console.log(`[HealthCheck] VOICEVOX (${voicevox}/version): WARN -> will use mock TTS`);
  }

  console.log('Available API endpoints:');
  const base = `http://127.0.0.1:${env.PORT}`;
  for (const p of API_PATHS) {
    console.log(`  ${base}${p}`);
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error('[HealthCheck] failed:', err);
    process.exit(1);
  });
