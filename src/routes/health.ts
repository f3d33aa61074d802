import { Router } from 'express';
import { constants } from 'fs';
import { access } from 'fs/promises';
import { log } from '../log';

export interface ProbeResult {
  ok: boolean;
  latency_ms?: number;
  error?: string;
}

interface HealthStatus {
  status: 'ok' | 'degraded' | 'unhealthy';
  checks: {
    storage: ProbeResult;
    voicevox?: ProbeResult;
    chat: ProbeResult;
  };
  uptime_seconds: number;
}

export interface HealthRouterDeps {
  voicesDir: string;
  voicevoxEndpoint: string;
  ollamaEndpoint: string;
  /** When false the VOICEVOX probe is skipped: synthesis never calls it. */
  voicevoxEnabled: boolean;
}

const startTime = Date.now();

export async function checkUrl(url: string, timeout = 5000): Promise<ProbeResult> {
  const start = Date.now();
  try {
    const response = await fetch(url, { method: 'GET', signal: AbortSignal.timeout(timeout) });
    return { ok: response.ok, latency_ms: Date.now() - start };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : 'unknown', latency_ms: Date.now() - start };
  }
}

async function checkStorage(dir: string): Promise<ProbeResult> {
  const start = Date.now();
  try {
    await access(dir, constants.W_OK);
    return { ok: true, latency_ms: Date.now() - start };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : 'unknown', latency_ms: Date.now() - start };
  }
}

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const healthRouter = Router();
  const voicevoxBase = deps.voicevoxEndpoint.replace(/\/+$/, '');
  const ollamaBase = deps.ollamaEndpoint.replace(/\/+$/, '');

  // Basic liveness probe (always returns 200 if process is running)
  healthRouter.get('/live', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  // Backends falling over only degrades the voice (mock tone, echoed reply);
  // an unwritable voices dir is the one condition that breaks /tts.
  healthRouter.get('/', async (_req, res) => {
    const [storage, voicevox, chat] = await Promise.all([
      checkStorage(deps.voicesDir),
      deps.voicevoxEnabled ? checkUrl(`${voicevoxBase}/version`, 3000) : Promise.resolve(undefined),
      checkUrl(`${ollamaBase}/api/tags`, 3000),
    ]);

    const checks: HealthStatus['checks'] = { storage, chat };
    if (voicevox) checks.voicevox = voicevox;

    const allOk = storage.ok && chat.ok && (voicevox?.ok ?? true);
    const status: HealthStatus = {
      status: !storage.ok ? 'unhealthy' : allOk ? 'ok' : 'degraded',
      checks,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
    };

    if (!allOk) {
      log.warn({ event: 'health_check_degraded', checks }, 'health check not fully ok');
    }

    res.status(storage.ok ? 200 : 503).json(status);
  });

  return healthRouter;
}
