import { log } from '../log';
import type { CacheStore } from './cacheStore';
import { synthesizeMockTone } from './mockSynth';
import {
  describeError,
  EmptyUtteranceError,
  SynthesisFailedError,
  type Fingerprint,
  type PrimarySynthesizer,
  type SynthesisOutcome,
  type Utterance,
} from './types';

export type PreferredBackend = 'voicevox' | 'mock' | 'disabled';

export interface SynthesisResolverDeps {
  cache: CacheStore;
  primary?: PrimarySynthesizer | null;
  preferredBackend: PreferredBackend;
}

/** Tier walk result: either an outcome, or the failure that sends us to the last-resort mock. */
type TierResult =
  | { kind: 'resolved'; outcome: SynthesisOutcome }
  | { kind: 'contained'; error: unknown };

/**
 * cache → live backend → mock tone. The caller always gets an audible file
 * unless the mock tone itself cannot be written.
 */
export class SynthesisResolver {
  private readonly cache: CacheStore;
  private readonly primary: PrimarySynthesizer | null;
  private readonly preferredBackend: PreferredBackend;

  constructor(deps: SynthesisResolverDeps) {
    this.cache = deps.cache;
    this.primary = deps.primary ?? null;
    this.preferredBackend = deps.preferredBackend;
  }

  async resolve(utterance: Utterance): Promise<SynthesisOutcome> {
    const spokenText = utterance.spokenText.trim();
    const subtitleText = utterance.subtitleText.trim();
    if (!spokenText) {
      throw new EmptyUtteranceError();
    }

    const fingerprint = this.cache.fingerprint(spokenText);

    let result: TierResult;
    try {
      result = await this.walkTiers(spokenText, subtitleText, fingerprint);
    } catch (error) {
      result = { kind: 'contained', error };
    }

    switch (result.kind) {
      case 'resolved':
        return result.outcome;
      case 'contained':
        return this.lastResort(fingerprint, subtitleText, result.error);
    }
  }

  private async walkTiers(spokenText: string, subtitleText: string, fingerprint: Fingerprint): Promise<TierResult> {
    // A primary render shadows a mock tone for the same text (lookup order).
    const lookup = await this.cache.lookup(fingerprint);
    switch (lookup.kind) {
      case 'storage_failure':
        return { kind: 'contained', error: lookup.error };
      case 'hit':
        log.info({ event: 'tts_cache_hit', fingerprint, variant: lookup.artifact.variant }, 'tts cache hit');
        return { kind: 'resolved', outcome: this.outcome(lookup.artifact.path, subtitleText, 'cache') };
      case 'miss':
        break;
    }

    const primary = this.preferredBackend === 'voicevox' ? this.primary : null;
    if (primary && (await primary.available())) {
      const attempt = await primary.synthesize(spokenText);
      switch (attempt.kind) {
        case 'ok':
          return { kind: 'resolved', outcome: this.outcome(attempt.artifact.path, subtitleText, primary.name) };
        case 'storage_failure':
          return { kind: 'contained', error: attempt.error };
        case 'backend_unavailable':
          log.warn({ event: 'tts_primary_unavailable', fingerprint, reason: attempt.reason }, 'falling back to mock tts');
          break;
        case 'corrupt':
          log.warn({ event: 'tts_primary_corrupt', fingerprint, size_bytes: attempt.sizeBytes }, 'falling back to mock tts');
          break;
      }
    }

    const mockPath = this.cache.pathFor(fingerprint, 'mock');
    await synthesizeMockTone(mockPath);
    return { kind: 'resolved', outcome: this.outcome(mockPath, subtitleText, 'mock') };
  }

  private async lastResort(fingerprint: Fingerprint, subtitleText: string, cause: unknown): Promise<SynthesisOutcome> {
    const note = describeError(cause);
    log.error({ err: cause, event: 'tts_contained_failure', fingerprint }, 'tts failed, forcing mock fallback');

    const mockPath = this.cache.pathFor(fingerprint, 'mock');
    try {
      await synthesizeMockTone(mockPath);
    } catch (error) {
      log.fatal({ err: error, event: 'tts_fatal', fingerprint }, 'mock fallback failed');
      throw new SynthesisFailedError(`tts fatal: ${describeError(error)}`, error);
    }
    return { ...this.outcome(mockPath, subtitleText, 'mock'), error: note };
  }

  private outcome(artifactPath: string, subtitleText: string, backend: SynthesisOutcome['backend']): SynthesisOutcome {
    return { artifactPath, subtitleText, backend };
  }
}
