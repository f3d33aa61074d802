import type { WavInfo } from '../audio/wavInfo';

export interface Utterance {
  /** Text voiced by the synthesizer (Japanese). */
  spokenText: string;
  /** Text shown under the character; may be empty. */
  subtitleText: string;
}

/** Hex digest of the trimmed spoken text. The only cache key. */
export type Fingerprint = string;

export type ArtifactVariant = 'primary' | 'mock';

export type ArtifactProvenance = 'cache' | 'primary' | 'mock';

export interface AudioArtifact {
  path: string;
  sizeBytes: number;
  provenance: ArtifactProvenance;
  variant: ArtifactVariant;
  format?: WavInfo;
}

export type PrimaryBackendName = 'voicevox';

export type SynthesisBackend = 'cache' | PrimaryBackendName | 'mock';

export interface SynthesisOutcome {
  artifactPath: string;
  subtitleText: string;
  backend: SynthesisBackend;
  /** Set only when an unexpected failure forced the mock fallback. */
  error?: string;
}

export type SynthesisAttempt =
  | { kind: 'ok'; artifact: AudioArtifact }
  | { kind: 'backend_unavailable'; reason: string }
  | { kind: 'corrupt'; sizeBytes: number }
  | { kind: 'storage_failure'; error: unknown };

export type CacheLookup =
  | { kind: 'hit'; artifact: AudioArtifact }
  | { kind: 'miss' }
  | { kind: 'storage_failure'; error: unknown };

/** A live synthesis backend that renders into the cache store. */
export interface PrimarySynthesizer {
  readonly name: PrimaryBackendName;
  /** Liveness probe. Never rejects. */
  available(): Promise<boolean>;
  /** Never rejects; failures come back as attempt variants. */
  synthesize(spokenText: string): Promise<SynthesisAttempt>;
}

export class EmptyUtteranceError extends Error {
  constructor() {
    super('spoken text is empty');
    this.name = 'EmptyUtteranceError';
  }
}

export class SynthesisFailedError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'SynthesisFailedError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
