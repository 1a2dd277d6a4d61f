import {
  analyzeImage,
  generateThumbnail,
  synthesizeAnalyses,
  type GeneratedImage,
  type SynthesisOutcome,
  type SynthesisResult,
} from "./_pipeline";
import {
  encodeImage,
  invalidInput,
  type ImageOptions,
  type SynthesisOptions,
  type UpstreamConfig,
  type VisionOptions,
} from "./_utils";
import type { AnalysisResult } from "./_variants";

export interface UploadRecord {
  name: string;
  byteLength: number;
  mimeType: string;
  analysis: AnalysisResult;
  analyzedAt: string;
}

export interface SessionContext {
  id: string;
  records: UploadRecord[];
  synthesis: SynthesisResult | null;
  generated: GeneratedImage | null;
  createdAt: number;
  touchedAt: number;
}

export interface PendingUpload {
  name: string;
  mimeType: string;
  bytes: Uint8Array;
}

const sameIdentity = (a: { name: string; byteLength: number }, b: { name: string; byteLength: number }) =>
  a.name === b.name && a.byteLength === b.byteLength;

export const hasRecord = (session: SessionContext, name: string, byteLength: number) =>
  session.records.some((record) => sameIdentity(record, { name, byteLength }));

/** Drops uploads already in the session or repeated earlier in the same batch. */
export const selectNewUploads = (session: SessionContext, uploads: PendingUpload[]) => {
  const fresh: PendingUpload[] = [];
  const skipped: PendingUpload[] = [];
  for (const upload of uploads) {
    const identity = { name: upload.name, byteLength: upload.bytes.byteLength };
    const seen =
      hasRecord(session, identity.name, identity.byteLength) ||
      fresh.some((entry) => sameIdentity({ name: entry.name, byteLength: entry.bytes.byteLength }, identity));
    (seen ? skipped : fresh).push(upload);
  }
  return { fresh, skipped };
};

export const appendRecord = (session: SessionContext, record: UploadRecord): boolean => {
  if (hasRecord(session, record.name, record.byteLength)) {
    return false;
  }
  session.records.push(record);
  return true;
};

const inFlight = new WeakMap<SessionContext, Set<string>>();

const identityKey = (name: string, byteLength: number) => `${byteLength}:${name}`;

/** Reserves an upload for analysis; false when the session has it or another batch is analyzing it. */
const claimUpload = (session: SessionContext, upload: PendingUpload): boolean => {
  const byteLength = upload.bytes.byteLength;
  const key = identityKey(upload.name, byteLength);
  let pending = inFlight.get(session);
  if (!pending) {
    pending = new Set<string>();
    inFlight.set(session, pending);
  }
  if (pending.has(key) || hasRecord(session, upload.name, byteLength)) {
    return false;
  }
  pending.add(key);
  return true;
};

const releaseUpload = (session: SessionContext, upload: PendingUpload) => {
  inFlight.get(session)?.delete(identityKey(upload.name, upload.bytes.byteLength));
};

export interface AnalyzeBatchResult {
  added: UploadRecord[];
  skipped: string[];
  warnings: string[];
  failures: Array<{ name: string; error: string }>;
}

/**
 * Analyzes new uploads one after another. A failed call is reported and the
 * loop moves on; records already appended stay. An upload another batch on
 * the same session is still analyzing counts as skipped.
 */
export const analyzeUploads = async (
  upstream: UpstreamConfig,
  options: VisionOptions,
  session: SessionContext,
  uploads: PendingUpload[],
): Promise<AnalyzeBatchResult> => {
  const { fresh, skipped } = selectNewUploads(session, uploads);
  const result: AnalyzeBatchResult = {
    added: [],
    skipped: skipped.map((upload) => upload.name),
    warnings: [],
    failures: [],
  };

  for (const upload of fresh) {
    if (!claimUpload(session, upload)) {
      result.skipped.push(upload.name);
      continue;
    }
    try {
      const { analysis, warning } = await analyzeImage(
        upstream,
        options,
        { base64: encodeImage(upload.bytes), mimeType: upload.mimeType },
        upload.name,
      );
      const record: UploadRecord = {
        name: upload.name,
        byteLength: upload.bytes.byteLength,
        mimeType: upload.mimeType,
        analysis,
        analyzedAt: new Date().toISOString(),
      };
      if (appendRecord(session, record)) {
        result.added.push(record);
      } else {
        result.skipped.push(upload.name);
      }
      if (warning) {
        result.warnings.push(warning);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : "Analysis failed";
      console.error(`Analysis of ${upload.name} failed`, message);
      result.failures.push({ name: upload.name, error: message });
    } finally {
      releaseUpload(session, upload);
    }
  }

  return result;
};

export const synthesizeSession = async (
  upstream: UpstreamConfig,
  options: SynthesisOptions,
  session: SessionContext,
): Promise<SynthesisOutcome> => {
  if (!session.records.length) {
    throw invalidInput("Upload and analyze at least one image first");
  }
  const outcome = await synthesizeAnalyses(
    upstream,
    options,
    session.records.map((record) => record.analysis),
  );
  session.synthesis = outcome.result;
  session.generated = null;
  return outcome;
};

export const generateForSession = async (
  upstream: UpstreamConfig,
  options: ImageOptions,
  session: SessionContext,
  prompt?: string,
): Promise<GeneratedImage> => {
  const chosen = prompt?.trim() || session.synthesis?.generationPrompt || "";
  const image = await generateThumbnail(upstream, options, chosen);
  session.generated = image;
  return image;
};

export class SessionStore {
  private sessions = new Map<string, SessionContext>();

  constructor(
    private ttlMs: number,
    private now: () => number = Date.now,
  ) {}

  private create(id: string): SessionContext {
    const timestamp = this.now();
    const session: SessionContext = {
      id,
      records: [],
      synthesis: null,
      generated: null,
      createdAt: timestamp,
      touchedAt: timestamp,
    };
    this.sessions.set(id, session);
    return session;
  }

  private prune() {
    const cutoff = this.now() - this.ttlMs;
    for (const [id, session] of this.sessions) {
      if (session.touchedAt < cutoff) {
        this.sessions.delete(id);
      }
    }
  }

  /** Returns the session for `id`, creating a fresh one (with a new id when none is given). */
  resolve(id?: string | null): SessionContext {
    this.prune();
    const key = id?.trim();
    if (key) {
      const existing = this.sessions.get(key);
      if (existing) {
        existing.touchedAt = this.now();
        return existing;
      }
      return this.create(key);
    }
    return this.create(crypto.randomUUID());
  }

  reset(id: string): SessionContext {
    this.sessions.delete(id);
    return this.create(id);
  }

  get size() {
    return this.sessions.size;
  }
}
