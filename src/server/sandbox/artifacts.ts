/**
 * Artifact Processor
 *
 * Turns the files an execution produced into FileReferences. Images travel
 * inline; everything else is uploaded to object storage and referenced by a
 * signed URL. Content already uploaded for the same session is not uploaded
 * again while its URL is still valid.
 */

import * as path from 'path';
import { LRUCache } from 'lru-cache';
import { nanoid } from 'nanoid';
import type { ObjectStorage } from '../../storage/types';
import type {
  DeclaredOutput,
  ExternalFileReference,
  FileReference,
  WorkspaceSnapshot,
} from './types';
import { Errors } from '../../core/errors';
import { computeHash } from '../../utils/hash';
import { errorFields, logger as rootLogger, metrics, type Logger } from '../logger';

export const DEFAULT_MAX_ARTIFACT_BYTES = 10 * 1024 * 1024;

const IMAGE_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  bmp: 'image/bmp',
  svg: 'image/svg+xml',
};

const DOCUMENT_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  csv: 'text/csv',
  tsv: 'text/tab-separated-values',
  json: 'application/json',
  txt: 'text/plain',
  log: 'text/plain',
  md: 'text/markdown',
  html: 'text/html',
  htm: 'text/html',
  xml: 'application/xml',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  xls: 'application/vnd.ms-excel',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  parquet: 'application/vnd.apache.parquet',
  zip: 'application/zip',
};

const FALLBACK_TYPE = 'application/octet-stream';

export type ArtifactClass = 'image' | 'document';

/**
 * Classify a file by extension
 */
export function classifyArtifact(fileName: string): { artifactClass: ArtifactClass; mimeType: string } {
  const ext = path.extname(fileName).slice(1).toLowerCase();
  if (ext in IMAGE_TYPES) {
    return { artifactClass: 'image', mimeType: IMAGE_TYPES[ext] };
  }
  return { artifactClass: 'document', mimeType: DOCUMENT_TYPES[ext] ?? FALLBACK_TYPE };
}

/**
 * Files that are new in `after` or whose size or mtime changed, in `after` order
 */
export function changedFiles(before: WorkspaceSnapshot, after: WorkspaceSnapshot): string[] {
  const changed: string[] = [];
  for (const [file, stamp] of after) {
    const previous = before.get(file);
    if (!previous || previous.size !== stamp.size || previous.mtimeMs !== stamp.mtimeMs) {
      changed.push(file);
    }
  }
  return changed;
}

/**
 * Where the processor reads discovered files from
 */
export interface ArtifactSource {
  readFile(remotePath: string): Promise<Buffer>;
}

export interface ArtifactInput {
  sessionId: string;
  source: ArtifactSource;
  before: WorkspaceSnapshot;
  after: WorkspaceSnapshot;
  declaredOutputs?: DeclaredOutput[];
}

export interface ArtifactOutcome {
  artifacts: FileReference[];
  warnings: string[];
}

export interface ArtifactProcessorOptions {
  storage: ObjectStorage;
  maxArtifactBytes?: number;
  /** Fingerprints remembered per session */
  cacheSize?: number;
  logger?: Logger;
}

interface Candidate {
  name: string;
  path: string;
  size: number;
  load: () => Promise<Buffer>;
}

export class ArtifactProcessor {
  readonly maxArtifactBytes: number;

  private readonly storage: ObjectStorage;
  private readonly cacheSize: number;
  private readonly log: Logger;
  private readonly uploads = new Map<string, LRUCache<string, ExternalFileReference>>();

  constructor(options: ArtifactProcessorOptions) {
    this.storage = options.storage;
    this.maxArtifactBytes = options.maxArtifactBytes ?? DEFAULT_MAX_ARTIFACT_BYTES;
    this.cacheSize = options.cacheSize ?? 256;
    this.log = (options.logger ?? rootLogger).child({ component: 'artifacts' });
  }

  async process(input: ArtifactInput): Promise<ArtifactOutcome> {
    const candidates: Candidate[] = changedFiles(input.before, input.after).map((file) => ({
      name: path.posix.basename(file),
      path: file,
      size: input.after.get(file)?.size ?? 0,
      load: () => input.source.readFile(file),
    }));

    for (const output of input.declaredOutputs ?? []) {
      candidates.push({
        name: output.name,
        path: output.name,
        size: output.data.length,
        load: async () => output.data,
      });
    }

    const artifacts: FileReference[] = [];
    const warnings: string[] = [];

    for (const candidate of candidates) {
      if (candidate.size > this.maxArtifactBytes) {
        warnings.push(
          `Artifact '${candidate.path}' skipped: ${candidate.size} bytes exceeds the ${this.maxArtifactBytes} byte limit`
        );
        metrics.inc('sandbox_artifacts_rejected_total', 1, { reason: 'size' });
        continue;
      }

      let data: Buffer;
      try {
        data = await candidate.load();
      } catch (error) {
        warnings.push(`Artifact '${candidate.path}' could not be read: ${error instanceof Error ? error.message : String(error)}`);
        continue;
      }

      // The stamp may be stale if the file grew after the snapshot
      if (data.length > this.maxArtifactBytes) {
        warnings.push(
          `Artifact '${candidate.path}' skipped: ${data.length} bytes exceeds the ${this.maxArtifactBytes} byte limit`
        );
        metrics.inc('sandbox_artifacts_rejected_total', 1, { reason: 'size' });
        continue;
      }

      const reference = await this.toReference(input.sessionId, candidate, data, warnings);
      if (reference) {
        artifacts.push(reference);
      }
    }

    if (warnings.length > 0) {
      this.log.warn('Artifact processing finished with warnings', {
        sessionId: input.sessionId,
        warnings,
      });
    }

    return { artifacts, warnings };
  }

  /**
   * Forget every fingerprint recorded for a session
   */
  dropSession(sessionId: string): void {
    this.uploads.get(sessionId)?.clear();
    this.uploads.delete(sessionId);
  }

  private async toReference(
    sessionId: string,
    candidate: Candidate,
    data: Buffer,
    warnings: string[]
  ): Promise<FileReference | null> {
    const { artifactClass, mimeType } = classifyArtifact(candidate.name);
    const base = {
      artifactId: `art_${nanoid(12)}`,
      name: candidate.name,
      path: candidate.path,
      mimeType,
      sizeBytes: data.length,
    };

    if (artifactClass === 'image') {
      metrics.inc('sandbox_artifacts_total', 1, { kind: 'inline' });
      return { ...base, kind: 'inline', inlineData: data };
    }

    const fingerprint = computeHash(data);
    const cache = this.sessionCache(sessionId);
    const previous = cache.get(fingerprint);

    if (previous && previous.expiresAt.getTime() > Date.now()) {
      this.log.debug('Reusing uploaded artifact', { sessionId, path: candidate.path, fingerprint });
      metrics.inc('sandbox_artifacts_deduplicated_total');
      return { ...base, kind: 'external', url: previous.url, expiresAt: previous.expiresAt, fingerprint };
    }

    const key = `${encodeURIComponent(sessionId)}/${fingerprint.slice(0, 16)}/${candidate.name}`;
    try {
      const stored = await this.storage.put(data, key, mimeType);
      const reference: ExternalFileReference = {
        ...base,
        kind: 'external',
        url: stored.url,
        expiresAt: stored.expiresAt,
        fingerprint,
      };
      cache.set(fingerprint, reference);
      metrics.inc('sandbox_artifacts_total', 1, { kind: 'external' });
      return reference;
    } catch (error) {
      const failure = Errors.storageUploadFailure(key, error);
      this.log.error('Artifact upload failed', { sessionId, key, ...errorFields(error) });
      warnings.push(`${failure.code}: ${failure.message}`);
      return null;
    }
  }

  private sessionCache(sessionId: string): LRUCache<string, ExternalFileReference> {
    let cache = this.uploads.get(sessionId);
    if (!cache) {
      cache = new LRUCache<string, ExternalFileReference>({ max: this.cacheSize });
      this.uploads.set(sessionId, cache);
    }
    return cache;
  }
}
