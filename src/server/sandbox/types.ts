/**
 * Sandbox Session Types
 *
 * Defines the runtime contract shared by all backends, the session record
 * kept by the registry and the result shapes returned to callers.
 *
 * Supported backends:
 * - docker: local container isolation driven through the docker CLI
 * - e2b: Firecracker microVM sandboxes (e2b.dev)
 */

import type { BackendKind, NetworkPolicy, RuntimeConfig, RuntimeConfigInput } from '../config';

export type { BackendKind, NetworkPolicy, RuntimeConfig, RuntimeConfigInput };

/**
 * Languages a runtime can execute
 */
export const SUPPORTED_LANGUAGES = ['python', 'bash', 'r'] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export function isLanguage(value: string): value is Language {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

/**
 * Session lifecycle state
 *
 * provisioning -> warm <-> executing, warm -> terminating -> terminated
 */
export type SessionState =
  | 'provisioning'
  | 'warm'
  | 'executing'
  | 'terminating'
  | 'terminated';

// =============================================================================
// Artifacts
// =============================================================================

interface FileReferenceBase {
  /** Stable identifier for this artifact */
  artifactId: string;
  /** File name without directory */
  name: string;
  /** Path relative to the working directory */
  path: string;
  mimeType: string;
  sizeBytes: number;
}

/**
 * Artifact returned by value (images)
 */
export interface InlineFileReference extends FileReferenceBase {
  kind: 'inline';
  inlineData: Buffer;
}

/**
 * Artifact stored externally and returned as a signed URL
 */
export interface ExternalFileReference extends FileReferenceBase {
  kind: 'external';
  url: string;
  expiresAt: Date;
  /** SHA-256 of the uploaded content */
  fingerprint: string;
}

export type FileReference = InlineFileReference | ExternalFileReference;

/**
 * File produced by the language layer rather than found on disk
 * (e.g. a chart rendered by a notebook kernel)
 */
export interface DeclaredOutput {
  name: string;
  mimeType: string;
  data: Buffer;
}

export interface FileStamp {
  size: number;
  mtimeMs: number;
}

/**
 * Working-directory listing keyed by relative path
 */
export type WorkspaceSnapshot = Map<string, FileStamp>;

// =============================================================================
// Execution
// =============================================================================

/**
 * Result of one execution as returned by the session manager
 */
export interface ExecutionResult {
  stdout: string;
  /** Includes a `[sandbox] ...` line for every warning */
  stderr: string;
  exitCode: number;
  /** Discovery order */
  artifacts: FileReference[];
  executionDurationMs: number;
  warnings: string[];
}

/**
 * Result of one execution as returned by a runtime adapter,
 * before artifact processing
 */
export interface RuntimeExecution {
  stdout: string;
  stderr: string;
  exitCode: number;
  executionDurationMs: number;
  declaredOutputs: DeclaredOutput[];
}

/**
 * Output of a backend call
 */
export interface BackendResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  outputs?: DeclaredOutput[];
}

/**
 * Streaming hooks and cancellation passed to a backend call
 */
export interface ExecuteHooks {
  signal: AbortSignal;
  onStdout(chunk: string): void;
  onStderr(chunk: string): void;
}

export interface TerminationOutcome {
  ok: boolean;
  /** Set when the runtime was already terminated */
  alreadyTerminated?: boolean;
  /** 'graceful' | 'forced' when resources were released */
  method?: 'graceful' | 'forced';
  error?: string;
}

// =============================================================================
// Backend & Adapter Contracts
// =============================================================================

/**
 * Backend-specific primitives. Paths passed in are absolute and already
 * validated against the working directory.
 */
export interface RuntimeBackend {
  readonly kind: BackendKind;

  /** Boot the backend with resource and network limits applied */
  start(config: RuntimeConfig): Promise<void>;

  execute(code: string, language: Language, hooks: ExecuteHooks): Promise<BackendResult>;

  putFile(localPath: string, remotePath: string): Promise<void>;

  getFile(remotePath: string, localPath: string): Promise<void>;

  readFile(remotePath: string): Promise<Buffer>;

  listFiles(remotePath: string): Promise<string[]>;

  snapshot(): Promise<WorkspaceSnapshot>;

  installPackage(spec: string, hooks: ExecuteHooks): Promise<BackendResult>;

  /** Graceful stop */
  stop(): Promise<void>;

  /** Forced release of backend resources */
  kill(): Promise<void>;
}

/**
 * Capability contract consumed by the session manager
 */
export interface RuntimeAdapter {
  readonly kind: BackendKind;
  readonly config: RuntimeConfig;
  readonly started: boolean;
  readonly terminated: boolean;

  start(): Promise<void>;

  execute(code: string, language: string): Promise<RuntimeExecution>;

  upload(localPath: string, remotePath: string): Promise<void>;

  download(remotePath: string, localPath: string): Promise<void>;

  installPackage(spec: string): Promise<RuntimeExecution>;

  listFiles(remotePath?: string): Promise<string[]>;

  snapshot(): Promise<WorkspaceSnapshot>;

  readFile(remotePath: string): Promise<Buffer>;

  terminate(): Promise<TerminationOutcome>;
}

// =============================================================================
// Sessions
// =============================================================================

/**
 * Read-only view of a session
 */
export interface SessionInfo {
  sessionId: string;
  state: SessionState;
  backend: BackendKind;
  createdAt: Date;
  lastUsedAt: number;
  executionCount: number;
  config: RuntimeConfig;
}
