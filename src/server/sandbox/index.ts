/**
 * Sandbox Module
 *
 * Session lifecycle management for untrusted code execution.
 *
 * Supported backends:
 * - Docker: local containers driven through the docker CLI
 * - E2B: Firecracker microVM sandboxes (e2b.dev)
 *
 * @example
 * ```typescript
 * import { ArtifactProcessor, SessionManager, createRuntimeFactory } from './sandbox';
 * import { createObjectStorage } from '../../storage';
 *
 * const manager = new SessionManager({
 *   runtimeFactory: createRuntimeFactory(),
 *   artifacts: new ArtifactProcessor({
 *     storage: createObjectStorage({ kind: 'local', directory: './artifacts' }),
 *   }),
 * });
 *
 * await manager.getOrCreateSession('s1');
 * const result = await manager.execute('s1', 'print(2 + 2)', 'python');
 * console.log(result.stdout); // "4\n"
 *
 * await manager.shutdown();
 * ```
 */

// Types
export * from './types';

// Runtime
export { SandboxRuntime, type SandboxRuntimeOptions } from './runtime';
export { BaseRuntimeBackend } from './base-provider';
export { DockerBackend, type DockerBackendOptions } from './providers/docker';
export { E2BBackend, type E2BBackendOptions, type CreateE2BSandbox } from './providers/e2b';
export { createRuntimeFactory, type RuntimeFactory, type RuntimeFactoryOptions } from './factory';
export { withSandbox } from './scoped';

// Sessions
export { SessionManager, type SessionManagerOptions, type TerminationReason } from './manager';
export { SessionRegistry, type SessionRecord } from './registry';
export { SessionLock } from './lock';
export { Reaper, type SweepReport } from './reaper';

// Artifacts
export { ArtifactProcessor, classifyArtifact, changedFiles, type ArtifactOutcome } from './artifacts';

// Collaborators
export { LoggingAuditSink, noopAuditSink, type AuditEvent, type AuditSink } from './audit';
export { EnvSecretsProvider, StaticSecretsProvider, type SecretsProvider } from './secrets';
export { SandboxTools, formatExecution, type ContentPart, type ToolResult } from './tools';

// Helpers
export { resolveRemotePath } from './paths';
export { isPackageAllowed, requirementName } from './packages';
