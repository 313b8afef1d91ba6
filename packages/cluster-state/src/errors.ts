/**
 * Error taxonomy.
 *
 * Fatal conditions are thrown; soft ones (drain timeouts, unreachable hosts,
 * failed post-deploy checks) are NodeWarning values on per-node results.
 */

export type ViolationCode =
  | 'schema'
  | 'parse'
  | 'duplicate-name'
  | 'duplicate-ip'
  | 'invalid-ip'
  | 'ip-outside-subnet'
  | 'invalid-subnet'
  | 'invalid-role'
  | 'invalid-name'
  | 'no-server'
  | 'multiple-servers'
  | 'missing-section';

export interface Violation {
  code:    ViolationCode;
  path:    string;
  message: string;
}

/** Desired state rejected; raised strictly before any mutation */
export class ValidationError extends Error {
  readonly name = 'ValidationError' as const;
  constructor(readonly violations: Violation[]) {
    super(`Topology rejected with ${violations.length} violation(s): ${violations.map((v) => `${v.path}: ${v.message}`).join('; ')}`);
  }
}

/** Control plane or remote node unreachable. Never means "absent". */
export class ConnectivityError extends Error {
  readonly name = 'ConnectivityError' as const;
  constructor(readonly target: string, message: string, options?: { cause?: unknown }) {
    super(`${target}: ${message}`, options);
  }
}

export class OperationTimeoutError extends Error {
  readonly name = 'OperationTimeoutError' as const;
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

/** A safety guard refused to proceed; zero mutating calls were issued */
export class PreconditionError extends Error {
  readonly name = 'PreconditionError' as const;
}

export class ArtifactWriteError extends Error {
  readonly name = 'ArtifactWriteError' as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export interface FailedNode {
  nodeName: string;
  detail:   string;
}

/** One or more nodes failed evaluation; blocks deploy */
export class BuildError extends Error {
  readonly name = 'BuildError' as const;
  constructor(readonly failures: FailedNode[]) {
    super(`Evaluation failed for ${failures.map((f) => f.nodeName).join(', ')}`);
  }
}

/** Executor failure; the cluster may be left in a mixed state */
export class DeployError extends Error {
  readonly name = 'DeployError' as const;
  constructor(readonly failures: FailedNode[], options?: { cause?: unknown }) {
    super(`Deploy failed for ${failures.map((f) => f.nodeName).join(', ')}`, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
