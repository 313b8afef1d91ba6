/**
 * Shared state threaded through the pipeline phases.
 */

import type { ArtifactStore, ClusterSpec, NodeStatus } from 'cluster-state';
import { log } from 'cluster-state';

export const PHASES = [
  'LOADING',
  'RECONCILING',
  'INSPECTING',
  'DECOMMISSIONING',
  'EVALUATING',
  'AWAITING_CONFIRMATION',
  'DEPLOYING',
  'VERIFYING',
  'DONE',
  'ABORTED',
  'FAILED',
] as const;

export type Phase = (typeof PHASES)[number];

export type ExitCode = 0 | 1 | 2;

export interface StatusRow {
  node:   string;
  phase:  Phase;
  status: NodeStatus;
  detail: string;
}

export class ReconcileContext {
  phase: Phase = 'LOADING';
  spec?: ClusterSpec;
  private readonly rows = new Map<string, StatusRow>();

  constructor(readonly store: ArtifactStore) {}

  enter(phase: Phase): void {
    this.phase = phase;
    log(`[Pipeline] ${phase}`);
  }

  /** Record (or replace) a node's row under the current phase */
  report(node: string, status: NodeStatus, detail: string): void {
    this.rows.set(node, { node, phase: this.phase, status, detail });
  }

  get statusRows(): StatusRow[] {
    return [...this.rows.values()];
  }
}
