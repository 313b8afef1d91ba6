/**
 * Control-plane adapter backed by kubectl.
 */

import { z } from 'zod';

import type { ClusterMember, ControlPlaneClient, DrainOptions, DrainOutcome } from 'cluster-state';
import { CommandError, defaultExec, type ExecFn } from './exec.js';

const CONTROL_PLANE_LABELS = [
  'node-role.kubernetes.io/control-plane',
  'node-role.kubernetes.io/master',
];

/** Headroom over kubectl's own --timeout before the process is killed */
const DRAIN_GRACE_MS = 15_000;

// ── `kubectl get nodes -o json` ───────────────────────────────────────────────

const nodeListSchema = z.object({
  items: z.array(
    z.object({
      metadata: z.object({
        name:   z.string(),
        labels: z.record(z.string(), z.string()).default({}),
      }),
      spec: z.object({
        unschedulable: z.boolean().optional(),
      }).default({}),
      status: z.object({
        conditions: z.array(z.object({ type: z.string(), status: z.string() })).default([]),
        addresses:  z.array(z.object({ type: z.string(), address: z.string() })).default([]),
      }).default({}),
    })
  ),
});

export function parseNodeList(json: string): ClusterMember[] {
  const list = nodeListSchema.parse(JSON.parse(json));
  return list.items.map((item) => {
    const member: ClusterMember = {
      name:         item.metadata.name,
      ready:        item.status.conditions.some((c) => c.type === 'Ready' && c.status === 'True'),
      schedulable:  item.spec.unschedulable !== true,
      controlPlane: CONTROL_PLANE_LABELS.some((label) => label in item.metadata.labels),
    };
    const internal = item.status.addresses.find((a) => a.type === 'InternalIP');
    if (internal) member.address = internal.address;
    return member;
  });
}

// ── Client ────────────────────────────────────────────────────────────────────

export interface KubectlOptions {
  kubectl:   string;
  context?:  string;
  timeoutMs: number;
}

export class KubectlControlPlane implements ControlPlaneClient {
  constructor(
    private readonly options: KubectlOptions,
    private readonly exec:    ExecFn = defaultExec
  ) {}

  private run(args: string[], signal: AbortSignal, timeoutMs = this.options.timeoutMs) {
    const { kubectl, context } = this.options;
    return this.exec(kubectl, context ? ['--context', context, ...args] : args, { timeoutMs, signal });
  }

  async list(signal: AbortSignal): Promise<ClusterMember[]> {
    const { stdout } = await this.run(['get', 'nodes', '-o', 'json'], signal);
    return parseNodeList(stdout);
  }

  async cordon(name: string, signal: AbortSignal): Promise<void> {
    await this.run(['cordon', name], signal);
  }

  async drain(name: string, options: DrainOptions, signal: AbortSignal): Promise<DrainOutcome> {
    const seconds = Math.max(1, Math.ceil(options.timeoutMs / 1000));
    const args = [
      'drain', name,
      '--ignore-daemonsets',
      '--delete-emptydir-data',
      `--timeout=${seconds}s`,
    ];
    if (options.force) args.push('--force', '--disable-eviction');

    try {
      await this.run(args, signal, options.timeoutMs + DRAIN_GRACE_MS);
      return 'drained';
    } catch (err) {
      if (err instanceof CommandError && (err.timedOut || /timed out/i.test(err.stderr))) return 'timeout';
      throw err;
    }
  }

  async delete(name: string, signal: AbortSignal): Promise<void> {
    await this.run(['delete', 'node', name, '--ignore-not-found'], signal);
  }
}
