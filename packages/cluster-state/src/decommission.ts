/**
 * Node decommission orchestration.
 *
 * Each candidate is driven through
 *   pending → draining → deleted-from-cluster → service-stopped → token-purged
 *
 * No stage is persisted. Every step first observes the state it would change
 * (member presence and schedulability, remote service state, cached
 * credentials) and skips itself when already satisfied, so a run can be
 * aborted anywhere and started again from scratch.
 *
 * Nodes are independent: one node's failure is recorded on its own result and
 * never stops the others.
 */

import pLimit from 'p-limit';

import type {
  ClusterMember,
  ControlPlaneClient,
  CredentialStore,
  DecommissionStage,
  NodeRole,
  NodeStatus,
  NodeWarning,
  RemoteShellClient,
  RemoteTarget,
  ServiceState,
} from './types.js';
import type { DecommissionCandidate, CandidateOrigin } from './membership.js';
import { ConnectivityError, PreconditionError, errorMessage } from './errors.js';
import { withTimeout } from './timeout.js';
import { log, warn } from './logger.js';

// ── Options ───────────────────────────────────────────────────────────────────

/** Service layout of a cluster flavour (k3s, rke2, …) */
export interface ClusterProfile {
  name:          string;
  serverService: string;
  agentService:  string;
  /** Join credential on the node itself */
  tokenPath:     string;
}

export interface DecommissionTimeouts {
  controlPlaneMs: number;
  drainMs:        number;
  remoteMs:       number;
}

export interface DecommissionOptions {
  /** Used to reach nodes the control plane no longer reports an address for */
  domain:             string;
  profile:            ClusterProfile;
  timeouts:           DecommissionTimeouts;
  concurrency:        number;
  dryRun:             boolean;
  allowServerRemoval: boolean;
}

export interface DecommissionDeps {
  controlPlane: ControlPlaneClient;
  remote:       RemoteShellClient;
  credentials:  CredentialStore;
}

// ── Results ───────────────────────────────────────────────────────────────────

export type DecommissionActionKind =
  | 'cordon'
  | 'drain'
  | 'force-drain'
  | 'delete'
  | 'stop-service'
  | 'purge-credential';

export interface DecommissionAction {
  kind:      DecommissionActionKind;
  /** false in dry-run: the action was only planned */
  performed: boolean;
  detail:    string;
}

export interface NodeDecommissionResult {
  nodeName:   string;
  origin:     CandidateOrigin;
  role:       NodeRole | 'unknown';
  /** Stage observed before the first action of this run */
  startStage: DecommissionStage;
  /** Last stage completed (or, in dry-run, that would be completed) */
  stage:      DecommissionStage;
  status:     NodeStatus;
  actions:    DecommissionAction[];
  warnings:   NodeWarning[];
  error?:     string;
}

export interface DecommissionReport {
  dryRun:  boolean;
  results: NodeDecommissionResult[];
}

// ── Guard ─────────────────────────────────────────────────────────────────────

/**
 * Refuse to remove the last control-plane member unless explicitly allowed.
 * Runs before any node is touched.
 */
export function assertServerRemovalAllowed(
  candidates: DecommissionCandidate[],
  members:    ClusterMember[],
  allow:      boolean
): void {
  const removing  = new Set(candidates.map((c) => c.nodeName));
  const doomed    = members.filter((m) => m.controlPlane && removing.has(m.name));
  const surviving = members.filter((m) => m.controlPlane && !removing.has(m.name));
  if (doomed.length === 0 || surviving.length > 0) return;

  const names = doomed.map((m) => m.name).join(', ');
  if (allow) {
    warn(`[Decommission] Removing sole control-plane node(s) ${names} under explicit override`);
    return;
  }
  throw new PreconditionError(
    `Refusing to decommission ${names}: no control-plane node would remain. ` +
    'Add the replacement server first, or re-run with --allow-server-removal.'
  );
}

// ── Single node ───────────────────────────────────────────────────────────────

class NodeRun {
  readonly result: NodeDecommissionResult;
  private started = false;

  constructor(
    candidate: DecommissionCandidate,
    private readonly deps:    DecommissionDeps,
    private readonly options: DecommissionOptions
  ) {
    this.result = {
      nodeName:   candidate.nodeName,
      origin:     candidate.origin,
      role:       'unknown',
      startStage: 'pending',
      stage:      'pending',
      status:     'ok',
      actions:    [],
      warnings:   [],
    };
  }

  private get name(): string {
    return this.result.nodeName;
  }

  /** Pin startStage the first time this run has something to do */
  private begin(): void {
    if (this.started) return;
    this.started = true;
    this.result.startStage = this.result.stage;
  }

  private record(kind: DecommissionActionKind, detail: string): void {
    const performed = !this.options.dryRun;
    this.result.actions.push({ kind, performed, detail });
    log(`[Decommission] ${this.name}: ${performed ? '' : '[dry-run] would '}${kind}: ${detail}`);
  }

  private addWarning(warning: NodeWarning): void {
    this.result.warnings.push(warning);
    warn(`[Decommission] ${this.name}: ${warning.message}`);
  }

  private async controlPlaneCall<T>(operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(`${operation} ${this.name}`, this.options.timeouts.controlPlaneMs, fn);
    } catch (err) {
      if (err instanceof ConnectivityError) throw err;
      throw new ConnectivityError(this.name, `${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async observeMember(): Promise<ClusterMember | undefined> {
    const members = await this.controlPlaneCall('observe', (signal) => this.deps.controlPlane.list(signal));
    return members.find((m) => m.name === this.name);
  }

  private async attemptDrain(force: boolean): Promise<{ ok: true } | { ok: false; reason: string }> {
    const { drainMs, controlPlaneMs } = this.options.timeouts;
    try {
      const outcome = await withTimeout(`drain ${this.name}`, drainMs + controlPlaneMs, (signal) =>
        this.deps.controlPlane.drain(this.name, { timeoutMs: drainMs, force }, signal)
      );
      return outcome === 'drained' ? { ok: true } : { ok: false, reason: `not finished within ${drainMs / 1000}s` };
    } catch (err) {
      return { ok: false, reason: errorMessage(err) };
    }
  }

  private async drain(): Promise<void> {
    const seconds = this.options.timeouts.drainMs / 1000;
    if (this.options.dryRun) {
      this.record('drain', `evict workloads (timeout ${seconds}s, forced eviction after)`);
      return;
    }

    const first = await this.attemptDrain(false);
    this.record('drain', first.ok ? 'workloads evicted' : `incomplete: ${first.reason}`);
    if (first.ok) return;

    this.addWarning({ kind: 'DrainTimeoutWarning', message: `drain incomplete (${first.reason}); forcing eviction` });
    const forced = await this.attemptDrain(true);
    this.record('force-drain', forced.ok ? 'workloads evicted' : `incomplete: ${forced.reason}`);
    if (!forced.ok) {
      this.addWarning({ kind: 'DrainTimeoutWarning', message: `forced drain incomplete (${forced.reason}); proceeding with removal` });
    }
  }

  /** pending → draining → deleted-from-cluster */
  private async leaveControlPlane(member: ClusterMember): Promise<void> {
    this.result.role = member.controlPlane ? 'server' : 'agent';
    if (!member.schedulable) this.result.stage = 'draining';
    this.begin();

    if (member.schedulable) {
      if (!this.options.dryRun) {
        await this.controlPlaneCall('cordon', (signal) => this.deps.controlPlane.cordon(this.name, signal));
      }
      this.record('cordon', 'marked unschedulable');
    }

    // A cordoned member may still run pods and membership does not report
    // them, so the drain is always repeated. Drain is a no-op on an empty node.
    await this.drain();
    this.result.stage = 'draining';

    if (!this.options.dryRun) {
      await this.controlPlaneCall('delete', (signal) => this.deps.controlPlane.delete(this.name, signal));
    }
    this.record('delete', 'removed from control plane');
    this.result.stage = 'deleted-from-cluster';
  }

  private async observeService(target: RemoteTarget, service: string): Promise<ServiceState> {
    try {
      return await withTimeout(`service state ${this.name}`, this.options.timeouts.remoteMs, (signal) =>
        this.deps.remote.serviceState(target, service, signal)
      );
    } catch {
      return 'unreachable';
    }
  }

  /** deleted-from-cluster → service-stopped */
  private async stopServices(member: ClusterMember | undefined): Promise<void> {
    const { profile } = this.options;
    const target: RemoteTarget = {
      nodeName: this.name,
      host:     member?.address ?? `${this.name}.${this.options.domain}`,
    };
    const services =
      this.result.role === 'server' ? [profile.serverService] :
      this.result.role === 'agent'  ? [profile.agentService] :
      [profile.agentService, profile.serverService];

    for (const service of services) {
      const state = await this.observeService(target, service);
      if (state === 'inactive') continue;
      if (state === 'unreachable') {
        this.addWarning({ kind: 'HostUnreachableWarning', message: `${target.host} unreachable; ${service} not stopped (node may be powered off)` });
        return;
      }

      this.begin();
      if (!this.options.dryRun) {
        let outcome: 'stopped' | 'unreachable';
        try {
          outcome = await withTimeout(`stop ${service} on ${this.name}`, this.options.timeouts.remoteMs, (signal) =>
            this.deps.remote.stopService(target, { service, tokenPath: profile.tokenPath }, signal)
          );
        } catch (err) {
          this.addWarning({ kind: 'HostUnreachableWarning', message: `stopping ${service} on ${target.host} failed: ${errorMessage(err)}` });
          return;
        }
        if (outcome === 'unreachable') {
          this.addWarning({ kind: 'HostUnreachableWarning', message: `${target.host} unreachable while stopping ${service}` });
          return;
        }
      }
      this.record('stop-service', `${service} stopped and disabled on ${target.host}, ${profile.tokenPath} removed`);
    }
  }

  /** service-stopped → token-purged */
  private async purgeCredentials(): Promise<void> {
    if (!(await this.deps.credentials.has(this.name))) return;
    this.begin();
    if (!this.options.dryRun) await this.deps.credentials.purge(this.name);
    this.record('purge-credential', 'local join-credential material deleted');
  }

  async run(): Promise<NodeDecommissionResult> {
    try {
      const member = await this.observeMember();
      if (member) {
        await this.leaveControlPlane(member);
      } else {
        this.result.stage = 'deleted-from-cluster';
      }

      await this.stopServices(member);
      this.result.stage = 'service-stopped';

      await this.purgeCredentials();
      this.result.stage = 'token-purged';
      this.begin();
    } catch (err) {
      this.begin();
      this.result.status = 'error';
      this.result.error  = errorMessage(err);
      warn(`[Decommission] ${this.name}: stopped at ${this.result.stage}: ${this.result.error}`);
      return this.result;
    }

    this.result.status =
      this.options.dryRun && this.result.actions.length > 0 ? 'planned' :
      this.result.warnings.length > 0                       ? 'warning' :
      'ok';
    log(`[Decommission] ${this.name}: ${this.result.startStage} → ${this.result.stage} (${this.result.status})`);
    return this.result;
  }
}

// ── Batch ─────────────────────────────────────────────────────────────────────

/**
 * Decommission every candidate. Throws only for the server-removal guard;
 * per-node failures are reported on the node's result.
 */
export async function decommissionNodes(
  candidates: DecommissionCandidate[],
  members:    ClusterMember[],
  deps:       DecommissionDeps,
  options:    DecommissionOptions
): Promise<DecommissionReport> {
  assertServerRemovalAllowed(candidates, members, options.allowServerRemoval);

  if (candidates.length === 0) {
    log('[Decommission] Live membership matches the topology; nothing to decommission');
    return { dryRun: options.dryRun, results: [] };
  }

  const limit   = pLimit(Math.max(1, options.concurrency));
  const results = await Promise.all(
    candidates.map((candidate) => limit(() => new NodeRun(candidate, deps, options).run()))
  );
  return { dryRun: options.dryRun, results };
}
