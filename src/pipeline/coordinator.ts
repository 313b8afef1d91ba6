/**
 * Deployment pipeline.
 *
 *   LOADING → RECONCILING → INSPECTING → DECOMMISSIONING → EVALUATING →
 *   AWAITING_CONFIRMATION → DEPLOYING → VERIFYING → DONE
 *
 * with ABORTED (operator declined) and FAILED as the other terminal phases.
 * Phases run strictly in order; only per-node work inside a phase runs in
 * parallel. A status row per node is printed whatever the outcome.
 */

import pLimit from 'p-limit';

import {
  BuildError,
  DeployError,
  assertServerRemovalAllowed,
  byName,
  decommissionNodes,
  errorMessage,
  findDecommissionCandidates,
  inspectMembership,
  loadTopology,
  log,
  logError,
  reconcileArtifacts,
  serverNode,
  warn,
  withTimeout,
  type ArtifactDiff,
  type ArtifactStore,
  type ClusterProfile,
  type ClusterSpec,
  type ControlPlaneClient,
  type CredentialStore,
  type DeployExecutor,
  type EvaluationResult,
  type EvaluatorClient,
  type FailedNode,
  type NodeDeployResult,
  type RemoteShellClient,
} from 'cluster-state';

import { ReconcileContext, type ExitCode, type Phase, type StatusRow } from './context.js';
import type { Confirmer } from './confirm.js';
import { renderCleanupPlan, renderPlan, renderStatusTable } from './plan.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PipelineOptions {
  topologyPath:       string;
  dryRun:             boolean;
  skipDeploy:         boolean;
  cleanup?:           ClusterProfile;
  allowServerRemoval: boolean;
  concurrency:        number;
  timeouts: {
    controlPlaneMs: number;
    drainMs:        number;
    remoteMs:       number;
    verifyMs:       number;
    evaluateMs:     number;
    deployMs:       number;
  };
}

export interface PipelineDeps {
  store:        ArtifactStore;
  controlPlane: ControlPlaneClient;
  remote:       RemoteShellClient;
  credentials:  CredentialStore;
  evaluator:    EvaluatorClient;
  deployer:     DeployExecutor;
  confirmer:    Confirmer;
  /** Operator-facing output (plan, status table); defaults to console.log */
  print?:       (text: string) => void;
  loadSpec?:    (path: string) => Promise<ClusterSpec>;
}

type Terminal = Extract<Phase, 'DONE' | 'ABORTED' | 'FAILED'>;

interface Outcome {
  phase:    Terminal;
  exitCode: ExitCode;
  error?:   string;
}

export interface PipelineResult extends Outcome {
  rows: StatusRow[];
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function describeFailure(err: unknown): string {
  if (err instanceof BuildError || err instanceof DeployError) {
    return [`${err.name}: ${err.message}`, ...err.failures.map((f) => `  ${f.nodeName}: ${f.detail}`)].join('\n');
  }
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

function artifactDetail(diff: ArtifactDiff, name: string, dryRun: boolean): { changed: boolean; detail: string } {
  const verb =
    diff.created.includes(name) ? 'created' :
    diff.updated.includes(name) ? 'updated' :
    diff.deleted.includes(name) ? 'removed' :
    'unchanged';
  const changed = verb !== 'unchanged';
  return { changed, detail: `artifact ${verb}${dryRun && changed ? ' (not written)' : ''}` };
}

// ── Phases ────────────────────────────────────────────────────────────────────

class Pipeline {
  private readonly ctx:   ReconcileContext;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly print: (text: string) => void;

  constructor(
    private readonly options: PipelineOptions,
    private readonly deps:    PipelineDeps
  ) {
    this.ctx   = new ReconcileContext(deps.store);
    this.limit = pLimit(Math.max(1, options.concurrency));
    this.print = deps.print ?? ((text) => console.log(text));
  }

  async run(): Promise<PipelineResult> {
    let outcome: Outcome;
    try {
      outcome = await this.execute();
    } catch (err) {
      outcome = { phase: 'FAILED', exitCode: 1, error: describeFailure(err) };
    }

    const failedIn = this.ctx.phase;
    this.ctx.enter(outcome.phase);
    this.print(renderStatusTable(this.ctx.statusRows));

    if (outcome.phase === 'FAILED') {
      logError(`[Pipeline] Failed during ${failedIn}: ${outcome.error ?? 'unknown error'}`);
    } else if (outcome.error) {
      warn(`[Pipeline] ${outcome.error}`);
    }
    log(`[Pipeline] Finished ${outcome.phase} (exit ${outcome.exitCode})`);
    return { ...outcome, rows: this.ctx.statusRows };
  }

  private async execute(): Promise<Outcome> {
    const { options, ctx } = this;

    ctx.enter('LOADING');
    const spec = await (this.deps.loadSpec ?? loadTopology)(options.topologyPath);
    ctx.spec = spec;
    const targets = [...spec.nodes].sort(byName).map((n) => n.name);
    log(`[Pipeline] ${spec.domain}: ${targets.length} node(s), server ${serverNode(spec).name}`);

    ctx.enter('RECONCILING');
    const { diff } = await reconcileArtifacts(spec, ctx.store, { apply: !options.dryRun });
    for (const name of [...targets, ...diff.deleted]) {
      const { changed, detail } = artifactDetail(diff, name, options.dryRun);
      ctx.report(name, options.dryRun && changed ? 'planned' : 'ok', detail);
    }
    if (options.skipDeploy) {
      log('[Pipeline] --skip-deploy: stopping after artifact reconciliation');
      return { phase: 'DONE', exitCode: 0 };
    }

    if (options.cleanup) {
      const stopped = await this.cleanup(spec, targets, options.cleanup);
      if (stopped) return stopped;
    }

    await this.evaluate(targets);

    this.print(renderPlan(spec, diff, options.dryRun));
    if (options.dryRun) {
      for (const name of targets) ctx.report(name, 'planned', 'would deploy');
      return { phase: 'DONE', exitCode: 0 };
    }

    ctx.enter('AWAITING_CONFIRMATION');
    if (!(await this.deps.confirmer.confirm(`Deploy ${targets.length} node(s): ${targets.join(', ')}?`))) {
      for (const name of targets) ctx.report(name, 'skipped', 'deploy declined');
      return { phase: 'ABORTED', exitCode: 1, error: 'Deploy declined by operator' };
    }

    await this.deploy(targets);
    return this.verify(spec);
  }

  /** INSPECTING → DECOMMISSIONING. Returns an outcome when the run must stop. */
  private async cleanup(spec: ClusterSpec, targets: string[], profile: ClusterProfile): Promise<Outcome | undefined> {
    const { options, ctx, deps } = this;

    ctx.enter('INSPECTING');
    const inspection = await inspectMembership(deps.controlPlane, targets, { timeoutMs: options.timeouts.controlPlaneMs });
    const candidates = await findDecommissionCandidates(inspection, targets, deps.credentials);
    if (candidates.length === 0) {
      log('[Pipeline] No stale nodes to decommission');
      return undefined;
    }

    assertServerRemovalAllowed(candidates, inspection.members, options.allowServerRemoval);
    this.print(renderCleanupPlan(candidates, inspection.members, profile));

    ctx.enter('DECOMMISSIONING');
    const names = candidates.map((c) => c.nodeName);
    if (!options.dryRun && !(await deps.confirmer.confirm(`Decommission ${names.join(', ')}?`))) {
      for (const name of names) ctx.report(name, 'skipped', 'decommission declined');
      return { phase: 'ABORTED', exitCode: 1, error: 'Decommission declined by operator' };
    }

    const report = await decommissionNodes(candidates, inspection.members, deps, {
      domain:             spec.domain,
      profile,
      timeouts:           {
        controlPlaneMs: options.timeouts.controlPlaneMs,
        drainMs:        options.timeouts.drainMs,
        remoteMs:       options.timeouts.remoteMs,
      },
      concurrency:        options.concurrency,
      dryRun:             options.dryRun,
      allowServerRemoval: options.allowServerRemoval,
    });

    for (const result of report.results) {
      const detail = result.error ?? [
        `${result.startStage} → ${result.stage}`,
        ...result.warnings.map((w) => `${w.kind}: ${w.message}`),
      ].join('; ');
      ctx.report(result.nodeName, result.status, detail);
    }

    const failed = report.results.filter((r) => r.status === 'error').map((r) => r.nodeName);
    if (failed.length > 0) {
      return { phase: 'FAILED', exitCode: 1, error: `Decommission failed for ${failed.join(', ')}; deploy not attempted` };
    }
    return undefined;
  }

  private async evaluate(targets: string[]): Promise<void> {
    const { ctx, deps, options } = this;
    ctx.enter('EVALUATING');

    const results = await Promise.all(
      targets.map((name) =>
        this.limit(async (): Promise<EvaluationResult> => {
          try {
            return await withTimeout(`evaluate ${name}`, options.timeouts.evaluateMs, (signal) => deps.evaluator.evaluate(name, signal));
          } catch (err) {
            return { nodeName: name, ok: false, detail: errorMessage(err) };
          }
        })
      )
    );

    const failures: FailedNode[] = [];
    for (const result of results) {
      ctx.report(result.nodeName, result.ok ? 'ok' : 'error', result.ok ? `evaluated ${result.detail}`.trim() : result.detail);
      if (!result.ok) failures.push({ nodeName: result.nodeName, detail: result.detail });
    }
    if (failures.length > 0) throw new BuildError(failures);
  }

  private async deploy(targets: string[]): Promise<void> {
    const { ctx, deps, options } = this;
    ctx.enter('DEPLOYING');

    let results: NodeDeployResult[];
    try {
      results = await withTimeout('deploy', options.timeouts.deployMs * targets.length, (signal) =>
        deps.deployer.deploy(targets, signal)
      );
    } catch (err) {
      // The executor may have activated some nodes before failing
      const detail = `deploy outcome unknown: ${errorMessage(err)}`;
      for (const name of targets) ctx.report(name, 'error', detail);
      throw new DeployError(targets.map((nodeName) => ({ nodeName, detail })), { cause: err });
    }
    const byNode = new Map(results.map((r) => [r.nodeName, r]));

    const failures: FailedNode[] = [];
    for (const name of targets) {
      const result = byNode.get(name);
      const detail = result?.detail ?? 'no result from deploy executor';
      ctx.report(name, result?.ok ? 'ok' : 'error', detail);
      if (!result?.ok) failures.push({ nodeName: name, detail });
    }
    if (failures.length > 0) throw new DeployError(failures);
  }

  private async verify(spec: ClusterSpec): Promise<Outcome> {
    const { ctx, deps, options } = this;
    ctx.enter('VERIFYING');

    const checks = await Promise.all(
      [...spec.nodes].sort(byName).map((node) =>
        this.limit(async () => {
          const target = { nodeName: node.name, host: node.ip };
          try {
            const reachable = await withTimeout(`verify ${node.name}`, options.timeouts.verifyMs, (signal) => deps.remote.ping(target, signal));
            return { node, reachable, reason: reachable ? '' : 'ssh check failed' };
          } catch (err) {
            return { node, reachable: false, reason: errorMessage(err) };
          }
        })
      )
    );

    const degraded: string[] = [];
    for (const { node, reachable, reason } of checks) {
      if (reachable) {
        ctx.report(node.name, 'ok', 'deployed, reachable');
        continue;
      }
      degraded.push(node.name);
      ctx.report(node.name, 'warning', `VerificationWarning: ${node.ip} not reachable after deploy (${reason})`);
    }

    if (degraded.length > 0) {
      return { phase: 'DONE', exitCode: 2, error: `Deployed, but verification degraded for ${degraded.join(', ')}` };
    }
    return { phase: 'DONE', exitCode: 0 };
  }
}

export function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineResult> {
  return new Pipeline(options, deps).run();
}
