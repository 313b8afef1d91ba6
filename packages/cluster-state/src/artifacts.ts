/**
 * Artifact reconciler.
 *
 * Diffs the declared node set against the artifacts already materialized:
 *   toCreate = target − existing
 *   toUpdate = target ∩ existing
 *   toDelete = existing − target
 * then swaps in the complete next tree when anything differs.
 */

import type { ArtifactDiff, ArtifactStore, ClusterSpec, GeneratedArtifact } from './types.js';
import { byName, renderDescriptor, renderNodeArtifact } from './render.js';
import { log } from './logger.js';

export interface ArtifactPlan {
  toCreate: string[];
  toUpdate: string[];
  toDelete: string[];
}

export interface ArtifactReconcileResult {
  diff:    ArtifactDiff;
  /** True when anything differs from what is on disk */
  changed: boolean;
  /** True when the new tree was written */
  applied: boolean;
}

export interface ReconcileArtifactsOptions {
  /** false computes the diff without writing (dry-run) */
  apply: boolean;
}

export function planArtifacts(target: Iterable<string>, existing: Iterable<string>): ArtifactPlan {
  const targetSet   = new Set(target);
  const existingSet = new Set(existing);
  return {
    toCreate: [...targetSet].filter((n) => !existingSet.has(n)).sort(),
    toUpdate: [...targetSet].filter((n) => existingSet.has(n)).sort(),
    toDelete: [...existingSet].filter((n) => !targetSet.has(n)).sort(),
  };
}

export function renderArtifacts(spec: ClusterSpec): GeneratedArtifact[] {
  return [...spec.nodes].sort(byName).map((node) => ({
    nodeName: node.name,
    content:  renderNodeArtifact(spec, node),
  }));
}

export async function reconcileArtifacts(
  spec:    ClusterSpec,
  store:   ArtifactStore,
  options: ReconcileArtifactsOptions = { apply: true }
): Promise<ArtifactReconcileResult> {
  const existing  = await store.list();
  const artifacts = renderArtifacts(spec);
  const plan      = planArtifacts(artifacts.map((a) => a.nodeName), existing);

  const updated:   string[] = [];
  const unchanged: string[] = [];
  for (const artifact of artifacts) {
    if (!plan.toUpdate.includes(artifact.nodeName)) continue;
    const current = await store.read(artifact.nodeName);
    (current === artifact.content ? unchanged : updated).push(artifact.nodeName);
  }

  const descriptor        = renderDescriptor(spec);
  const descriptorChanged = (await store.readDescriptor()) !== descriptor;

  const diff: ArtifactDiff = {
    created: plan.toCreate,
    updated,
    unchanged,
    deleted: plan.toDelete,
    descriptorChanged,
  };
  const changed = diff.created.length > 0 || diff.updated.length > 0 || diff.deleted.length > 0 || descriptorChanged;

  log(`[Artifacts] created=${diff.created.length} updated=${diff.updated.length} unchanged=${diff.unchanged.length} deleted=${diff.deleted.length} descriptor=${descriptorChanged ? 'changed' : 'unchanged'}`);

  if (!changed) {
    return { diff, changed, applied: false };
  }
  if (!options.apply) {
    log('[Artifacts] Dry run: tree not written');
    return { diff, changed, applied: false };
  }

  await store.replaceAll({ artifacts, descriptor });
  for (const name of diff.deleted) log(`[Artifacts] Removed artifact for undeclared node ${name}`);
  return { diff, changed, applied: true };
}
