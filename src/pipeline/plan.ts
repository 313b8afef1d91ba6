/**
 * Operator-facing text: deployment plan, cleanup plan and status table.
 * Pure functions; the coordinator decides where the text goes.
 */

import type {
  ArtifactDiff,
  ClusterMember,
  ClusterProfile,
  ClusterSpec,
  DecommissionCandidate,
} from 'cluster-state';
import { byName, fqdn, joinUrl } from 'cluster-state';

import type { StatusRow } from './context.js';

/** Left-aligned columns separated by two spaces, no trailing whitespace */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const line   = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
  return [line(headers), ...rows.map(line)].join('\n');
}

function artifactChange(diff: ArtifactDiff, name: string): string {
  if (diff.created.includes(name)) return 'create';
  if (diff.updated.includes(name)) return 'update';
  return 'unchanged';
}

// ── Deployment plan ───────────────────────────────────────────────────────────

export function renderPlan(spec: ClusterSpec, diff: ArtifactDiff, dryRun: boolean): string {
  const nodes = [...spec.nodes].sort(byName);
  const table = formatTable(
    ['NODE', 'ROLE', 'ADDRESS', 'FQDN', 'ARTIFACT', 'DESCRIPTION'],
    nodes.map((n) => [n.name, n.role, n.ip, fqdn(n, spec.domain), artifactChange(diff, n.name), n.description])
  );

  const lines = [
    `${dryRun ? 'Dry run: deployment plan' : 'Deployment plan'} for ${spec.domain} (join ${joinUrl(spec)})`,
    '',
    table,
    '',
  ];
  if (diff.deleted.length > 0) lines.push(`Artifacts removed: ${diff.deleted.join(', ')}`);
  lines.push(`Deploy targets: ${nodes.map((n) => n.name).join(', ')}`);
  return lines.join('\n');
}

// ── Cleanup plan ──────────────────────────────────────────────────────────────

export function renderCleanupPlan(
  candidates: DecommissionCandidate[],
  members:    ClusterMember[],
  profile:    ClusterProfile
): string {
  const byMember = new Map(members.map((m) => [m.name, m]));
  const rows = candidates.map((c) => {
    const m = byMember.get(c.nodeName);
    const role = m ? (m.controlPlane ? 'server' : 'agent') : 'unknown';
    return [c.nodeName, c.origin, role, m?.address ?? '-'];
  });

  return [
    `Cleanup plan (${profile.name}): ${candidates.length} node(s) to decommission`,
    '',
    formatTable(['NODE', 'ORIGIN', 'ROLE', 'ADDRESS'], rows),
    '',
    `Each node: cordon, drain, delete from cluster, stop ${profile.agentService}/${profile.serverService}, purge credentials`,
  ].join('\n');
}

// ── Status table ──────────────────────────────────────────────────────────────

export function renderStatusTable(rows: StatusRow[]): string {
  if (rows.length === 0) return 'No nodes processed';
  return formatTable(
    ['NODE', 'PHASE', 'STATUS', 'DETAIL'],
    [...rows].sort((a, b) => (a.node < b.node ? -1 : a.node > b.node ? 1 : 0)).map((r) => [r.node, r.phase, r.status, r.detail])
  );
}
