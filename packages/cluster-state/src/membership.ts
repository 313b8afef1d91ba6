/**
 * Cluster membership inspection (read-only).
 *
 * A control plane that cannot be queried raises ConnectivityError. It is
 * never read as an empty cluster, which would make every node look stale.
 */

import type { ClusterMember, ControlPlaneClient, CredentialStore } from './types.js';
import { ConnectivityError, errorMessage } from './errors.js';
import { withTimeout } from './timeout.js';
import { byName } from './render.js';
import { log } from './logger.js';

export interface MembershipInspection {
  members: ClusterMember[];
  /** Registered in the live cluster but absent from the desired topology */
  stale:   ClusterMember[];
}

export async function inspectMembership(
  controlPlane: ControlPlaneClient,
  target:       Iterable<string>,
  options:      { timeoutMs: number }
): Promise<MembershipInspection> {
  let members: ClusterMember[];
  try {
    members = await withTimeout('control-plane list', options.timeoutMs, (signal) => controlPlane.list(signal));
  } catch (err) {
    if (err instanceof ConnectivityError) throw err;
    throw new ConnectivityError('control-plane', `membership query failed: ${errorMessage(err)}`, { cause: err });
  }

  const declared = new Set(target);
  const stale    = members.filter((m) => !declared.has(m.name)).sort(byName);

  log(`[Membership] live=${members.map((m) => m.name).sort().join(',') || '(none)'} stale=${stale.map((m) => m.name).join(',') || '(none)'}`);
  return { members, stale };
}

// ── Decommission candidates ───────────────────────────────────────────────────

export type CandidateOrigin = 'stale-member' | 'residual-credential';

export interface DecommissionCandidate {
  nodeName: string;
  origin:   CandidateOrigin;
}

/**
 * Stale members, plus undeclared nodes that already left the control plane
 * but still have cached credential material. The latter are decommissions
 * interrupted after deletion; a node that never joined has no material.
 */
export async function findDecommissionCandidates(
  inspection:  MembershipInspection,
  target:      Iterable<string>,
  credentials: CredentialStore
): Promise<DecommissionCandidate[]> {
  const declared = new Set(target);
  const live     = new Set(inspection.members.map((m) => m.name));

  const candidates: DecommissionCandidate[] = inspection.stale.map((m) => ({
    nodeName: m.name,
    origin:   'stale-member',
  }));

  for (const name of await credentials.list()) {
    if (declared.has(name) || live.has(name)) continue;
    log(`[Membership] ${name} left the control plane but still holds credential material; resuming its decommission`);
    candidates.push({ nodeName: name, origin: 'residual-credential' });
  }

  return candidates.sort((a, b) => (a.nodeName < b.nodeName ? -1 : a.nodeName > b.nodeName ? 1 : 0));
}
