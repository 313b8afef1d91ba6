/**
 * Decommission orchestration tests
 *
 * Every scenario runs against the in-process fakes in ./fakes.ts, which record
 * each call so the tests can assert exactly which nodes were touched.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';

import { assertServerRemovalAllowed, decommissionNodes } from '../src/decommission.js';
import { findDecommissionCandidates, inspectMembership } from '../src/membership.js';
import { PreconditionError } from '../src/errors.js';
import {
  FakeControlPlane,
  FakeCredentialStore,
  FakeRemoteShell,
  decommissionOptions,
  member,
} from './fakes.js';

process.env.LOG_LEVEL = 'silent';

const DESIRED = ['n1', 'n2'];

let controlPlane: FakeControlPlane;
let remote:       FakeRemoteShell;
let credentials:  FakeCredentialStore;

function deps() {
  return { controlPlane, remote, credentials };
}

async function candidatesFor(target: string[]) {
  const inspection = await inspectMembership(controlPlane, target, { timeoutMs: 1_000 });
  return { inspection, candidates: await findDecommissionCandidates(inspection, target, credentials) };
}

function reset(): void {
  controlPlane = new FakeControlPlane([
    member('n1', { controlPlane: true, address: '10.0.0.1' }),
    member('n2', { address: '10.0.0.2' }),
    member('n3'),
  ]);
  remote      = new FakeRemoteShell().run('n3', 'k3s-agent');
  credentials = new FakeCredentialStore(['n1', 'n2', 'n3']);
}

// ── Full path ─────────────────────────────────────────────────────────────────

describe('decommissionNodes() removing a stale agent', () => {
  beforeEach(reset);

  it('drives the node through every stage in order', async () => {
    const { inspection, candidates } = await candidatesFor(DESIRED);
    assert.deepEqual(candidates, [{ nodeName: 'n3', origin: 'stale-member' }]);

    const report = await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions());
    assert.equal(report.dryRun, false);
    assert.equal(report.results.length, 1);

    const [n3] = report.results;
    assert.equal(n3.nodeName, 'n3');
    assert.equal(n3.role, 'agent');
    assert.equal(n3.startStage, 'pending');
    assert.equal(n3.stage, 'token-purged');
    assert.equal(n3.status, 'ok');
    assert.deepEqual(n3.warnings, []);
    assert.deepEqual(n3.actions.map((a) => a.kind), ['cordon', 'drain', 'delete', 'stop-service', 'purge-credential']);
    assert.ok(n3.actions.every((a) => a.performed));
  });

  it('never contacts declared nodes', async () => {
    const { inspection, candidates } = await candidatesFor(DESIRED);
    await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions());

    assert.deepEqual(controlPlane.mutatingCalls, [
      { op: 'cordon', name: 'n3' },
      { op: 'drain',  name: 'n3', force: false },
      { op: 'delete', name: 'n3' },
    ]);
    assert.deepEqual(remote.calls, [
      { op: 'state', nodeName: 'n3', host: 'n3.lab.test', service: 'k3s-agent' },
      { op: 'stop',  nodeName: 'n3', host: 'n3.lab.test', service: 'k3s-agent' },
    ]);
    assert.deepEqual(credentials.purged, ['n3']);
    assert.deepEqual([...controlPlane.members.keys()], ['n1', 'n2']);
  });

  it('uses the address reported by the control plane when there is one', async () => {
    controlPlane.members.set('n3', member('n3', { address: '10.0.0.3' }));
    const { inspection, candidates } = await candidatesFor(DESIRED);
    await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions());

    assert.equal(remote.calls[0].host, '10.0.0.3');
  });
});

// ── Resumability ──────────────────────────────────────────────────────────────

describe('decommissionNodes() resuming an interrupted run', () => {
  beforeEach(reset);

  it('picks up a node already deleted from the cluster and finishes it', async () => {
    controlPlane.members.delete('n3');

    const { inspection, candidates } = await candidatesFor(DESIRED);
    assert.deepEqual(candidates, [{ nodeName: 'n3', origin: 'residual-credential' }]);

    const report = await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions());
    const [n3] = report.results;

    assert.equal(n3.role, 'unknown');
    assert.equal(n3.startStage, 'deleted-from-cluster');
    assert.equal(n3.stage, 'token-purged');
    assert.equal(n3.status, 'ok');
    assert.deepEqual(n3.actions.map((a) => a.kind), ['stop-service', 'purge-credential']);
    assert.deepEqual(controlPlane.mutatingCalls, []);
  });

  it('checks both services when the role is unknown', async () => {
    controlPlane.members.delete('n3');
    const { inspection, candidates } = await candidatesFor(DESIRED);
    await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions());

    assert.deepEqual(
      remote.calls.filter((c) => c.op === 'state').map((c) => c.service),
      ['k3s-agent', 'k3s']
    );
  });

  it('starts at service-stopped when only the credentials remain', async () => {
    controlPlane.members.delete('n3');
    remote = new FakeRemoteShell();

    const { inspection, candidates } = await candidatesFor(DESIRED);
    const [n3] = (await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions())).results;

    assert.equal(n3.startStage, 'service-stopped');
    assert.deepEqual(n3.actions.map((a) => a.kind), ['purge-credential']);
    assert.deepEqual(remote.mutatingCalls, []);
  });

  it('finds nothing left to do on the next run', async () => {
    const first = await candidatesFor(DESIRED);
    await decommissionNodes(first.candidates, first.inspection.members, deps(), decommissionOptions());

    const second = await candidatesFor(DESIRED);
    assert.deepEqual(second.candidates, []);

    const report = await decommissionNodes(second.candidates, second.inspection.members, deps(), decommissionOptions());
    assert.deepEqual(report.results, []);
  });
});

// ── Dry run ───────────────────────────────────────────────────────────────────

describe('decommissionNodes() in dry-run', () => {
  beforeEach(reset);

  it('plans every action without issuing a mutating call', async () => {
    const { inspection, candidates } = await candidatesFor(DESIRED);
    const report = await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions({ dryRun: true }));

    assert.equal(report.dryRun, true);
    const [n3] = report.results;
    assert.equal(n3.status, 'planned');
    assert.deepEqual(n3.actions.map((a) => a.kind), ['cordon', 'drain', 'delete', 'stop-service', 'purge-credential']);
    assert.ok(n3.actions.every((a) => !a.performed));

    assert.deepEqual(controlPlane.mutatingCalls, []);
    assert.deepEqual(remote.mutatingCalls, []);
    assert.deepEqual(credentials.purged, []);
    assert.deepEqual([...controlPlane.members.keys()], ['n1', 'n2', 'n3']);
  });
});

// ── Server guard ──────────────────────────────────────────────────────────────

describe('sole control-plane guard', () => {
  beforeEach(() => {
    controlPlane = new FakeControlPlane([
      member('n1', { controlPlane: true }),
      member('n2'),
    ]);
    remote      = new FakeRemoteShell().run('n1', 'k3s');
    credentials = new FakeCredentialStore();
  });

  it('refuses to remove the only server before touching anything', async () => {
    const members = [...controlPlane.members.values()];
    await assert.rejects(
      decommissionNodes([{ nodeName: 'n1', origin: 'stale-member' }], members, deps(), decommissionOptions()),
      PreconditionError
    );
    assert.deepEqual(controlPlane.calls, []);
    assert.deepEqual(remote.calls, []);
  });

  it('refuses in dry-run as well', async () => {
    const members = [...controlPlane.members.values()];
    await assert.rejects(
      decommissionNodes([{ nodeName: 'n1', origin: 'stale-member' }], members, deps(), decommissionOptions({ dryRun: true })),
      PreconditionError
    );
  });

  it('proceeds under the explicit override and stops the server service', async () => {
    const members = [...controlPlane.members.values()];
    const report  = await decommissionNodes(
      [{ nodeName: 'n1', origin: 'stale-member' }],
      members,
      deps(),
      decommissionOptions({ allowServerRemoval: true })
    );

    const [n1] = report.results;
    assert.equal(n1.role, 'server');
    assert.equal(n1.status, 'ok');
    assert.deepEqual(n1.actions.map((a) => a.kind), ['cordon', 'drain', 'delete', 'stop-service']);
    assert.deepEqual(remote.mutatingCalls.map((c) => c.service), ['k3s']);
  });

  it('allows removing a server while another control-plane member survives', () => {
    const members = [member('n1', { controlPlane: true }), member('n4', { controlPlane: true })];
    assert.doesNotThrow(() =>
      assertServerRemovalAllowed([{ nodeName: 'n1', origin: 'stale-member' }], members, false)
    );
  });
});

// ── Soft failures ─────────────────────────────────────────────────────────────

describe('decommissionNodes() soft failures', () => {
  beforeEach(() => {
    reset();
    remote      = new FakeRemoteShell();
    credentials = new FakeCredentialStore();
  });

  it('forces eviction when the drain does not finish in time', async () => {
    controlPlane.drainOutcome = (_name, force) => (force ? 'drained' : 'timeout');
    const { inspection, candidates } = await candidatesFor(DESIRED);
    const [n3] = (await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions())).results;

    assert.equal(n3.status, 'warning');
    assert.equal(n3.stage, 'token-purged');
    assert.deepEqual(n3.warnings.map((w) => w.kind), ['DrainTimeoutWarning']);
    assert.deepEqual(n3.actions.map((a) => a.kind), ['cordon', 'drain', 'force-drain', 'delete']);
    assert.deepEqual(
      controlPlane.calls.filter((c) => c.op === 'drain').map((c) => c.force),
      [false, true]
    );
  });

  it('gives up on a hanging drain after the deadline and still removes the node', async () => {
    controlPlane.drainOutcome = () => 'hang';
    const { inspection, candidates } = await candidatesFor(DESIRED);
    const options = decommissionOptions({ timeouts: { controlPlaneMs: 20, drainMs: 20, remoteMs: 20 } });
    const [n3] = (await decommissionNodes(candidates, inspection.members, deps(), options)).results;

    assert.equal(n3.status, 'warning');
    assert.deepEqual(n3.warnings.map((w) => w.kind), ['DrainTimeoutWarning', 'DrainTimeoutWarning']);
    assert.ok(n3.actions.some((a) => a.kind === 'delete'));
    assert.equal(controlPlane.members.has('n3'), false);
  });

  it('warns about an unreachable host and still purges local credentials', async () => {
    remote.unreachable.add('n3');
    credentials = new FakeCredentialStore(['n3']);
    const { inspection, candidates } = await candidatesFor(DESIRED);
    const [n3] = (await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions())).results;

    assert.equal(n3.status, 'warning');
    assert.equal(n3.stage, 'token-purged');
    assert.deepEqual(n3.warnings.map((w) => w.kind), ['HostUnreachableWarning']);
    assert.deepEqual(n3.actions.map((a) => a.kind), ['cordon', 'drain', 'delete', 'purge-credential']);
    assert.deepEqual(credentials.purged, ['n3']);
  });

  it('skips cordoning an unschedulable node but still drains it', async () => {
    controlPlane.members.set('n3', member('n3', { schedulable: false }));
    const { inspection, candidates } = await candidatesFor(DESIRED);
    const [n3] = (await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions())).results;

    assert.equal(n3.startStage, 'draining');
    assert.deepEqual(n3.actions.map((a) => a.kind), ['drain', 'delete']);
    assert.equal(controlPlane.calls.some((c) => c.op === 'cordon'), false);
  });
});

// ── Isolation ─────────────────────────────────────────────────────────────────

describe('decommissionNodes() per-node failures', () => {
  beforeEach(() => {
    reset();
    controlPlane.members.set('n4', member('n4'));
    remote      = new FakeRemoteShell();
    credentials = new FakeCredentialStore();
  });

  it('records one node failure without stopping the others', async () => {
    controlPlane.failOn.add('delete:n3');
    const { inspection, candidates } = await candidatesFor(DESIRED);
    assert.deepEqual(candidates.map((c) => c.nodeName), ['n3', 'n4']);

    const [n3, n4] = (await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions())).results;

    assert.equal(n3.status, 'error');
    assert.equal(n3.stage, 'draining');
    assert.equal(n3.error, 'control-plane: delete n3: connection refused');
    assert.equal(n4.status, 'ok');
    assert.equal(n4.stage, 'token-purged');
    assert.equal(controlPlane.members.has('n3'), true);
    assert.equal(controlPlane.members.has('n4'), false);
  });

  it('reports an unreachable control plane as an error, not as an absent node', async () => {
    const { inspection, candidates } = await candidatesFor(DESIRED);
    controlPlane.listMode = 'fail';

    const results = (await decommissionNodes(candidates, inspection.members, deps(), decommissionOptions())).results;
    for (const result of results) {
      assert.equal(result.status, 'error');
      assert.equal(result.stage, 'pending');
      assert.match(result.error ?? '', /observe failed: dial tcp/);
    }
    assert.deepEqual(remote.calls, []);
  });
});
