/**
 * Membership inspection and credential cache tests
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { findDecommissionCandidates, inspectMembership } from '../src/membership.js';
import { FileCredentialStore } from '../src/credentials.js';
import { ConnectivityError } from '../src/errors.js';
import { FakeControlPlane, FakeCredentialStore, member } from './fakes.js';

process.env.LOG_LEVEL = 'silent';

// ── inspectMembership ─────────────────────────────────────────────────────────

describe('inspectMembership()', () => {
  it('returns live members not in the desired topology, sorted', async () => {
    const controlPlane = new FakeControlPlane([member('n5'), member('n1', { controlPlane: true }), member('n3')]);
    const inspection   = await inspectMembership(controlPlane, ['n1', 'n2'], { timeoutMs: 1_000 });

    assert.deepEqual(inspection.members.map((m) => m.name), ['n5', 'n1', 'n3']);
    assert.deepEqual(inspection.stale.map((m) => m.name), ['n3', 'n5']);
    assert.deepEqual(controlPlane.mutatingCalls, []);
  });

  it('reports nothing stale when membership matches', async () => {
    const controlPlane = new FakeControlPlane([member('n1', { controlPlane: true }), member('n2')]);
    const inspection   = await inspectMembership(controlPlane, ['n1', 'n2'], { timeoutMs: 1_000 });
    assert.deepEqual(inspection.stale, []);
  });

  it('raises ConnectivityError instead of returning an empty cluster', async () => {
    const controlPlane = new FakeControlPlane([member('n1')]);
    controlPlane.listMode = 'fail';

    await assert.rejects(inspectMembership(controlPlane, ['n1'], { timeoutMs: 1_000 }), (err: unknown) => {
      assert.ok(err instanceof ConnectivityError);
      assert.equal(err.target, 'control-plane');
      assert.equal(err.message, 'control-plane: membership query failed: dial tcp 10.0.0.1:6443: connect: connection refused');
      return true;
    });
  });

  it('raises ConnectivityError when the query does not answer in time', async () => {
    const controlPlane = new FakeControlPlane();
    controlPlane.listMode = 'hang';

    await assert.rejects(inspectMembership(controlPlane, [], { timeoutMs: 20 }), (err: unknown) => {
      assert.ok(err instanceof ConnectivityError);
      assert.equal(err.message, 'control-plane: membership query failed: control-plane list timed out after 20ms');
      return true;
    });
  });
});

// ── findDecommissionCandidates ────────────────────────────────────────────────

describe('findDecommissionCandidates()', () => {
  it('adds undeclared nodes that left the cluster but kept credentials', async () => {
    const controlPlane = new FakeControlPlane([member('n1', { controlPlane: true }), member('n4')]);
    const inspection   = await inspectMembership(controlPlane, ['n1', 'n2'], { timeoutMs: 1_000 });
    const credentials  = new FakeCredentialStore(['n1', 'n2', 'n3', 'n4']);

    assert.deepEqual(await findDecommissionCandidates(inspection, ['n1', 'n2'], credentials), [
      { nodeName: 'n3', origin: 'residual-credential' },
      { nodeName: 'n4', origin: 'stale-member' },
    ]);
  });

  it('ignores declared nodes that have not joined yet', async () => {
    const controlPlane = new FakeControlPlane([member('n1', { controlPlane: true })]);
    const inspection   = await inspectMembership(controlPlane, ['n1', 'n2'], { timeoutMs: 1_000 });

    assert.deepEqual(await findDecommissionCandidates(inspection, ['n1', 'n2'], new FakeCredentialStore(['n2'])), []);
  });
});

// ── FileCredentialStore ───────────────────────────────────────────────────────

describe('FileCredentialStore', () => {
  let root = '';

  before(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'cluster-state-credentials-'));
    await mkdir(path.join(root, 'n1'));
    await mkdir(path.join(root, 'n3'));
    await writeFile(path.join(root, 'n3', 'agent-token'), 'test-secret', 'utf8');
    await mkdir(path.join(root, 'Not_A_Node'));
    await writeFile(path.join(root, 'README'), 'placeholder', 'utf8');
  });

  after(async () => {
    if (root) await rm(root, { recursive: true, force: true });
  });

  it('lists node directories only', async () => {
    assert.deepEqual(await new FileCredentialStore(root).list(), ['n1', 'n3']);
  });

  it('purges a node directory and its contents', async () => {
    const store = new FileCredentialStore(root);
    assert.equal(await store.has('n3'), true);
    await store.purge('n3');
    assert.equal(await store.has('n3'), false);
    assert.deepEqual(await store.list(), ['n1']);
  });

  it('treats purging an absent node as done', async () => {
    const store = new FileCredentialStore(root);
    await store.purge('n9');
    assert.equal(await store.has('n9'), false);
  });

  it('refuses names that would escape the store', async () => {
    await assert.rejects(new FileCredentialStore(root).purge('../n1'), /Refusing credential path/);
  });

  it('returns an empty list when the store does not exist yet', async () => {
    assert.deepEqual(await new FileCredentialStore(path.join(root, 'missing')).list(), []);
  });
});
