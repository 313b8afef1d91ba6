/**
 * Reconciler configuration.
 *
 * Paths, commands and timeouts come from environment variables; run mode
 * comes from the command line.
 */

import { homedir } from 'node:os';
import path from 'node:path';

import type { ClusterProfile } from 'cluster-state';

// ── Profiles ──────────────────────────────────────────────────────────────────

/** Selected with --cleanup-<name> */
export const CLUSTER_PROFILES: Record<string, ClusterProfile> = {
  k3s: {
    name:          'k3s',
    serverService: 'k3s',
    agentService:  'k3s-agent',
    tokenPath:     '/etc/rancher/k3s/agent-token',
  },
  rke2: {
    name:          'rke2',
    serverService: 'rke2-server',
    agentService:  'rke2-agent',
    tokenPath:     '/etc/rancher/rke2/agent-token',
  },
};

// ── Types ─────────────────────────────────────────────────────────────────────

export interface Flags {
  dryRun:             boolean;
  skipDeploy:         boolean;
  /** Answer yes to every confirmation prompt */
  assumeYes:          boolean;
  allowServerRemoval: boolean;
  /** Decommission stale nodes using this profile */
  cleanup?:           ClusterProfile;
  help:               boolean;
}

export interface Config extends Flags {
  topologyPath:  string;
  artifactDir:   string;
  credentialDir: string;

  ssh: {
    keyPath: string;
    user:    string;
    port:    number;
  };

  kubectl:      string;
  kubeContext?: string;

  /** Argument templates; {node} is replaced with the node name */
  evaluateCommand: string;
  deployCommand:   string;

  timeouts: {
    controlPlaneMs: number;
    drainMs:        number;
    remoteMs:       number;
    verifyMs:       number;
    evaluateMs:     number;
    deployMs:       number;
  };

  /** Nodes decommissioned / evaluated in parallel */
  concurrency: number;
}

export class UsageError extends Error {
  readonly name = 'UsageError' as const;
}

export const USAGE = `Usage: cluster-reconcile [options]

Reconcile the generated node artifacts with the topology document, optionally
decommission nodes that left it, then evaluate and deploy every node.

Options:
  --dry-run                Show the plan; change nothing
  --cleanup-<profile>      Decommission stale nodes (profiles: ${Object.keys(CLUSTER_PROFILES).join(', ')})
  --skip-deploy            Stop after reconciling artifacts
  --yes                    Do not ask for confirmation
  --allow-server-removal   Permit removing the only control-plane node
  -h, --help               Show this help

Environment:
  TOPOLOGY_PATH            Topology document (default: cluster.yaml)
  ARTIFACT_DIR             Generated artifact tree (default: generated)
  CREDENTIAL_DIR           Cached join credentials (default: .credentials)
  SSH_KEY_PATH, SSH_USER, SSH_PORT
  KUBECTL, KUBE_CONTEXT
  EVALUATE_COMMAND, DEPLOY_COMMAND
  DRAIN_TIMEOUT_SEC, CONTROL_PLANE_TIMEOUT_MS, REMOTE_TIMEOUT_MS,
  VERIFY_TIMEOUT_MS, EVALUATE_TIMEOUT_MS, DEPLOY_TIMEOUT_MS
  NODE_CONCURRENCY
  LOG_LEVEL                debug | info | warn | error | silent
`;

// ── Parsing ───────────────────────────────────────────────────────────────────

export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {
    dryRun:             false,
    skipDeploy:         false,
    assumeYes:          false,
    allowServerRemoval: false,
    help:               false,
  };

  for (const arg of argv) {
    switch (arg) {
      case '--dry-run':              flags.dryRun = true; break;
      case '--skip-deploy':          flags.skipDeploy = true; break;
      case '--yes':                  flags.assumeYes = true; break;
      case '--allow-server-removal': flags.allowServerRemoval = true; break;
      case '-h':
      case '--help':                 flags.help = true; break;
      default: {
        const cleanup = /^--cleanup-([a-z0-9]+)$/.exec(arg);
        if (!cleanup) throw new UsageError(`Unknown option: ${arg}`);
        const profile = CLUSTER_PROFILES[cleanup[1]];
        if (!profile) throw new UsageError(`Unknown cluster profile "${cleanup[1]}" in ${arg}`);
        if (flags.cleanup && flags.cleanup.name !== profile.name) {
          throw new UsageError(`Conflicting cleanup profiles: --cleanup-${flags.cleanup.name} and ${arg}`);
        }
        flags.cleanup = profile;
      }
    }
  }

  return flags;
}

export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env:  NodeJS.ProcessEnv = process.env
): Config {
  const drainSeconds = int(env, 'DRAIN_TIMEOUT_SEC', 120);

  return {
    ...parseFlags(argv),

    topologyPath:  env.TOPOLOGY_PATH  ?? 'cluster.yaml',
    artifactDir:   env.ARTIFACT_DIR   ?? 'generated',
    credentialDir: env.CREDENTIAL_DIR ?? '.credentials',

    ssh: {
      keyPath: env.SSH_KEY_PATH ?? path.join(homedir(), '.ssh', 'id_ed25519'),
      user:    env.SSH_USER ?? 'root',
      port:    int(env, 'SSH_PORT', 22),
    },

    kubectl:     env.KUBECTL ?? 'kubectl',
    kubeContext: env.KUBE_CONTEXT || undefined,

    evaluateCommand: env.EVALUATE_COMMAND ?? 'nix eval .#nixosConfigurations.{node}.config.system.build.toplevel.drvPath',
    deployCommand:   env.DEPLOY_COMMAND   ?? 'deploy --remote-build .#{node}',

    timeouts: {
      controlPlaneMs: int(env, 'CONTROL_PLANE_TIMEOUT_MS', 30_000),
      drainMs:        drainSeconds * 1000,
      remoteMs:       int(env, 'REMOTE_TIMEOUT_MS', 15_000),
      verifyMs:       int(env, 'VERIFY_TIMEOUT_MS', 5_000),
      evaluateMs:     int(env, 'EVALUATE_TIMEOUT_MS', 300_000),
      deployMs:       int(env, 'DEPLOY_TIMEOUT_MS', 1_800_000),
    },

    concurrency: int(env, 'NODE_CONCURRENCY', 4),
  };
}

function int(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const val = env[name];
  if (!val) return fallback;
  const parsed = Number(val);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new UsageError(`${name} must be a positive integer, got "${val}"`);
  }
  return parsed;
}
