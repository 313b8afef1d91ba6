/**
 * Artifact rendering.
 *
 * Pure functions of (ClusterSpec, NodeSpec). Map keys are sorted and no
 * clock or environment value is read, so equal input renders equal bytes.
 */

import { stringify } from 'yaml';

import type {
  AggregateDescriptor,
  ClusterSpec,
  DescriptorEntry,
  NodeSpec,
  RoleConfig,
  SettingValue,
} from './types.js';
import { serverNode } from './topology.js';

export const DEFAULT_API_PORT          = 6443;
export const DEFAULT_SERVER_TOKEN_FILE = '/var/lib/rancher/k3s/server/token';
export const DEFAULT_AGENT_TOKEN_FILE  = '/etc/rancher/k3s/agent-token';

const HEADER = '# Generated by cluster-reconcile from the topology document. Local edits are overwritten.\n';

// ── Settings ──────────────────────────────────────────────────────────────────

/** Config keys are rendered in flag form: data_dir → data-dir */
function normalizeSettings(config: RoleConfig): Map<string, SettingValue> {
  const out = new Map<string, SettingValue>();
  for (const [key, value] of Object.entries(config)) {
    out.set(key.replace(/_/g, '-'), value);
  }
  return out;
}

function stringSetting(config: RoleConfig, key: string, fallback: string): string {
  const value = normalizeSettings(config).get(key);
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

export function apiPort(spec: ClusterSpec): number {
  const value = normalizeSettings(spec.serverConfig).get('api-port');
  const port  = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_API_PORT;
}

export function joinUrl(spec: ClusterSpec): string {
  return `https://${serverNode(spec).ip}:${apiPort(spec)}`;
}

export function fqdn(node: NodeSpec, domain: string): string {
  return `${node.hostname}.${domain}`;
}

/** Path of the join credential on the node. A reference, never the value. */
export function credentialRef(spec: ClusterSpec, node: NodeSpec): string {
  return node.role === 'server'
    ? stringSetting(spec.serverConfig, 'token-file', DEFAULT_SERVER_TOKEN_FILE)
    : stringSetting(spec.agentConfig,  'token-file', DEFAULT_AGENT_TOKEN_FILE);
}

// ── Per-node artifact ─────────────────────────────────────────────────────────

const RESERVED_KEYS = new Set(['api-port', 'token-file']);

function roleSettings(config: RoleConfig): Record<string, SettingValue> {
  const out: Record<string, SettingValue> = {};
  for (const [key, value] of normalizeSettings(config)) {
    if (!RESERVED_KEYS.has(key)) out[key] = value;
  }
  return out;
}

export function renderNodeArtifact(spec: ClusterSpec, node: NodeSpec): string {
  const name = fqdn(node, spec.domain);

  const computed: Record<string, SettingValue> = node.role === 'server'
    ? {
        'cluster-init':      true,
        'advertise-address': node.ip,
        'tls-san':           [name, node.ip],
      }
    : {
        server: joinUrl(spec),
      };

  const document = {
    node: {
      name:        node.name,
      hostname:    node.hostname,
      fqdn:        name,
      ip:          node.ip,
      role:        node.role,
      description: node.description,
    },
    config: {
      ...roleSettings(node.role === 'server' ? spec.serverConfig : spec.agentConfig),
      ...computed,
      'node-name':  node.name,
      'node-ip':    node.ip,
      'token-file': credentialRef(spec, node),
    },
  };

  return HEADER + stringify(document, { sortMapEntries: true, lineWidth: 0, indent: 2 });
}

// ── Aggregate descriptor ──────────────────────────────────────────────────────

export function byName<T extends { name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export function buildDescriptor(spec: ClusterSpec): AggregateDescriptor {
  const nodes: DescriptorEntry[] = [...spec.nodes].sort(byName).map((node) => ({
    name:          node.name,
    hostname:      node.hostname,
    fqdn:          fqdn(node, spec.domain),
    address:       node.ip,
    role:          node.role,
    credentialRef: credentialRef(spec, node),
  }));

  return { domain: spec.domain, joinUrl: joinUrl(spec), nodes };
}

export function renderDescriptor(spec: ClusterSpec): string {
  return `${JSON.stringify(buildDescriptor(spec), null, 2)}\n`;
}
