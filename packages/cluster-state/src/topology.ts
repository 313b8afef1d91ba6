/**
 * Desired state loader & validator.
 *
 * Parses the topology document (YAML, or JSON as a YAML subset) into a
 * ClusterSpec. Structural problems come from the zod schema, semantic ones
 * from checkSemantics(); both are collected in full rather than stopping at
 * the first violation.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import type { ClusterSpec, NodeRole, NodeSpec, RoleConfig } from './types.js';
import { NODE_ROLES } from './types.js';
import { ValidationError, errorMessage, type Violation } from './errors.js';
import { isDnsLabel, isIPv4, parseCidr } from './network.js';

// ── Document schema ───────────────────────────────────────────────────────────

const settingValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

const roleConfigSchema = z.record(z.string(), settingValueSchema);

const nodeSchema = z.object({
  name:        z.string().min(1),
  hostname:    z.string().min(1).optional(),
  ip:          z.string().min(1),
  role:        z.string(),
  description: z.string().default(''),
});

export const topologyDocumentSchema = z.object({
  domain:        z.string().min(1),
  subnet:        z.string().min(1),
  nodes:         z.array(nodeSchema),
  server_config: roleConfigSchema.nullish(),
  agent_config:  roleConfigSchema.nullish(),
});

export type TopologyDocument = z.infer<typeof topologyDocumentSchema>;

export type ValidationResult =
  | { ok: true;  spec: ClusterSpec }
  | { ok: false; violations: Violation[] };

// ── Helpers ───────────────────────────────────────────────────────────────────

function formatPath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const part of path) {
    out += typeof part === 'number' ? `[${part}]` : out ? `.${part}` : part;
  }
  return out || '(root)';
}

function toRole(value: string): NodeRole | undefined {
  return NODE_ROLES.find((role) => role === value);
}

// ── Semantic checks ───────────────────────────────────────────────────────────

function checkSemantics(doc: TopologyDocument): { violations: Violation[]; nodes: NodeSpec[] } {
  const violations: Violation[] = [];
  const nodes: NodeSpec[] = [];

  const subnet = parseCidr(doc.subnet);
  if (!subnet) {
    violations.push({ code: 'invalid-subnet', path: 'subnet', message: `"${doc.subnet}" is not an IPv4 CIDR` });
  }

  const seenNames = new Map<string, number>();
  const seenIps   = new Map<string, number>();

  doc.nodes.forEach((raw, i) => {
    const at = `nodes[${i}]`;

    if (!isDnsLabel(raw.name)) {
      violations.push({ code: 'invalid-name', path: `${at}.name`, message: `"${raw.name}" is not a lowercase DNS label` });
    }
    const firstName = seenNames.get(raw.name);
    if (firstName !== undefined) {
      violations.push({ code: 'duplicate-name', path: `${at}.name`, message: `duplicate node name "${raw.name}" (first declared at nodes[${firstName}])` });
    } else {
      seenNames.set(raw.name, i);
    }

    if (!isIPv4(raw.ip)) {
      violations.push({ code: 'invalid-ip', path: `${at}.ip`, message: `"${raw.ip}" is not an IPv4 address` });
    } else if (subnet && !subnet.contains(raw.ip)) {
      violations.push({ code: 'ip-outside-subnet', path: `${at}.ip`, message: `${raw.ip} is outside ${doc.subnet}` });
    }
    const firstIp = seenIps.get(raw.ip);
    if (firstIp !== undefined) {
      violations.push({ code: 'duplicate-ip', path: `${at}.ip`, message: `duplicate ip ${raw.ip} (first declared at nodes[${firstIp}])` });
    } else {
      seenIps.set(raw.ip, i);
    }

    const role = toRole(raw.role);
    if (!role) {
      violations.push({ code: 'invalid-role', path: `${at}.role`, message: `role "${raw.role}" is not one of ${NODE_ROLES.join(', ')}` });
      return;
    }

    nodes.push({
      name:        raw.name,
      hostname:    raw.hostname ?? raw.name,
      ip:          raw.ip,
      role,
      description: raw.description,
    });
  });

  const servers = doc.nodes.filter((n) => n.role === 'server');
  if (servers.length === 0) {
    violations.push({ code: 'no-server', path: 'nodes', message: 'exactly one server node is required, found none' });
  } else if (servers.length > 1) {
    violations.push({
      code:    'multiple-servers',
      path:    'nodes',
      message: `exactly one server node is required, found ${servers.length}: ${servers.map((s) => s.name).join(', ')}`,
    });
  }

  if (!doc.server_config) {
    violations.push({ code: 'missing-section', path: 'server_config', message: 'server_config section is required' });
  }
  if (!doc.agent_config) {
    violations.push({ code: 'missing-section', path: 'agent_config', message: 'agent_config section is required' });
  }

  return { violations, nodes };
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Validate an already-parsed document.
 */
export function validateTopology(raw: unknown): ValidationResult {
  const parsed = topologyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      violations: parsed.error.issues.map((issue) => ({
        code:    'schema',
        path:    formatPath(issue.path),
        message: issue.message,
      })),
    };
  }

  const doc = parsed.data;
  const { violations, nodes } = checkSemantics(doc);
  if (violations.length > 0 || !doc.server_config || !doc.agent_config) {
    return { ok: false, violations };
  }

  const serverConfig: RoleConfig = { ...doc.server_config };
  const agentConfig:  RoleConfig = { ...doc.agent_config };

  return {
    ok: true,
    spec: {
      domain: doc.domain,
      subnet: doc.subnet,
      nodes,
      serverConfig,
      agentConfig,
    },
  };
}

/**
 * Parse and validate topology document text.
 */
export function parseTopology(text: string): ValidationResult {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    return { ok: false, violations: [{ code: 'parse', path: '(root)', message: errorMessage(err) }] };
  }
  return validateTopology(raw);
}

/**
 * Load the topology document from disk. Throws ValidationError with every
 * violation found.
 */
export async function loadTopology(path: string): Promise<ClusterSpec> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ValidationError([{ code: 'parse', path, message: `cannot read topology: ${errorMessage(err)}` }]);
  }

  const result = parseTopology(text);
  if (!result.ok) throw new ValidationError(result.violations);
  return result.spec;
}

/** The single server node of a validated spec */
export function serverNode(spec: ClusterSpec): NodeSpec {
  const server = spec.nodes.find((n) => n.role === 'server');
  if (!server) throw new ValidationError([{ code: 'no-server', path: 'nodes', message: 'no server node' }]);
  return server;
}
