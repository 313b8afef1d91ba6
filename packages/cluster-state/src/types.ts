/**
 * Cluster State — Shared Types
 */

// ── Desired state ─────────────────────────────────────────────────────────────

export type NodeRole = 'server' | 'agent';

export const NODE_ROLES: readonly NodeRole[] = ['server', 'agent'];

export interface NodeSpec {
  name:        string;  // unique, DNS label
  hostname:    string;
  ip:          string;  // unique, inside ClusterSpec.subnet
  role:        NodeRole;
  description: string;
}

export type SettingValue = string | number | boolean | string[];

/** Role-specific settings copied into every artifact of that role */
export type RoleConfig = Record<string, SettingValue>;

export interface ClusterSpec {
  domain:       string;
  subnet:       string;  // IPv4 CIDR
  nodes:        NodeSpec[];
  serverConfig: RoleConfig;
  agentConfig:  RoleConfig;
}

// ── Generated artifacts ───────────────────────────────────────────────────────

export interface GeneratedArtifact {
  nodeName: string;
  content:  string;
}

/** Complete next state of the artifact tree */
export interface ArtifactSnapshot {
  artifacts:  GeneratedArtifact[];
  descriptor: string;
}

export interface ArtifactStore {
  /** Node names with a materialized artifact */
  list(): Promise<string[]>;
  read(nodeName: string): Promise<string | undefined>;
  readDescriptor(): Promise<string | undefined>;
  /** Replace the whole tree; all-or-nothing */
  replaceAll(snapshot: ArtifactSnapshot): Promise<void>;
}

export interface ArtifactDiff {
  created:           string[];
  updated:           string[];
  unchanged:         string[];
  deleted:           string[];
  descriptorChanged: boolean;
}

export interface DescriptorEntry {
  name:          string;
  hostname:      string;
  fqdn:          string;
  address:       string;
  role:          NodeRole;
  credentialRef: string;
}

export interface AggregateDescriptor {
  domain:  string;
  joinUrl: string;
  nodes:   DescriptorEntry[];
}

// ── Live cluster ──────────────────────────────────────────────────────────────

export interface ClusterMember {
  name:         string;
  ready:        boolean;
  schedulable:  boolean;
  /** Carries the control-plane role (the server node of the cluster) */
  controlPlane: boolean;
  address?:     string;
}

export const DECOMMISSION_STAGES = [
  'pending',
  'draining',
  'deleted-from-cluster',
  'service-stopped',
  'token-purged',
] as const;

export type DecommissionStage = (typeof DECOMMISSION_STAGES)[number];

// ── Adapter contracts ─────────────────────────────────────────────────────────

export type DrainOutcome = 'drained' | 'timeout';

export interface DrainOptions {
  timeoutMs: number;
  force:     boolean;
}

/** Narrow view of the orchestrator's control plane */
export interface ControlPlaneClient {
  list(signal: AbortSignal): Promise<ClusterMember[]>;
  cordon(name: string, signal: AbortSignal): Promise<void>;
  drain(name: string, options: DrainOptions, signal: AbortSignal): Promise<DrainOutcome>;
  /** Already-absent members count as deleted */
  delete(name: string, signal: AbortSignal): Promise<void>;
}

export interface RemoteTarget {
  nodeName: string;
  host:     string;
}

export type ServiceState = 'active' | 'inactive' | 'unreachable';

export type StopOutcome = 'stopped' | 'unreachable';

export interface StopServiceRequest {
  service:   string;
  /** On-node join credential removed together with the service */
  tokenPath: string;
}

export interface RemoteShellClient {
  serviceState(target: RemoteTarget, service: string, signal: AbortSignal): Promise<ServiceState>;
  stopService(target: RemoteTarget, request: StopServiceRequest, signal: AbortSignal): Promise<StopOutcome>;
  ping(target: RemoteTarget, signal: AbortSignal): Promise<boolean>;
}

/** Locally cached join-credential material, keyed by node name */
export interface CredentialStore {
  list(): Promise<string[]>;
  has(nodeName: string): Promise<boolean>;
  purge(nodeName: string): Promise<void>;
}

export interface EvaluationResult {
  nodeName: string;
  ok:       boolean;
  detail:   string;
}

export interface EvaluatorClient {
  evaluate(nodeName: string, signal: AbortSignal): Promise<EvaluationResult>;
}

export interface NodeDeployResult {
  nodeName: string;
  ok:       boolean;
  detail:   string;
}

export interface DeployExecutor {
  deploy(nodeNames: string[], signal: AbortSignal): Promise<NodeDeployResult[]>;
}

// ── Per-node outcomes ─────────────────────────────────────────────────────────

export type NodeStatus = 'ok' | 'warning' | 'error' | 'planned' | 'skipped';

export type WarningKind =
  | 'DrainTimeoutWarning'
  | 'HostUnreachableWarning'
  | 'VerificationWarning';

export interface NodeWarning {
  kind:    WarningKind;
  message: string;
}
