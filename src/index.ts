/**
 * Cluster Reconciler
 *
 * Regenerates per-node deployment artifacts from the topology document,
 * optionally decommissions nodes that left it, then evaluates, deploys and
 * verifies every declared node.
 *
 * Usage:
 *   npx tsx src/index.ts --dry-run               # Show the plan only
 *   npx tsx src/index.ts --cleanup-k3s           # Decommission stale k3s nodes, then deploy
 *   npx tsx src/index.ts --skip-deploy           # Regenerate artifacts only
 *
 * Exit codes: 0 success, 1 failure or declined, 2 deployed with degraded
 * verification, 64 usage error.
 */

import {
  FileArtifactStore,
  FileCredentialStore,
  log,
  logError,
} from 'cluster-state';

import { USAGE, UsageError, loadConfig, type Config } from './config.js';
import { runPipeline } from './pipeline/coordinator.js';
import { PromptConfirmer, autoConfirm } from './pipeline/confirm.js';
import { KubectlControlPlane } from './services/kubectl.js';
import { SshRemoteShell } from './services/ssh.js';
import { CommandEvaluator } from './services/evaluator.js';
import { CommandDeployExecutor } from './services/deploy-executor.js';

const EXIT_USAGE = 64;

async function run(config: Config): Promise<number> {
  log('Cluster reconciler starting');
  log(`Topology: ${config.topologyPath}  Artifacts: ${config.artifactDir}`);
  log(`Mode: ${config.dryRun ? 'dry run' : 'apply'}${config.skipDeploy ? ', skip deploy' : ''}${config.cleanup ? `, cleanup (${config.cleanup.name})` : ''}`);

  const result = await runPipeline(config, {
    store:        new FileArtifactStore(config.artifactDir),
    credentials:  new FileCredentialStore(config.credentialDir),
    controlPlane: new KubectlControlPlane({
      kubectl:   config.kubectl,
      context:   config.kubeContext,
      timeoutMs: config.timeouts.controlPlaneMs,
    }),
    remote: new SshRemoteShell({
      keyPath:   config.ssh.keyPath,
      user:      config.ssh.user,
      port:      config.ssh.port,
      timeoutMs: config.timeouts.remoteMs,
    }),
    evaluator: new CommandEvaluator(config.evaluateCommand, config.timeouts.evaluateMs),
    deployer:  new CommandDeployExecutor(config.deployCommand, config.timeouts.deployMs),
    confirmer: config.assumeYes ? autoConfirm : new PromptConfirmer(),
  });

  return result.exitCode;
}

async function main(): Promise<number> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`${err.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (config.help) {
    console.log(USAGE);
    return 0;
  }
  return run(config);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logError(`Fatal error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    process.exitCode = 1;
  });
