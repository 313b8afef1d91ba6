/**
 * Deploy executor running a configurable command once per node,
 * e.g. `deploy --remote-build .#{node}`.
 *
 * Nodes are deployed one after another in the order given. A failure is
 * recorded and the remaining nodes are still attempted.
 */

import type { DeployExecutor, NodeDeployResult } from 'cluster-state';
import { log, warn } from 'cluster-state';
import { CommandError, defaultExec, expandCommand, type ExecFn } from './exec.js';

export class CommandDeployExecutor implements DeployExecutor {
  constructor(
    private readonly template:  string,
    private readonly timeoutMs: number,
    private readonly exec:      ExecFn = defaultExec
  ) {}

  async deploy(nodeNames: string[], signal: AbortSignal): Promise<NodeDeployResult[]> {
    const results: NodeDeployResult[] = [];

    for (const nodeName of nodeNames) {
      if (signal.aborted) {
        results.push({ nodeName, ok: false, detail: 'not attempted: deploy aborted' });
        continue;
      }

      const { file, args } = expandCommand(this.template, nodeName);
      log(`[Deploy] ${nodeName}: ${[file, ...args].join(' ')}`);
      try {
        await this.exec(file, args, { timeoutMs: this.timeoutMs, signal });
        results.push({ nodeName, ok: true, detail: 'deployed' });
      } catch (err) {
        if (!(err instanceof CommandError)) throw err;
        warn(`[Deploy] ${nodeName}: ${err.message}`);
        results.push({ nodeName, ok: false, detail: err.message });
      }
    }

    return results;
  }
}
