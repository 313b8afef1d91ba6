/**
 * Per-node configuration evaluation through a configurable command,
 * e.g. `nix eval .#nixosConfigurations.{node}.config.system.build.toplevel.drvPath`.
 */

import type { EvaluationResult, EvaluatorClient } from 'cluster-state';
import { CommandError, defaultExec, expandCommand, type ExecFn } from './exec.js';

export class CommandEvaluator implements EvaluatorClient {
  constructor(
    private readonly template:  string,
    private readonly timeoutMs: number,
    private readonly exec:      ExecFn = defaultExec
  ) {}

  async evaluate(nodeName: string, signal: AbortSignal): Promise<EvaluationResult> {
    const { file, args } = expandCommand(this.template, nodeName);
    try {
      const { stdout } = await this.exec(file, args, { timeoutMs: this.timeoutMs, signal });
      const lines = stdout.trim().split('\n');
      return { nodeName, ok: true, detail: lines[lines.length - 1] ?? '' };
    } catch (err) {
      if (err instanceof CommandError) return { nodeName, ok: false, detail: err.message };
      throw err;
    }
  }
}
