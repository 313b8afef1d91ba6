import { describe, it, expect, vi } from 'vitest';

import { CommandError, type ExecFn } from './exec.js';
import { CommandDeployExecutor } from './deploy-executor.js';

process.env.LOG_LEVEL = 'silent';

const signal = new AbortController().signal;

describe('CommandDeployExecutor', () => {
  it('deploys each node in order and keeps going after a failure', async () => {
    const exec = vi.fn<ExecFn>(async (_file, args) => {
      if (args.includes('.#n1')) throw new CommandError('deploy', 1, 'activation failed', false);
      return { stdout: '', stderr: '' };
    });

    const results = await new CommandDeployExecutor('deploy --remote-build .#{node}', 60_000, exec).deploy(['n1', 'n2'], signal);

    expect(results).toEqual([
      { nodeName: 'n1', ok: false, detail: 'deploy exited with 1: activation failed' },
      { nodeName: 'n2', ok: true,  detail: 'deployed' },
    ]);
    expect(exec.mock.calls.map((c) => c[1])).toEqual([
      ['--remote-build', '.#n1'],
      ['--remote-build', '.#n2'],
    ]);
  });

  it('does not start further nodes once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const exec = vi.fn<ExecFn>(async () => ({ stdout: '', stderr: '' }));

    const results = await new CommandDeployExecutor('deploy .#{node}', 60_000, exec).deploy(['n1'], controller.signal);

    expect(results).toEqual([{ nodeName: 'n1', ok: false, detail: 'not attempted: deploy aborted' }]);
    expect(exec).not.toHaveBeenCalled();
  });
});
