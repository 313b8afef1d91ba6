/**
 * Remote shell adapter over ssh.
 *
 * ssh exits 255 when it cannot reach or authenticate to the host; that is
 * reported as 'unreachable' rather than thrown.
 */

import type {
  RemoteShellClient,
  RemoteTarget,
  ServiceState,
  StopOutcome,
  StopServiceRequest,
} from 'cluster-state';
import { CommandError, defaultExec, type ExecFn } from './exec.js';

const SSH_CONNECTION_FAILURE = 255;

export interface SshOptions {
  keyPath:   string;
  user:      string;
  port:      number;
  timeoutMs: number;
}

/** Single-quote for the remote POSIX shell */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function isUnreachable(err: unknown): boolean {
  return err instanceof CommandError && (err.timedOut || err.exitCode === SSH_CONNECTION_FAILURE || err.exitCode === null);
}

export class SshRemoteShell implements RemoteShellClient {
  constructor(
    private readonly options: SshOptions,
    private readonly exec:    ExecFn = defaultExec
  ) {}

  sshArgs(host: string, command: string, timeoutMs = this.options.timeoutMs): string[] {
    const { keyPath, user, port } = this.options;
    return [
      '-i', keyPath,
      '-p', String(port),
      '-o', 'BatchMode=yes',
      '-o', `ConnectTimeout=${Math.max(3, Math.floor(timeoutMs / 1000))}`,
      '-o', 'StrictHostKeyChecking=accept-new',
      `${user}@${host}`,
      command,
    ];
  }

  private run(target: RemoteTarget, command: string, signal: AbortSignal) {
    return this.exec('ssh', this.sshArgs(target.host, command), { timeoutMs: this.options.timeoutMs, signal });
  }

  async serviceState(target: RemoteTarget, service: string, signal: AbortSignal): Promise<ServiceState> {
    try {
      const { stdout } = await this.run(target, `systemctl is-active ${shellQuote(service)}`, signal);
      return stdout.trim() === 'active' ? 'active' : 'inactive';
    } catch (err) {
      if (isUnreachable(err)) return 'unreachable';
      // is-active exits non-zero for inactive, failed and unknown units
      if (err instanceof CommandError) return 'inactive';
      throw err;
    }
  }

  async stopService(target: RemoteTarget, request: StopServiceRequest, signal: AbortSignal): Promise<StopOutcome> {
    const service = shellQuote(request.service);
    const command = [
      `systemctl stop ${service}`,
      `systemctl disable ${service}`,
      `rm -f ${shellQuote(request.tokenPath)}`,
    ].join(' && ');

    try {
      await this.run(target, command, signal);
      return 'stopped';
    } catch (err) {
      if (isUnreachable(err)) return 'unreachable';
      throw err;
    }
  }

  async ping(target: RemoteTarget, signal: AbortSignal): Promise<boolean> {
    try {
      await this.run(target, 'true', signal);
      return true;
    } catch (err) {
      if (err instanceof CommandError) return false;
      throw err;
    }
  }
}
