import { classifyResult, type CommandRunner } from './command-runner.js';

/**
 * Direct SSH access to cluster hosts, used for reachability checks and for
 * fetching the control plane's admin credentials.
 */
export interface SshClient {
  isReachable(address: string): Promise<boolean>;
  readFile(address: string, path: string): Promise<string>;
}

export interface SshClientOptions {
  binary: string;
  user: string;
  connectTimeoutSeconds: number;
  timeoutMs: number;
}

export class OpenSshClient implements SshClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: SshClientOptions
  ) {}

  async isReachable(address: string): Promise<boolean> {
    const result = await this.runner.run(this.options.binary, this.sshArgs(address, ['true']), {
      timeoutMs: (this.options.connectTimeoutSeconds + 2) * 1000,
    });
    return result.exitCode === 0;
  }

  async readFile(address: string, path: string): Promise<string> {
    const result = await this.runner.run(
      this.options.binary,
      this.sshArgs(address, ['sudo', 'cat', path]),
      { timeoutMs: this.options.timeoutMs }
    );
    classifyResult(
      result,
      { transient: [/Connection (refused|timed out)/i, /No route to host/i] },
      `ssh ${this.options.user}@${address} sudo cat ${path}`
    );
    return result.stdout;
  }

  private sshArgs(address: string, command: string[]): string[] {
    return [
      '-o',
      'BatchMode=yes',
      '-o',
      `ConnectTimeout=${this.options.connectTimeoutSeconds}`,
      '-o',
      'StrictHostKeyChecking=no',
      '-o',
      'UserKnownHostsFile=/dev/null',
      '-o',
      'LogLevel=ERROR',
      `${this.options.user}@${address}`,
      ...command,
    ];
  }
}
