/**
 * @summary RemoteExecutor bound to one guest reachable over a forwarded port.
 *
 * Commands run through `ssh`, files move through `scp -r`. Both always dial
 * localhost with the guest's identity key and never prompt: host keys are
 * accepted, passwords are refused, and connection attempts give up after a
 * second so callers can poll.
 */

import {
  ConnectivityError,
  RemoteCommandError,
  formatCommand,
  type CommandResult,
  type CommandRunner,
  type CommandSpec,
  type GuestSession,
} from "@snpctl/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Where the guest's sshd is reached from the host.
 */
export interface SshTarget {
  /** Forwarded host port */
  port: number;
  /** Private key file */
  keyPath: string;
  user: string;
  /** @default "localhost" */
  host?: string;
}

export type CopyDirection = "to-guest" | "from-guest";

export interface RemoteExecutor {
  /** host:port being dialed */
  readonly endpoint: string;

  /**
   * Run a shell command in the guest. A transport failure throws
   * `ConnectivityError`; a command failure is returned as its exit code.
   */
  exec(command: string): Promise<CommandResult>;

  /**
   * Like `exec`, but a non-zero exit throws `RemoteCommandError`.
   */
  execOrThrow(command: string): Promise<CommandResult>;

  /**
   * Copy a file or directory between host and guest.
   */
  copy(source: string, dest: string, direction: CopyDirection): Promise<void>;

  /**
   * True when a trivial command succeeds.
   */
  isReachable(): Promise<boolean>;
}

/** Exit status ssh and scp use for their own failures */
const SSH_TRANSPORT_FAILURE = 255;

const SSH_OPTIONS = [
  "-o",
  "StrictHostKeyChecking=no",
  "-o",
  "PasswordAuthentication=no",
  "-o",
  "ConnectTimeout=1",
] as const;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export class SshRemoteExecutor implements RemoteExecutor {
  readonly endpoint: string;
  private readonly host: string;

  constructor(
    private readonly target: SshTarget,
    private readonly runner: CommandRunner
  ) {
    this.host = target.host ?? "localhost";
    this.endpoint = `${this.host}:${target.port}`;
  }

  /**
   * Executor for the guest recorded in a launch session.
   */
  static forSession(session: GuestSession, runner: CommandRunner): SshRemoteExecutor {
    return new SshRemoteExecutor(
      { port: session.hostSshPort, keyPath: session.sshKeyPath, user: session.user },
      runner
    );
  }

  sshSpec(command: string): CommandSpec {
    return {
      command: "ssh",
      args: [
        "-p",
        String(this.target.port),
        "-i",
        this.target.keyPath,
        ...SSH_OPTIONS,
        `${this.target.user}@${this.host}`,
        command,
      ],
    };
  }

  scpSpec(source: string, dest: string, direction: CopyDirection): CommandSpec {
    const remote = (file: string) => `${this.target.user}@${this.host}:${file}`;
    const [from, to] =
      direction === "to-guest" ? [source, remote(dest)] : [remote(source), dest];

    return {
      command: "scp",
      args: [
        "-r",
        "-P",
        String(this.target.port),
        "-i",
        this.target.keyPath,
        ...SSH_OPTIONS,
        from,
        to,
      ],
    };
  }

  async exec(command: string): Promise<CommandResult> {
    const result = await this.runner.run(this.sshSpec(command));
    if (result.exitCode === SSH_TRANSPORT_FAILURE) {
      throw new ConnectivityError(this.endpoint, result.stderr.trim() || undefined);
    }
    return result;
  }

  async execOrThrow(command: string): Promise<CommandResult> {
    const result = await this.exec(command);
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(command, result.exitCode, result.stdout, result.stderr);
    }
    return result;
  }

  async copy(source: string, dest: string, direction: CopyDirection): Promise<void> {
    const spec = this.scpSpec(source, dest, direction);
    const result = await this.runner.run(spec);
    if (result.exitCode === SSH_TRANSPORT_FAILURE) {
      throw new ConnectivityError(this.endpoint, result.stderr.trim() || undefined);
    }
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(
        formatCommand(spec),
        result.exitCode,
        result.stdout,
        result.stderr
      );
    }
  }

  async isReachable(): Promise<boolean> {
    try {
      const result = await this.exec("true");
      return result.exitCode === 0;
    } catch (err) {
      if (err instanceof ConnectivityError) {
        return false;
      }
      throw err;
    }
  }
}
