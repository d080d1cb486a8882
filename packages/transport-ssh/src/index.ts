/**
 * @summary Main entry point for @snpctl/transport-ssh.
 */

export type { SshTarget, CopyDirection, RemoteExecutor } from "./ssh-executor.js";

export { SshRemoteExecutor } from "./ssh-executor.js";
