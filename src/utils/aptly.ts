// CHANGE: Run external commands such as aptly without a shell.
// WHY: Snapshot ids are passed as arguments and never interpolated into a command line.

import { spawn } from "child_process";

export interface CommandResult {
  readonly code: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Runs a command and resolves with its exit status and output.
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

/**
 * Spawn a process without a shell and collect its output.
 * Rejects only when the process cannot be started.
 */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, [...args], { env: process.env });

    let stdout = "";
    let stderr = "";

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("close", code => {
      resolve({ code: code ?? 1, stdout, stderr });
    });

    proc.on("error", reject);
  });
