/**
 * External command execution.
 */

import { execFileSync } from "node:child_process";

export interface RunOptions {
  cwd: string;
}

/** Run a command to completion. Throws if it cannot be spawned or exits non-zero. */
export type CommandRunner = (
  command: readonly string[],
  options: RunOptions,
) => void;

export function formatCommand(command: readonly string[]): string {
  return command.join(" ");
}

/**
 * Default runner: blocking spawn with the tool's output passed straight
 * through to the terminal.
 */
export const execRunner: CommandRunner = (command, { cwd }) => {
  const [file, ...args] = command;
  if (!file) {
    throw new Error("Command failed: empty command");
  }

  try {
    execFileSync(file, args, { cwd, stdio: "inherit" });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Command failed: ${formatCommand(command)}: ${message}`);
  }
};
