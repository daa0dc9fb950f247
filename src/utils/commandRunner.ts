import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

const COMMAND_TIMEOUT_MS = 60000;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs an external program without a shell */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    timeout: COMMAND_TIMEOUT_MS,
    encoding: 'utf8',
  });
  return { stdout, stderr };
};
