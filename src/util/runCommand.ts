import { spawn } from 'node:child_process';

export interface RunCommandOptions {
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export const runCommand = (
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let timeoutHandle: NodeJS.Timeout | undefined;

    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        child.kill('SIGKILL');
        reject(new Error(`Command timed out after ${options.timeoutMs}ms: ${command}`));
      }, options.timeoutMs);
    }

    child.stdout.on('data', (chunk) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      clearTimeout(timeoutHandle);
      reject(error);
    });

    child.on('close', (code) => {
      clearTimeout(timeoutHandle);

      if (code !== 0) {
        const suffix = stderr.trim() ? `\n${stderr.trim()}` : '';
        reject(new Error(`Command failed (${code}): ${command}${suffix}`));
        return;
      }

      resolve({ stdout, stderr });
    });
  });
