import { spawn } from 'child_process';
import { CommandOptions, CommandResult, CommandRunner } from '../interfaces/CommandRunner';

/**
 * CommandRunner backed by child_process.spawn
 */
export class ProcessRunner implements CommandRunner {
  /**
   * Run a command to completion, feeding `options.input` on stdin.
   * Resolves with the exit code and captured output; rejects only when the process cannot be driven.
   */
  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        env: { ...process.env, ...options.env },
      });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', reject);

      child.on('close', code => {
        resolve({ exitCode: code ?? -1, stdout, stderr });
      });

      // A child may exit without reading its input; its exit code then decides the result
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code !== 'EPIPE') {
          reject(error);
        }
      });

      if (options.input !== undefined) {
        child.stdin.write(options.input);
      }
      child.stdin.end();
    });
  }
}
