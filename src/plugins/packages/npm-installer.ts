import { spawn } from 'node:child_process';
import { mkdir } from 'node:fs/promises';
import { z } from 'zod';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import { ExecutionTimeoutError, TaskdeckError } from '../../errors.js';
import type { PackageInstaller } from './types.js';

export interface NpmPackageInstallerOptions {
  /** Sandbox prefix the packages are installed into. */
  installDir: string;
  timeoutMs: number;
  logger: StructuredLogger;
  command?: string;
}

interface CommandOutput {
  code: number | null;
  stdout: string;
  stderr: string;
}

const NpmListSchema = z.object({
  dependencies: z.record(z.object({ version: z.string().optional() })).default({}),
});

/** Drives the npm CLI inside `installDir`. */
export class NpmPackageInstaller implements PackageInstaller {
  constructor(private readonly options: NpmPackageInstallerOptions) {}

  async install(name: string, version?: string): Promise<{ version: string }> {
    const spec = version ? `${name}@${version}` : name;
    await this.runChecked(['install', '--no-audit', '--no-fund', '--save', spec]);
    const installed = await this.listInstalled();
    const resolved = installed.get(name);
    if (!resolved) {
      throw new TaskdeckError(`npm reported success but ${name} is not installed`, 'INSTALL_FAILED');
    }
    return { version: resolved };
  }

  async uninstall(name: string): Promise<void> {
    await this.runChecked(['uninstall', '--no-audit', '--no-fund', '--save', name]);
  }

  async listInstalled(): Promise<Map<string, string>> {
    // `npm ls` exits non-zero on extraneous or missing deps but still prints the tree.
    const output = await this.run(['ls', '--json', '--depth=0']);
    if (!output.stdout.trim()) {
      return new Map();
    }
    const tree = NpmListSchema.parse(JSON.parse(output.stdout));
    return new Map(
      Object.entries(tree.dependencies).map(([name, entry]) => [name, entry.version ?? 'unknown'])
    );
  }

  private async runChecked(args: string[]): Promise<CommandOutput> {
    const output = await this.run(args);
    if (output.code !== 0) {
      throw new TaskdeckError(
        `npm ${args[0]} exited with status ${output.code}${output.stderr ? `: ${output.stderr.trim()}` : ''}`,
        'INSTALL_FAILED'
      );
    }
    return output;
  }

  private async run(args: string[]): Promise<CommandOutput> {
    await mkdir(this.options.installDir, { recursive: true });
    const command = this.options.command ?? 'npm';
    this.options.logger.debug('Running npm', { args: args.join(' '), cwd: this.options.installDir });

    return new Promise<CommandOutput>((resolve, reject) => {
      const child = spawn(command, [...args, '--prefix', this.options.installDir], {
        cwd: this.options.installDir,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      const timeout = setTimeout(() => {
        child.kill('SIGTERM');
        reject(new ExecutionTimeoutError(`npm ${args[0]} timed out after ${this.options.timeoutMs}ms`, this.options.timeoutMs));
      }, this.options.timeoutMs);

      // Decoded per stream so a character split across chunks stays whole.
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (err: Error) => {
        clearTimeout(timeout);
        reject(new TaskdeckError(`npm failed to spawn: ${err.message}`, 'INSTALL_FAILED'));
      });

      child.on('close', (code) => {
        clearTimeout(timeout);
        resolve({ code, stdout, stderr });
      });
    });
  }
}
