#!/usr/bin/env node
/**
 * taskdeck - task orchestration and state-synchronization gateway.
 */
import { HELP_TEXT, VERSION, parseCliArgs } from './core/app/cli.js';
import { setupSignalHandlers } from './core/app/signals.js';
import { TaskdeckKernel } from './core/kernel/kernel.js';
import { bundledPlugins } from './plugins/index.js';
import { TaskdeckError, errorMessage } from './errors.js';

/** Resolves with an exit code, or null while the gateway keeps serving. */
async function main(argv: string[]): Promise<number | null> {
  const args = parseCliArgs(argv);
  if (args.help) {
    process.stdout.write(HELP_TEXT);
    return 0;
  }
  if (args.version) {
    process.stdout.write(`taskdeck v${VERSION}\n`);
    return 0;
  }

  const kernel = await TaskdeckKernel.create({
    workspaceRoot: args.workspaceRoot,
    flags: args.flags,
    plugins: bundledPlugins({ startedAt: new Date() }),
  });

  setupSignalHandlers({ stop: () => kernel.stop(), logger: kernel.logger.child('cli') });

  await kernel.start();
  const port = await kernel.startGateway();
  kernel.logger.info('taskdeck ready', {
    workspace: args.workspaceRoot,
    url: `http://${kernel.config.gateway.host}:${port}`,
  });
  return null;
}

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== null) process.exit(code);
  },
  (error: unknown) => {
    const prefix = error instanceof TaskdeckError ? error.code : 'FATAL';
    process.stderr.write(`${prefix}: ${errorMessage(error)}\n`);
    process.exit(1);
  }
);
