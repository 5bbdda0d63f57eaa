/**
 * CLI Entry Point - Command line argument handling
 */
import { resolve } from 'node:path';
import type { RuntimeFlags } from '../kernel/contracts.js';
import { ValidationError } from '../../errors.js';

export const VERSION = '0.1.0';

export const HELP_TEXT = `taskdeck - task orchestration gateway

Usage:
  taskdeck [options]

Options:
  -w, --workspace DIR  Workspace root (default: current directory)
  -c, --config PATH    User config file (default: ~/.taskdeck/config.json)
  -p, --port N         Gateway port
      --host HOST      Gateway host
      --token TOKEN    Gateway bearer token
  -v, --version        Show version
  -h, --help           Show this help
`;

export interface CliArgs {
  help: boolean;
  version: boolean;
  workspaceRoot: string;
  flags: RuntimeFlags;
}

const VALUE_FLAGS = new Map<string, 'workspace' | 'config' | 'port' | 'host' | 'token'>([
  ['-w', 'workspace'],
  ['--workspace', 'workspace'],
  ['-c', 'config'],
  ['--config', 'config'],
  ['-p', 'port'],
  ['--port', 'port'],
  ['--host', 'host'],
  ['--token', 'token'],
]);

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ValidationError(`Invalid port: ${raw}`);
  }
  return port;
}

/**
 * Parses `argv` (without the node and script entries). Accepts both
 * `--flag value` and `--flag=value`.
 *
 * @throws ValidationError on an unknown flag, a missing value or a bad port.
 */
export function parseCliArgs(argv: string[], cwd: string = process.cwd()): CliArgs {
  const result: CliArgs = { help: false, version: false, workspaceRoot: cwd, flags: {} };

  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    if (arg === '-h' || arg === '--help') {
      result.help = true;
      continue;
    }
    if (arg === '-v' || arg === '--version') {
      result.version = true;
      continue;
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq > 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS.get(name);
    if (!key) {
      throw new ValidationError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      index += 1;
      value = argv[index];
    }
    if (value === undefined || value === '') {
      throw new ValidationError(`Missing value for ${name}`);
    }

    switch (key) {
      case 'workspace':
        result.workspaceRoot = resolve(cwd, value);
        break;
      case 'config':
        result.flags.configPath = resolve(cwd, value);
        break;
      case 'port':
        result.flags.gatewayPort = parsePort(value);
        break;
      case 'host':
        result.flags.gatewayHost = value;
        break;
      case 'token':
        result.flags.gatewayToken = value;
        break;
    }
  }

  return result;
}
