import { describe, expect, test } from 'vitest';
import { parseCliArgs } from '../src/core/app/cli.js';

describe('parseCliArgs', () => {
  test('defaults to the current directory with no flags', () => {
    expect(parseCliArgs([], '/work')).toEqual({ help: false, version: false, workspaceRoot: '/work', flags: {} });
  });

  test('reads separate and inline values', () => {
    const args = parseCliArgs(
      ['-w', 'project', '--port=8080', '--host', '0.0.0.0', '--token', 'test-secret', '-c', 'conf/taskdeck.json'],
      '/work'
    );
    expect(args.workspaceRoot).toBe('/work/project');
    expect(args.flags).toEqual({
      gatewayPort: 8080,
      gatewayHost: '0.0.0.0',
      gatewayToken: 'test-secret',
      configPath: '/work/conf/taskdeck.json',
    });
  });

  test('recognizes help and version', () => {
    expect(parseCliArgs(['--help'], '/work').help).toBe(true);
    expect(parseCliArgs(['-v'], '/work').version).toBe(true);
  });

  test('rejects unknown options, missing values and bad ports', () => {
    expect(() => parseCliArgs(['--verbose'], '/work')).toThrow('Unknown option: --verbose');
    expect(() => parseCliArgs(['--port'], '/work')).toThrow('Missing value for --port');
    expect(() => parseCliArgs(['--token='], '/work')).toThrow('Missing value for --token');
    expect(() => parseCliArgs(['-p', '70000'], '/work')).toThrow('Invalid port: 70000');
  });
});
