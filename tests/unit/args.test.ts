import { describe, it, expect } from 'vitest';
import { parseCliArgs, UsageError } from '../../src/utils/args.js';
import { DEFAULT_OPTIONS } from '../../src/index.js';

describe('parseCliArgs', () => {
	it('runs a full bootstrap with defaults when given no arguments', () => {
		expect(parseCliArgs([], '/work')).toEqual({
			command: 'bootstrap',
			options: { cwd: '/work', ...DEFAULT_OPTIONS },
		});
	});

	it('applies long and short flags', () => {
		const { command, options } = parseCliArgs(
			['-e', '.env.local', '--manifest', 'reqs.txt', '-l', 'out.log', '--python', 'python3', '--app', 'app.py', '--host', '127.0.0.1', '-p', '8000', '--skip-install'],
			'/work'
		);

		expect(command).toBe('bootstrap');
		expect(options).toEqual({
			cwd: '/work',
			envFile: '.env.local',
			manifest: 'reqs.txt',
			logFile: 'out.log',
			python: 'python3',
			app: 'app.py',
			host: '127.0.0.1',
			port: 8000,
			skipInstall: true,
		});
	});

	it('recognises the settings subcommand', () => {
		const parsed = parseCliArgs(['settings', '--env-file', 'staging.env'], '/work');

		expect(parsed.command).toBe('settings');
		expect(parsed.options.envFile).toBe('staging.env');
	});

	it('returns help for -h', () => {
		expect(parseCliArgs(['--port', '9000', '-h'], '/work').command).toBe('help');
	});

	it('rejects unknown arguments', () => {
		expect(() => parseCliArgs(['--verbose'], '/work')).toThrow(new UsageError('Unknown argument: --verbose'));
	});

	it.each(['constructor', 'toString', '__proto__', 'hasOwnProperty'])('rejects the built-in object name %s', (name) => {
		expect(() => parseCliArgs([name, 'x'], '/work')).toThrow(new UsageError(`Unknown argument: ${name}`));
	});

	it('rejects a flag without its value', () => {
		expect(() => parseCliArgs(['--port'], '/work')).toThrow('Missing value for --port');
		expect(() => parseCliArgs(['--manifest', '--skip-install'], '/work')).toThrow('Missing value for --manifest');
	});

	it('rejects ports outside 1-65535', () => {
		expect(() => parseCliArgs(['-p', '70000'], '/work')).toThrow('Invalid port: 70000');
		expect(() => parseCliArgs(['-p', 'http'], '/work')).toThrow('Invalid port: http');
	});
});
