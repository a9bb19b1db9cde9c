import { ChildProcess, spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import { once } from 'events';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { flaskArgs, launchDetached } from '../../src/launch.js';
import type { LaunchOptions, SpawnFn } from '../../src/launch.js';
import { BootstrapError } from '../../src/errors.js';

describe('flaskArgs', () => {
	it('builds the flask run command line', () => {
		expect(flaskArgs({ app: 'app_flask.py', host: '0.0.0.0', port: 5000 })).toEqual([
			'-m',
			'flask',
			'--app',
			'app_flask.py',
			'run',
			'--host=0.0.0.0',
			'--port=5000',
		]);
	});
});

describe('launchDetached', () => {
	let dir: string;
	let options: LaunchOptions;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'devbox-launch-'));
		options = {
			python: 'python',
			app: 'app_flask.py',
			host: '0.0.0.0',
			port: 5000,
			logPath: 'logs/flask.log',
			cwd: dir,
		};
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it('spawns detached with both streams on the log file', () => {
		const spawnFn = vi.fn<Parameters<SpawnFn>, ReturnType<SpawnFn>>(() => new ChildProcess());

		const launched = launchDetached(options, spawnFn);

		expect(spawnFn).toHaveBeenCalledTimes(1);
		const [command, args, spawnOptions] = spawnFn.mock.calls[0];
		expect(command).toBe('python');
		expect(args).toEqual(flaskArgs(options));
		expect(spawnOptions.cwd).toBe(dir);
		expect(spawnOptions.detached).toBe(true);

		const stdio = spawnOptions.stdio;
		expect(Array.isArray(stdio)).toBe(true);
		if (Array.isArray(stdio)) {
			expect(stdio[0]).toBe('ignore');
			expect(typeof stdio[1]).toBe('number');
			expect(stdio[2]).toBe(stdio[1]);
		}

		expect(launched.logPath).toBe(path.join(dir, 'logs', 'flask.log'));
		expect(fs.existsSync(launched.logPath)).toBe(true);
	});

	it('truncates a previous log before launching', () => {
		const logPath = path.join(dir, 'flask.log');
		fs.writeFileSync(logPath, 'output from an earlier run\n');

		launchDetached({ ...options, logPath }, () => new ChildProcess());

		expect(fs.readFileSync(logPath, 'utf8')).toBe('');
	});

	it('keeps only the latest run in the log', async () => {
		const logPath = path.join(dir, 'flask.log');
		const nodeWriting =
			(text: string): SpawnFn =>
			(_command: string, _args: string[], spawnOptions: SpawnOptions) =>
				spawn(process.execPath, ['-e', `process.stdout.write(${JSON.stringify(text)})`], spawnOptions);

		const first = launchDetached({ ...options, logPath }, nodeWriting('first run'));
		await once(first.child, 'exit');
		expect(fs.readFileSync(logPath, 'utf8')).toBe('first run');

		const second = launchDetached({ ...options, logPath }, nodeWriting('second run'));
		await once(second.child, 'exit');
		expect(fs.readFileSync(logPath, 'utf8')).toBe('second run');
	});

	it('raises a launch BootstrapError when the log cannot be opened', () => {
		const blocker = path.join(dir, 'not-a-dir');
		fs.writeFileSync(blocker, '');
		const spawnFn = vi.fn<Parameters<SpawnFn>, ReturnType<SpawnFn>>(() => new ChildProcess());

		expect(() => launchDetached({ ...options, logPath: path.join(blocker, 'flask.log') }, spawnFn)).toThrow(
			BootstrapError
		);
		expect(spawnFn).not.toHaveBeenCalled();
	});

	it('does not raise when the spawned process fails to start', async () => {
		const launched = launchDetached(options, (_command, _args, spawnOptions) =>
			spawn('devbox-no-such-python', [], spawnOptions)
		);

		const [error] = await once(launched.child, 'error');
		expect(error).toMatchObject({ code: 'ENOENT' });
	});
});
