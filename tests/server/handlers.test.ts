/**
 * Tests for the web UI route handlers
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { createRouteHandlers, type HandlerDeps } from '../../src/server/handlers.js';
import { chatSettingsFor } from '../../src/adapters/index.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { NetlifyCli } from '../../src/deploy/netlify-cli.js';
import type { RunOptions } from '../../src/deploy/runner.js';
import type { CommandResult } from '../../src/types/netlify.js';
import type { ProjectAnalysis } from '../../src/types/project.js';

const ANALYSIS: ProjectAnalysis = {
  root: '/projects/demo',
  type: 'static',
  typeLabel: 'Static site (HTML/CSS/JS)',
  publishDirectory: '.',
  detectedFiles: {
    html: true,
    python: false,
    node: false,
    manifest: false,
    envFile: false,
    envExample: false,
    gitignore: false,
    requirements: false,
  },
  pythonFiles: [],
  requiredEnvVars: [],
  fileList: ['index.html'],
  fileCount: 1,
};

function output(stdout: string, exitCode: number | null = 0, stderr = ''): CommandResult {
  return { exitCode, stdout, stderr };
}

function setup() {
  const runner = vi.fn(
    async (_command: string, _args: readonly string[], _options: RunOptions): Promise<CommandResult> =>
      output('')
  );
  const deps = {
    analyze: vi.fn(async (_projectPath: string) => ANALYSIS),
    generate: vi.fn(async () => [{ file: 'netlify.toml', status: 'written' as const }]),
    createCli: vi.fn((cwd: string) => new NetlifyCli(cwd, { runner })),
    chat: vi.fn(async () => ({ success: true, reply: 'Hello' })),
    testConnection: vi.fn(async () => ({ success: true, reply: 'OK' })),
    settings: DEFAULT_CONFIG,
  } satisfies HandlerDeps;

  return { runner, deps, handlers: createRouteHandlers(deps) };
}

describe('route handlers', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'deploy-studio-handlers-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('browseFolder', () => {
    it('lists visible subdirectories in order', async () => {
      for (const dir of ['beta', 'alpha', '.hidden', 'node_modules']) {
        await fs.mkdir(path.join(tmpDir, dir));
      }
      await fs.writeFile(path.join(tmpDir, 'file.txt'), '');

      const { handlers } = setup();

      expect(await handlers.browseFolder({ path: tmpDir })).toEqual({
        success: true,
        path: tmpDir,
        parent: path.dirname(tmpDir),
        directories: ['alpha', 'beta'],
      });
    });

    it('reports a missing directory', async () => {
      const missing = path.join(tmpDir, 'missing');
      const { handlers } = setup();

      expect(await handlers.browseFolder({ path: missing })).toEqual({
        success: false,
        error: `Path does not exist: ${missing}`,
      });
    });

    it('has no parent at the filesystem root', async () => {
      const { handlers } = setup();
      const result = await handlers.browseFolder({ path: path.parse(tmpDir).root });

      expect(result.parent).toBeNull();
    });
  });

  describe('analyze', () => {
    it('returns the analysis and its file list', async () => {
      const { deps, handlers } = setup();

      expect(await handlers.analyze({ path: '/projects/demo' })).toEqual({
        success: true,
        analysis: ANALYSIS,
        fileTree: ['index.html'],
      });
      expect(deps.analyze).toHaveBeenCalledWith('/projects/demo');
    });

    it('defaults to the current directory', async () => {
      const { deps, handlers } = setup();
      await handlers.analyze(undefined);

      expect(deps.analyze).toHaveBeenCalledWith('.');
    });

    it('turns analyzer errors into failures', async () => {
      const { deps, handlers } = setup();
      deps.analyze.mockRejectedValueOnce(new Error('Path does not exist: /nope'));

      expect(await handlers.analyze({ path: '/nope' })).toEqual({
        success: false,
        error: 'Path does not exist: /nope',
      });
    });
  });

  describe('readFile', () => {
    beforeEach(async () => {
      await fs.mkdir(path.join(tmpDir, 'src'));
      await fs.writeFile(path.join(tmpDir, 'src', 'app.py'), 'print("hi")\n');
    });

    it('reads a file by relative path', async () => {
      const { handlers } = setup();

      expect(await handlers.readFile({ path: tmpDir, filename: 'src/app.py' })).toEqual({
        success: true,
        file: 'src/app.py',
        content: 'print("hi")\n',
      });
    });

    it('falls back to a search by file name', async () => {
      const { handlers } = setup();
      const result = await handlers.readFile({ path: tmpDir, filename: 'app.py' });

      expect(result.file).toBe('src/app.py');
    });

    it('reports a missing file', async () => {
      const { handlers } = setup();

      expect(await handlers.readFile({ path: tmpDir, filename: 'nope.txt' })).toEqual({
        success: false,
        error: 'File not found: nope.txt',
      });
    });

    it('refuses binary content', async () => {
      await fs.writeFile(path.join(tmpDir, 'logo.png'), Buffer.from([0x89, 0x50, 0xff, 0xfe, 0x00]));
      const { handlers } = setup();

      expect(await handlers.readFile({ path: tmpDir, filename: 'logo.png' })).toEqual({
        success: false,
        error: 'Cannot read a binary file',
      });
    });

    it('refuses paths outside the project', async () => {
      const { handlers } = setup();

      expect(await handlers.readFile({ path: tmpDir, filename: '../secret.txt' })).toEqual({
        success: false,
        error: 'Path is outside the project directory: ../secret.txt',
      });
    });

    it('validates required fields', async () => {
      const { handlers } = setup();

      expect(await handlers.readFile({ filename: 'a' })).toEqual({ success: false, error: 'Missing project path' });
      expect(await handlers.readFile({ path: tmpDir, filename: '' })).toEqual({
        success: false,
        error: 'Missing file name',
      });
    });
  });

  describe('generate', () => {
    it('maps the page config and always overwrites', async () => {
      const { deps, handlers } = setup();

      const result = await handlers.generate({
        path: '/projects/demo',
        config: { gitignore: false, functions_dir: null, build_command: 'npm run build', env_vars: ['SECRET_KEY'] },
      });

      expect(result).toEqual({ success: true, results: [{ file: 'netlify.toml', status: 'written' }] });
      expect(deps.generate).toHaveBeenCalledWith('/projects/demo', {
        netlifyToml: undefined,
        gitignore: false,
        envExample: undefined,
        requirements: undefined,
        publishDirectory: '.',
        functionsDirectory: undefined,
        buildCommand: 'npm run build',
        pythonVersion: '3.10',
        envVars: ['SECRET_KEY'],
        force: true,
      });
    });
  });

  describe('netlify actions', () => {
    it('checks the CLI and login state', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('netlify-cli/17.0.0')).mockResolvedValueOnce(output('Logged in as: Test User'));

      expect(await handlers.checkCli({})).toEqual({ success: true, cliInstalled: true, loggedIn: true });
    });

    it('skips the login check when the CLI is missing', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce({ exitCode: null, stdout: '', stderr: '', spawnError: 'spawn netlify ENOENT' });

      expect(await handlers.checkCli({})).toEqual({ success: true, cliInstalled: false, loggedIn: false });
      expect(runner).toHaveBeenCalledTimes(1);
    });

    it('does not log in twice', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('Logged in as: Test User'));

      expect(await handlers.login({})).toEqual({
        success: true,
        message: 'Already logged in to Netlify',
        stdout: '',
      });
      expect(runner).toHaveBeenCalledTimes(1);
    });

    it('reports a failed login with an error', async () => {
      const { runner, handlers } = setup();
      runner
        .mockResolvedValueOnce(output('Not logged in', 1))
        .mockResolvedValueOnce(output('', 1, 'Authorization timed out'));

      expect(await handlers.login({})).toEqual({
        success: false,
        message: 'Login failed or was cancelled',
        stdout: '',
        stderr: 'Authorization timed out',
        error: 'Login failed or was cancelled',
      });
    });

    it('lists sites up to the configured limit', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('[{"name":"demo","ssl_url":"https://demo.netlify.app"}]'));

      expect(await handlers.listSites({})).toEqual({
        success: true,
        sites: [{ name: 'demo', url: 'https://demo.netlify.app', updated: '' }],
      });
    });

    it('reports a listing failure', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('not json'));

      expect(await handlers.listTeams({})).toEqual({
        success: false,
        error: 'Failed to parse team list: output is not JSON',
      });
    });

    it('creates a site in the project directory', async () => {
      const { deps, runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('')).mockResolvedValueOnce(output('Site Created'));

      const result = await handlers.initSite({ path: tmpDir, site_name: 'demo' });

      expect(deps.createCli).toHaveBeenCalledWith(tmpDir);
      expect(result.success).toBe(true);
      expect(result.message).toBe('Site created and linked');
    });

    it('adds an error message when the rename fails', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('', 1, 'Error: name taken'));

      const result = await handlers.updateDomain({ path: tmpDir, new_name: 'taken' });

      expect(result.success).toBe(false);
      expect(result.error).toBe('Failed to update site name');
    });

    it('asks for a new site name', async () => {
      const { handlers } = setup();

      expect(await handlers.updateDomain({ path: tmpDir })).toEqual({
        success: false,
        error: 'Please enter a new site name',
      });
    });

    it('deploys and returns the site URL', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('Website URL: https://demo.netlify.app'));

      expect(await handlers.deploy({ path: tmpDir, type: 'production' })).toEqual({
        success: true,
        url: 'https://demo.netlify.app',
        stdout: 'Website URL: https://demo.netlify.app',
        stderr: '',
      });
      expect(runner).toHaveBeenCalledWith('netlify', ['deploy', '--prod'], { cwd: tmpDir, interactive: false });
    });

    it('reports a failed deploy', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('', 1, 'Error: no site'));

      expect(await handlers.deploy({ path: tmpDir })).toEqual({
        success: false,
        url: null,
        stdout: '',
        stderr: 'Error: no site',
        error: 'Deploy failed',
      });
    });

    it('rejects an unknown deploy type', async () => {
      const { handlers } = setup();
      const result = await handlers.deploy({ path: tmpDir, type: 'staging' });

      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^type: /);
    });

    it('runs a passthrough command', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('Current site: demo'));

      expect(await handlers.runCommand({ path: tmpDir, command: ['netlify', 'status'] })).toEqual({
        success: true,
        stdout: 'Current site: demo',
        stderr: '',
      });
      expect(runner).toHaveBeenCalledWith('netlify', ['status'], { cwd: tmpDir, interactive: false });
    });

    it('reports a failing command with its exit code', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce(output('', 2, 'Unknown command'));

      expect(await handlers.runCommand({ path: tmpDir, command: ['bogus'] })).toEqual({
        success: false,
        stdout: '',
        stderr: 'Unknown command',
        error: 'Command exited with code 2',
      });
    });

    it('reports a command that could not start', async () => {
      const { runner, handlers } = setup();
      runner.mockResolvedValueOnce({ exitCode: null, stdout: '', stderr: '', spawnError: 'spawn netlify ENOENT' });

      expect(await handlers.runCommand({ path: tmpDir, command: ['status'] })).toEqual({
        success: false,
        stdout: '',
        stderr: 'spawn netlify ENOENT',
        error: 'spawn netlify ENOENT',
      });
    });

    it('requires a command', async () => {
      const { handlers } = setup();

      expect(await handlers.runCommand({ path: tmpDir, command: [] })).toEqual({
        success: false,
        error: 'No command given',
      });
      expect(await handlers.runCommand({ path: tmpDir })).toEqual({ success: false, error: 'No command given' });
    });
  });

  describe('chat', () => {
    it('uses the default provider and drops empty context', async () => {
      const { deps, handlers } = setup();

      expect(await handlers.chat({ message: 'hi', api_key: 'test-secret', context: null })).toEqual({
        success: true,
        reply: 'Hello',
      });
      expect(deps.chat).toHaveBeenCalledWith(
        { provider: 'openai', apiKey: 'test-secret', message: 'hi' },
        chatSettingsFor(DEFAULT_CONFIG.ai, 'openai')
      );
    });

    it('passes context and provider through', async () => {
      const { deps, handlers } = setup();
      await handlers.chat({ message: 'hi', provider: 'google', api_key: 'test-secret', context: 'type=static' });

      expect(deps.chat).toHaveBeenCalledWith(
        { provider: 'google', apiKey: 'test-secret', message: 'hi', context: 'type=static' },
        chatSettingsFor(DEFAULT_CONFIG.ai, 'google')
      );
    });

    it('rejects an unknown provider', async () => {
      const { deps, handlers } = setup();

      expect(await handlers.chat({ message: 'hi', provider: 'acme' })).toEqual({
        success: false,
        error: 'Unsupported AI provider: acme',
      });
      expect(deps.chat).not.toHaveBeenCalled();
    });

    it('tests a connection for the chosen provider', async () => {
      const { deps, handlers } = setup();

      expect(await handlers.testConnection({ provider: 'anthropic', api_key: 'test-secret' })).toEqual({
        success: true,
        reply: 'OK',
      });
      expect(deps.testConnection).toHaveBeenCalledWith(
        'anthropic',
        'test-secret',
        chatSettingsFor(DEFAULT_CONFIG.ai, 'anthropic')
      );
    });
  });
});
