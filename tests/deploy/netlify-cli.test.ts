/**
 * Tests for the Netlify CLI wrapper
 */

import { describe, it, expect, vi } from 'vitest';
import { NetlifyCli, netlifyCliFactory } from '../../src/deploy/netlify-cli.js';
import type { RunOptions } from '../../src/deploy/runner.js';
import type { CommandResult } from '../../src/types/netlify.js';

function output(stdout: string, exitCode: number | null = 0, stderr = ''): CommandResult {
  return { exitCode, stdout, stderr };
}

function fakeRunner(...results: CommandResult[]) {
  const runner = vi.fn(
    async (_command: string, _args: readonly string[], _options: RunOptions): Promise<CommandResult> =>
      output('')
  );
  for (const next of results) {
    runner.mockResolvedValueOnce(next);
  }
  return runner;
}

describe('NetlifyCli', () => {
  it('runs the binary in the project directory', async () => {
    const runner = fakeRunner(output('netlify-cli/17.0.0 linux-x64\n'));
    const cli = new NetlifyCli('/projects/demo', { runner });

    expect(await cli.version()).toBe('netlify-cli/17.0.0 linux-x64');
    expect(runner).toHaveBeenCalledWith('netlify', ['--version'], {
      cwd: '/projects/demo',
      interactive: false,
    });
  });

  it('reports not installed when the binary cannot start', async () => {
    const runner = fakeRunner({ exitCode: null, stdout: '', stderr: '', spawnError: 'spawn netlify ENOENT' });

    expect(await new NetlifyCli('/p', { runner }).isInstalled()).toBe(false);
  });

  it('uses a configured binary name', async () => {
    const runner = fakeRunner();
    await new NetlifyCli('/p', { command: 'ntl', runner }).status();

    expect(runner).toHaveBeenCalledWith('ntl', ['status'], { cwd: '/p', interactive: false });
  });

  it('checks login through status', async () => {
    const loggedIn = new NetlifyCli('/p', { runner: fakeRunner(output('Logged in as: Test User')) });
    const loggedOut = new NetlifyCli('/p', { runner: fakeRunner(output('Not logged in')) });

    expect(await loggedIn.isLoggedIn()).toBe(true);
    expect(await loggedOut.isLoggedIn()).toBe(false);
  });

  describe('login', () => {
    it('hands the terminal over when interactive', async () => {
      const runner = fakeRunner(output(''));
      const result = await new NetlifyCli('/p', { runner }).login(true);

      expect(runner).toHaveBeenCalledWith('netlify', ['login'], { cwd: '/p', interactive: true });
      expect(result.success).toBe(true);
      expect(result.message).toBe('Logged in to Netlify');
    });

    it('accepts a success phrase despite a non-zero exit', async () => {
      const runner = fakeRunner(output('', 1, 'You are now logged in'));

      expect((await new NetlifyCli('/p', { runner }).login()).success).toBe(true);
    });

    it('fails otherwise', async () => {
      const runner = fakeRunner(output('', 1, 'Authorization denied'));
      const result = await new NetlifyCli('/p', { runner }).login();

      expect(result).toEqual({
        success: false,
        message: 'Login failed or was cancelled',
        stdout: '',
        stderr: 'Authorization denied',
      });
    });
  });

  describe('createSite', () => {
    it('does nothing when a site is already linked', async () => {
      const runner = fakeRunner(output('Current site: demo'));
      const result = await new NetlifyCli('/p', { runner }).createSite({ name: 'demo' });

      expect(runner).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(true);
      expect(result.alreadyLinked).toBe(true);
      expect(result.message).toBe('Site already linked');
    });

    it('passes name and team to sites:create', async () => {
      const runner = fakeRunner(output('No site linked'), output('Site Created'));
      const result = await new NetlifyCli('/p', { runner }).createSite({
        name: 'demo',
        accountSlug: 'team-a',
      });

      expect(runner).toHaveBeenLastCalledWith(
        'netlify',
        ['sites:create', '--name', 'demo', '--account-slug', 'team-a'],
        { cwd: '/p', interactive: false }
      );
      expect(result.success).toBe(true);
      expect(result.message).toBe('Site created and linked');
      expect(result.alreadyLinked).toBeUndefined();
    });

    it('reports failure', async () => {
      const runner = fakeRunner(output(''), output('', 1, 'Error: name taken'));
      const result = await new NetlifyCli('/p', { runner }).createSite();

      expect(runner).toHaveBeenLastCalledWith('netlify', ['sites:create'], { cwd: '/p', interactive: false });
      expect(result.success).toBe(false);
      expect(result.message).toBe('Failed to create site');
    });
  });

  it('renames the site', async () => {
    const runner = fakeRunner(output('Site updated'));
    const result = await new NetlifyCli('/p', { runner }).updateSiteName('new-name');

    expect(runner).toHaveBeenCalledWith('netlify', ['sites:update', '--name', 'new-name'], {
      cwd: '/p',
      interactive: false,
    });
    expect(result.message).toBe('Domain updated to new-name.netlify.app');
  });

  it('sets an environment variable', async () => {
    const runner = fakeRunner(output(''));
    const result = await new NetlifyCli('/p', { runner }).setEnvVar('OPENAI_API_KEY', 'test-secret');

    expect(runner).toHaveBeenCalledWith('netlify', ['env:set', 'OPENAI_API_KEY', 'test-secret'], {
      cwd: '/p',
      interactive: false,
    });
    expect(result.message).toBe('Set OPENAI_API_KEY');
  });

  it('deploys to production with --prod', async () => {
    const runner = fakeRunner(output('Website URL: https://demo.netlify.app'));
    const outcome = await new NetlifyCli('/p', { runner }).deploy('production');

    expect(runner).toHaveBeenCalledWith('netlify', ['deploy', '--prod'], { cwd: '/p', interactive: false });
    expect(outcome.url).toBe('https://demo.netlify.app');
    expect(outcome.target).toBe('production');
  });

  it('deploys a preview without --prod', async () => {
    const runner = fakeRunner(output(''));
    await new NetlifyCli('/p', { runner }).deploy('preview');

    expect(runner).toHaveBeenCalledWith('netlify', ['deploy'], { cwd: '/p', interactive: false });
  });

  it('lists teams and sites as JSON', async () => {
    const runner = fakeRunner(
      output('[{"name":"Team A","slug":"team-a","id":"t1"}]'),
      output('[{"name":"a"},{"name":"b"},{"name":"c"}]')
    );
    const cli = new NetlifyCli('/p', { runner });

    expect(await cli.listTeams()).toEqual([{ name: 'Team A', slug: 'team-a', id: 't1' }]);
    expect((await cli.listSites(2)).map((site) => site.name)).toEqual(['a', 'b']);
    expect(runner).toHaveBeenNthCalledWith(1, 'netlify', ['teams:list', '--json'], expect.anything());
    expect(runner).toHaveBeenNthCalledWith(2, 'netlify', ['sites:list', '--json'], expect.anything());
  });

  it('drops a leading netlify from passthrough args', async () => {
    const runner = fakeRunner(output('ok'), output('ok'));
    const cli = new NetlifyCli('/p', { command: 'ntl', runner });

    await cli.run(['netlify', 'status', '--verbose']);
    await cli.run(['open']);

    expect(runner).toHaveBeenNthCalledWith(1, 'ntl', ['status', '--verbose'], expect.anything());
    expect(runner).toHaveBeenNthCalledWith(2, 'ntl', ['open'], expect.anything());
  });
});

describe('netlifyCliFactory', () => {
  it('binds the configured binary', () => {
    const cli = netlifyCliFactory({ command: 'ntl' })('/projects/demo');

    expect(cli.command).toBe('ntl');
    expect(cli.cwd).toBe('/projects/demo');
  });
});
