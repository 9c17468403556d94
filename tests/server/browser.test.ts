/**
 * Tests for the browser opener
 */

import { describe, it, expect } from 'vitest';
import { openerCommand } from '../../src/server/browser.js';

describe('openerCommand', () => {
  const url = 'http://127.0.0.1:5886';

  it('uses open on macOS', () => {
    expect(openerCommand(url, 'darwin')).toEqual({ command: 'open', args: [url] });
  });

  it('uses start through cmd on Windows', () => {
    expect(openerCommand(url, 'win32')).toEqual({ command: 'cmd', args: ['/c', 'start', '""', url] });
  });

  it('uses xdg-open elsewhere', () => {
    expect(openerCommand(url, 'linux')).toEqual({ command: 'xdg-open', args: [url] });
  });
});
