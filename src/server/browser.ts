/**
 * Open the web UI in the user's default browser
 */

import { spawn } from 'node:child_process';
import { printDebug, printWarning } from '../cli/output.js';

/**
 * Platform opener command for a URL
 */
export function openerCommand(
  url: string,
  platform: NodeJS.Platform = process.platform
): { command: string; args: string[] } {
  if (platform === 'win32') {
    // `start` treats the first quoted argument as a window title
    return { command: 'cmd', args: ['/c', 'start', '""', url] };
  }
  if (platform === 'darwin') {
    return { command: 'open', args: [url] };
  }
  return { command: 'xdg-open', args: [url] };
}

export function openBrowser(url: string): void {
  const { command, args } = openerCommand(url);
  const child = spawn(command, args, { stdio: 'ignore', detached: true });
  child.on('error', (error) => {
    printWarning(`Could not open a browser: ${error.message}. Visit ${url} instead.`);
  });
  child.unref();
}

/**
 * Open the browser after a delay so the server is listening first.
 * The timer does not keep the process alive.
 */
export function openBrowserLater(url: string, delayMs: number): void {
  const timer = setTimeout(() => {
    printDebug(`Opening ${url}`);
    openBrowser(url);
  }, delayMs);
  timer.unref();
}
