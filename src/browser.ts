/**
 * Browser Module
 * Opens URLs with the host's default-application launcher
 */

import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import type { BrowserOpener } from './types.js';

export interface LaunchCommand {
  file: string;
  args: string[];
}

/** The part of a child process the launcher needs */
export interface LaunchedProcess {
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  unref(): void;
}

export type Launcher = (file: string, args: string[], options: SpawnOptions) => LaunchedProcess;

const spawnLauncher: Launcher = (file, args, options) => spawn(file, args, options);

export class SystemBrowser implements BrowserOpener {
  private platform: NodeJS.Platform;
  private launch: Launcher;

  constructor(platform: NodeJS.Platform = process.platform, launch: Launcher = spawnLauncher) {
    this.platform = platform;
    this.launch = launch;
  }

  commandFor(url: string): LaunchCommand {
    switch (this.platform) {
      case 'darwin':
        return { file: 'open', args: [url] };
      case 'win32':
        // cmd treats & as a command separator
        return { file: 'cmd', args: ['/c', 'start', '""', url.replace(/&/g, '^&')] };
      default:
        return { file: 'xdg-open', args: [url] };
    }
  }

  /**
   * Resolves once the launcher is running; the browser itself is not awaited
   */
  open(url: string): Promise<void> {
    const { file, args } = this.commandFor(url);

    return new Promise((resolve, reject) => {
      const child = this.launch(file, args, {
        detached: true,
        stdio: 'ignore',
        windowsVerbatimArguments: this.platform === 'win32'
      });

      child.once('error', (err) => {
        reject(new Error(`Failed to start ${file}: ${err.message}`));
      });

      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }
}
