#!/usr/bin/env node

import { fileURLToPath } from 'url';
import { BookmarksApp } from './bookmarks.js';
import { SystemBrowser } from './browser.js';
import { CliOptions, loadSettings } from './cli-options.js';
import { ApplicationError, ArgumentsError } from './errors.js';
import type { BrowserOpener } from './types.js';

/**
 * Run one webmark command and return the process exit code
 */
async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  browser: BrowserOpener = new SystemBrowser()
): Promise<number> {
  const options = new CliOptions(argv);

  if (options.help) {
    console.log(options.getUsageMessage());
    return 0;
  }

  try {
    const settings = loadSettings(options, env);
    const app = new BookmarksApp(settings, browser);
    await app.run();
    return 0;
  } catch (err) {
    if (err instanceof ArgumentsError || err instanceof ApplicationError) {
      console.error(`\n❌ ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

// Main execution check
const modulePath = fileURLToPath(import.meta.url);
const scriptPath = process.argv[1];

if (scriptPath && (modulePath.endsWith(scriptPath) || scriptPath.endsWith('webmark') || scriptPath.endsWith('webmark.js'))) {
  main().then(code => {
    process.exit(code);
  }).catch(err => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n❌ Fatal error: ${message}\n`);
    if (process.env.DEBUG === '1' && err instanceof Error) {
      console.error(err.stack);
    }
    process.exit(1);
  });
}

export { main };
