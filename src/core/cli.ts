#!/usr/bin/env node
/**
 * core/cli.ts
 *
 * The single entry point. Takes no arguments. Orchestrates startup in order:
 *   1. Load .env from the config directory
 *   2. Resolve the config (file + SAVECB_* overrides)
 *   3. Initialise the logger
 *   4. Import the backends (triggers self-registration)
 *   5. Resolve the clipboard and dialog backends for this session
 *   6. Run one export
 *
 * The exit status is always 0; outcomes are communicated only through the
 * printed messages.
 */

import { loadConfig, loadEnvFile } from './config';
import { initLogger, scopedLogger } from './logger';
import { describeError } from './errors';
import { ClipboardBackend, DialogBackend, ExportOutcome, Reporter } from './types';

export const consoleReporter: Reporter = {
  info: (message) => { process.stdout.write(`${message}\n`); },
  error: (message) => { process.stderr.write(`${message}\n`); }
};

export async function main(
  env: NodeJS.ProcessEnv = process.env,
  reporter: Reporter = consoleReporter
): Promise<ExportOutcome | null> {
  const envFile = loadEnvFile(env);

  const { config, configPath, fileLoaded, warnings } = loadConfig(env);

  initLogger(config);
  const log = scopedLogger('core/cli');
  for (const warning of warnings) log.warn(warning);
  log.debug({ config, configPath, fileLoaded, envFile }, 'Configuration resolved');

  // Loaded only now so their module-level loggers pick up the configured level
  const { clipboardBackends, dialogBackends } = await import('./registry');
  await import('../clipboard');
  await import('../dialog');
  const { ClipboardExporter } = await import('./exporter');

  let clipboard: ClipboardBackend;
  let dialog: DialogBackend;
  try {
    clipboard = clipboardBackends.create(config.clipboardBackend, env, { timeoutMs: config.clipboardTimeoutMs });
    dialog = dialogBackends.create(config.dialogBackend, env, {});
  } catch (e) {
    const { code, message } = describeError(e);
    log.warn({ code, error: message }, 'Backend resolution failed');
    reporter.error(`Error: ${message}`);
    return null;
  }

  log.debug({ clipboard: clipboard.name, dialog: dialog.name }, 'Backends selected');
  return new ClipboardExporter({ clipboard, dialog, reporter, config }).run();
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

if (require.main === module) {
  main().then(
    () => process.exit(0),
    (e: unknown) => {
      process.stderr.write(`Unexpected error: ${describeError(e).message}\n`);
      process.exit(0);
    }
  );
}
