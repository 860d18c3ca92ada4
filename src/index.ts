import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { loadConfig } from './config/loader.js';
import { errorMessage } from './errors.js';
import { runCdc } from './pipeline/orchestrator.js';
import { createRuntime } from './runtime.js';

// Scheduled entry point: one run over every configured table, summary JSON on stdout.

const configPath = process.argv[2] ?? process.env.SNAPDIFF_CONFIG ?? resolve('snapdiff.yaml');

if (!existsSync(configPath)) {
  console.error('snapdiff v0.1.0');
  console.error(`\nNo config file found at: ${configPath}`);
  console.error("Run 'npx snapdiff init' to get started.");
  process.exit(1);
}

try {
  const runtime = createRuntime(loadConfig(configPath));
  const controller = new AbortController();
  const cancel = (): void => {
    runtime.ctx.logger.warn('Cancellation requested; finishing tables already in progress');
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const { summary } = await runCdc(runtime.ctx, { signal: controller.signal });
    console.log(JSON.stringify(summary));
  } finally {
    runtime.close();
  }
} catch (err) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}
