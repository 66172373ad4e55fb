#!/usr/bin/env node
import { runCli } from '@/commands/run';
import { createRuntime } from '@/runtime/bootstrap';
import { registerShutdownHandlers } from '@/runtime/shutdown';
import { createLogger } from '@/shared/logging/logger';

const runtime = createRuntime();
const shutdown = registerShutdownHandlers(runtime);
void shutdown.done.then(() => process.exit(130));

runCli(process.argv.slice(2), runtime, (line) => process.stdout.write(`${line}\n`))
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    const log = createLogger('Cli');
    const message = error instanceof Error ? error.message : String(error);
    log.error('fatal command error', { message });
    process.exit(1);
  });
