#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { PipelineError } from './errors.js';
import { OpenAiTextGenerator } from './generator/llm.js';
import { createMetabaseClient } from './metabase/client.js';
import { PipelineRunner } from './pipeline/runner.js';
import { getLogger } from './utils/logger.js';
import { USAGE, parseArgs } from './cli/args.js';

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  if (command.name === 'help') {
    console.error(USAGE);
    process.exitCode = command.invalid ? 2 : 0;
    return;
  }

  try {
    loadConfig();
    const logger = getLogger();
    const runner = new PipelineRunner(createMetabaseClient(), new OpenAiTextGenerator());

    const report =
      command.name === 'run'
        ? await runner.run({ register: command.register, replaceExisting: command.replaceExisting })
        : await runner.registerDocument(command.file, { replaceExisting: command.replaceExisting, limit: command.limit });

    logger.info({ failures: report.failures.length, registration: report.registration }, 'Run finished');
    console.log(JSON.stringify(report, null, 2));
  } catch (err) {
    if (err instanceof PipelineError) {
      console.error(JSON.stringify(err.toJSON(), null, 2));
    } else {
      console.error('KPI pipeline failed:', err);
    }
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error('KPI pipeline failed:', err);
  process.exit(1);
});
