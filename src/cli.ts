#!/usr/bin/env node
/**
 * Interactive entry point.
 *
 * Usage: npx tsx src/cli.ts
 * Reads config.yaml (or the file named by CONFIG_PATH) and starts the menu.
 * Records live only for the life of the process.
 */

import { loadConfig } from './config/loader.js';
import { createStudentController } from './controller/StudentController.js';
import { loadSampleData } from './data/SampleData.js';
import { createTerminalIO } from './cli/io.js';
import { StudentMenu } from './cli/StudentMenu.js';

async function main() {
  const config = await loadConfig();
  const io = createTerminalIO();

  const menu = new StudentMenu({
    controller: createStudentController(),
    io,
    config: config.cli,
    loadSamples: () => loadSampleData(config.sampleData.path),
  });

  try {
    await menu.run();
  } finally {
    io.close();
  }
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
