/**
 * Demo entry point: `npm run build && npm run demo`.
 *
 * Reads SPECWISE_LOG_LEVEL, SPECWISE_DOMESTIC_COUNTRY and NODE_ENV.
 */

import * as readline from 'node:readline';
import { consoleLogger, resolveOptions } from '../src';
import { ConsoleMenu, MenuIO } from './console/ConsoleMenu';
import { SIMPLE_SCENARIOS } from './simple/scenarios';
import { loadSampleData } from './warehouse/data/sampleData';
import { createWarehouseScenarios } from './warehouse/scenarios';

async function main(): Promise<void> {
  const options = resolveOptions();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  const io: MenuIO = {
    readLine: async (prompt) => {
      process.stdout.write(prompt);
      const next = await lines.next();
      return next.done ? undefined : next.value;
    },
    writeLine: (line) => process.stdout.write(`${line}\n`),
  };

  options.logger.debug(`Starting ${options.name} (${options.environment})`);

  const menu = new ConsoleMenu({
    io,
    logger: options.logger,
    simpleScenarios: SIMPLE_SCENARIOS,
    warehouseScenarios: createWarehouseScenarios({
      data: loadSampleData(options.clock),
      clock: options.clock,
      domesticCountry: options.domesticCountry,
    }),
  });

  try {
    await menu.run();
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  consoleLogger.error('Demo failed:', error);
  process.exitCode = 1;
});
