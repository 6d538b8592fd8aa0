#!/usr/bin/env node
import { CLIParser } from './cli/CLIParser';
import type { CLIOptions } from './cli/CLIParser';
import { runDiff, runReport, runMerge, runFold, runUnique } from './cli/Commands';
import type { CommandContext } from './cli/Commands';
import { resolveConfig } from './common/Config';
import type { ReconcileConfig } from './common/Config';
import { ConsoleLogger } from './common/Logger';
import { SectionConfig } from './config/SectionConfig';
import { HTTPServer } from './server/HTTPServer';

async function loadConfig(options: CLIOptions): Promise<ReconcileConfig> {
  if (!options.configPath) {
    return resolveConfig(options.overrides);
  }

  const sections = await SectionConfig.load(options.configPath, options.sections);
  return resolveConfig({ ...sections.toReconcileConfig(), ...options.overrides });
}

function requireFile(files: string[], index: number): string {
  const file = files[index];
  if (file === undefined) {
    throw new Error(`Missing input file #${index + 1}`);
  }
  return file;
}

async function serve(config: ReconcileConfig, logger: ConsoleLogger): Promise<void> {
  const server = new HTTPServer(config, logger);

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down gracefully...');
    await server.stop();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((err) => {
      logger.error('Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await server.start();
}

async function main(): Promise<void> {
  const options = new CLIParser().parse();

  if (options.help || options.command === null) {
    CLIParser.printHelp();
    return;
  }

  const config = await loadConfig(options);
  const logger = new ConsoleLogger();
  const ctx: CommandContext = { config, out: process.stdout, logger };
  const { files } = options;

  switch (options.command) {
    case 'diff':
      runDiff(requireFile(files, 0), requireFile(files, 1), ctx);
      break;
    case 'report':
      runReport(requireFile(files, 0), requireFile(files, 1), ctx);
      break;
    case 'merge':
      runMerge(files, ctx);
      break;
    case 'fold':
      runFold(requireFile(files, 0), ctx);
      break;
    case 'unique':
      runUnique(requireFile(files, 0), ctx);
      break;
    case 'serve':
      await serve(config, logger);
      break;
  }
}

main().catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
