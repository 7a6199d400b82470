import { parseArgs, getStringFlag } from './parser.js';
import { createOutput, Output } from './output.js';
import { getCommand, commands } from './commands/index.js';
import { loadConfig } from '../config/loader.js';
import type { PartialConfig, PostureConfig } from '../config/schema.js';
import { createLogger, isLogLevel } from '../observability/logger.js';
import { VERSION } from '../index.js';

// Import commands to register them
import './commands/serve.js';
import './commands/analyze.js';
import './commands/tips.js';

export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  const output = createOutput({ json: args.flags['json'] === true });

  if (args.flags['version'] || args.flags['v']) {
    output.log(`posture v${VERSION}`);
    return 0;
  }

  if (args.flags['help'] || args.flags['h'] || !args.command) {
    printHelp(output);
    return 0;
  }

  const cmd = getCommand(args.command);
  if (!cmd) {
    output.error(`Unknown command: ${args.command}`);
    output.log(`Run 'posture --help' for usage.`);
    return 1;
  }

  const cliFlags: PartialConfig = {};
  const logLevel = getStringFlag(args, 'log-level');
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      output.error(`Invalid --log-level: ${logLevel}`);
      return 1;
    }
    cliFlags.logLevel = logLevel;
  }

  let config: PostureConfig;
  try {
    config = await loadConfig({ cliFlags, configPath: getStringFlag(args, 'config') });
  } catch (error) {
    output.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  createLogger({ level: config.logLevel, json: config.logJson });

  return cmd.run({ args, output, config });
}

function printHelp(output: Output): void {
  output.log(`posture v${VERSION} - Posture scoring and feedback`);
  output.log('');
  output.log('Usage: posture <command> [options]');
  output.log('');
  output.log('Commands:');
  for (const [name, cmd] of commands) {
    output.log(`  ${name.padEnd(12)} ${cmd.description}`);
    output.log(`  ${''.padEnd(12)} posture ${cmd.usage}`);
  }
  output.log('');
  output.log('Global Options:');
  output.log('  --help, -h       Show this help message');
  output.log('  --version, -v    Show version');
  output.log('  --json           Output as JSON');
  output.log('  --log-level      Set log level (debug, info, warn, error, silent)');
  output.log('  --config         Path to config file');
}
