/**
 * Command-line options for the service entry point.
 */

export const VERSION = '1.0.0';

export interface CliOptions {
  configPath?: string;
  testPrinter: boolean;
  testEmail: boolean;
  version: boolean;
  help: boolean;
}

export const USAGE = `Usage: mail-print-relay [options]

Options:
  -c, --config <path>  Configuration file (YAML or JSON)
  --test-printer       Check the printer connection and exit
  --test-email         Check the mailbox connection and exit
  --version            Print the version and exit
  -h, --help           Show this help`;

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    testPrinter: false,
    testEmail: false,
    version: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if ((arg === '--config' || arg === '-c') && args[i + 1]) {
      options.configPath = args[++i];
    } else if (arg.startsWith('--config=')) {
      options.configPath = arg.slice('--config='.length);
    } else if (arg === '--test-printer') {
      options.testPrinter = true;
    } else if (arg === '--test-email') {
      options.testEmail = true;
    } else if (arg === '--version') {
      options.version = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}
