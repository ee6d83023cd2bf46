import { Command, CommanderError, type OutputConfiguration } from 'commander';
import {
  AppError,
  ConfigLoader,
  ConsoleLogger,
  UsageError,
  stripTrailingSlashes,
} from '@gitree/shared';
import { TreeClassifier, type AuditMode } from '@gitree/repo';
import { version } from '../package.json';
import { OutputRenderer } from './output/renderer';

export const MODE_FLAGS: Readonly<Record<string, AuditMode>> = {
  '-1': 'layout',
  '-2': 'non-bare',
  '-3': 'stray',
  '-a': 'all',
};

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  color: boolean;
};

export interface ProgramOptions {
  /** Redirects commander's own help and error text */
  output?: OutputConfiguration;
  cwd?: string;
  /** Whether stdout is a terminal; colour is only used when it is */
  isTTY?: boolean;
}

const MODES_HELP = `
Modes:
  -1  check Git repository layout and print a summary
  -2  list directories holding a non-bare git tree
  -3  list files outside any git tree
  -a  run every check and print a summary`;

export function parseMode(flag: string): AuditMode {
  const mode = Object.hasOwn(MODE_FLAGS, flag) ? MODE_FLAGS[flag] : undefined;
  if (!mode) {
    throw new UsageError(`Unknown mode: ${flag}`);
  }
  return mode;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('gitree')
    .description('Audit a directory tree of bare Git repositories')
    .version(version)
    .argument('<mode>', 'check to run: -1, -2, -3 or -a')
    .argument('<path>', 'root of the tree to walk')
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--no-color', 'Disable coloured output')
    // Mode flags look like options; they are taken as positional arguments.
    .allowUnknownOption()
    .allowExcessArguments(false)
    .showHelpAfterError()
    .addHelpText('after', MODES_HELP)
    .exitOverride();

  if (options.output) {
    program.configureOutput(options.output);
  }

  program.action(async (modeFlag: string, rootArg: string) => {
    const opts = program.opts<GlobalOptions>();
    const mode = parseMode(modeFlag);
    const root = stripTrailingSlashes(rootArg);

    const config = ConfigLoader.load({ configPath: opts.config, cwd: options.cwd });
    const logger = new ConsoleLogger(opts.verbose ? 'debug' : 'warn').child({ mode });
    const renderer = new OutputRenderer({
      json: Boolean(opts.json),
      color: opts.color && Boolean(options.isTTY ?? process.stdout.isTTY),
    });

    const classifier = TreeClassifier.fromConfig(config, { logger });
    const result = await classifier.audit(root, mode, {
      onFinding: (finding) => renderer.finding(finding, mode),
    });
    renderer.result(result);
  });

  return program;
}

function reportError(program: Command, e: unknown): void {
  const opts = program.opts<GlobalOptions>();

  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  console.error(`Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (e instanceof UsageError) {
    console.error(program.helpInformation());
  } else if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  }
}

/**
 * Parses `argv` (including the node and script entries) and runs the audit.
 * Resolves to the process exit code.
 */
export async function run(argv: string[], options: ProgramOptions = {}): Promise<number> {
  const program = createProgram(options);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already written the message and usage
      return e.code === 'commander.helpDisplayed' || e.code === 'commander.version' ? 0 : 2;
    }
    reportError(program, e);
    return e instanceof AppError ? e.exitCode : 1;
  }
}
