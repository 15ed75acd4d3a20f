import { readFileSync } from 'node:fs';
import { Command, CommanderError } from 'commander';
import { DEFAULT_CONFIG_PATH } from './config.js';
import { UsageError } from './errors.js';

export const VERSION = '0.1.0';

export interface Invocation {
  readonly inputText?: string;
  readonly language?: string;
  readonly context?: string;
  readonly model?: string;
  readonly configPath: string;
  readonly verbose: boolean;
}

export type ParseResult =
  | { kind: 'invoke'; invocation: Invocation }
  // help or version text has already been written
  | { kind: 'displayed' };

export interface ParseOptions {
  readFile?: (path: string) => string;
  writeOut?: (text: string) => void;
}

interface CliOptions {
  language?: string;
  file?: string;
  model?: string;
  config: string;
  verbose?: boolean;
}

export function createProgram(writeOut: (text: string) => void): Command {
  return new Command()
    .name('clai')
    .description('Ask a chat model a coding question from the terminal')
    .version(VERSION)
    .argument('[input]', 'Question or instruction (opens an editor when omitted)')
    .option('-l, --language <language>', 'Preferred language; only code blocks in it are printed')
    .option('-f, --file <path>', 'File whose contents are sent as context')
    .option('-m, --model <model>', 'Model to use (overrides config)')
    .option('-c, --config <path>', 'Path to clai.toml config file', DEFAULT_CONFIG_PATH)
    .option('-v, --verbose', 'Log request details to stderr')
    // unrecognised dash tokens fall through as the input text
    .allowUnknownOption()
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut,
      writeErr: writeOut,
      // reported through UsageError instead
      outputError: () => {},
    });
}

export function parseArguments(argv: string[], options: ParseOptions = {}): ParseResult {
  const readFile = options.readFile ?? ((path: string) => readFileSync(path, 'utf-8'));
  const writeOut = options.writeOut ?? ((text: string) => process.stdout.write(text));

  const captured: { input?: string; opts?: CliOptions } = {};
  const program = createProgram(writeOut).action((input: string | undefined, opts: CliOptions) => {
    captured.input = input;
    captured.opts = opts;
  });

  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.exitCode === 0) {
        return { kind: 'displayed' };
      }
      throw new UsageError(err.message, program.helpInformation());
    }
    throw err;
  }

  const { input, opts } = captured;
  if (!opts) {
    throw new UsageError('No arguments were processed', program.helpInformation());
  }

  return {
    kind: 'invoke',
    invocation: {
      inputText: input,
      language: opts.language,
      context: opts.file === undefined ? undefined : readFile(opts.file),
      model: opts.model,
      configPath: opts.config,
      verbose: opts.verbose ?? false,
    },
  };
}
