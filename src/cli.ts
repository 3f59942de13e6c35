import { parseArgs } from 'util';
import { VirtualMachineError } from './errors';
import { KeyInInput } from './io/key-in-input';
import { StreamOutput } from './io/stream-output';
import { TerminalInput } from './io/terminal-input';
import type { CharacterInput } from './io/types';
import { LC3VirtualMachine } from './lc3-vm';
import { type Logger, createLogger } from './logger';

const USAGE = `Usage: lc3-machine <image> [options]

Options:
  --blocking-input  read keys through readline-sync (no keyboard polling)
  --verbose         print loader and run diagnostics
  --help            show this message
`;

export interface CliOptions {
  imagePath: string;
  blockingInput: boolean;
  verbose: boolean;
}

export type ParsedCommand =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'usage'; message: string };

const ARG_OPTIONS = {
  'blocking-input': { type: 'boolean', default: false },
  verbose: { type: 'boolean', short: 'v', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function parse(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: ARG_OPTIONS });
}

export function parseCommandLine(argv: string[]): ParsedCommand {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    return { kind: 'usage', message: err instanceof Error ? err.message : String(err) };
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length !== 1) {
    return { kind: 'usage', message: 'expected exactly one image path' };
  }
  return {
    kind: 'run',
    options: {
      imagePath: positionals[0],
      blockingInput: values['blocking-input'] === true,
      verbose: values.verbose === true,
    },
  };
}

async function runImage(options: CliOptions, logger: Logger): Promise<number> {
  const controller = new AbortController();
  const stop = () => controller.abort();

  let terminal: TerminalInput | undefined;
  let input: CharacterInput;
  if (options.blockingInput) {
    input = new KeyInInput();
  } else {
    terminal = new TerminalInput(process.stdin, { onInterrupt: stop });
    input = terminal;
  }

  const vm = new LC3VirtualMachine({
    input,
    output: new StreamOutput(process.stdout),
    logger,
  });

  process.once('SIGINT', stop);
  try {
    vm.readImage(options.imagePath);
    const result = await vm.run(controller.signal);
    if (result.reason === 'stopped') {
      logger.info('\nInterrupted.');
    }
    return 0;
  } catch (err) {
    if (err instanceof VirtualMachineError) {
      logger.error(`${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  } finally {
    process.off('SIGINT', stop);
    terminal?.close();
  }
}

export async function main(argv: string[]): Promise<number> {
  const command = parseCommandLine(argv);
  switch (command.kind) {
    case 'help':
      process.stdout.write(USAGE);
      return 0;
    case 'usage':
      process.stderr.write(`${command.message}\n\n${USAGE}`);
      return 2;
    case 'run':
      return runImage(command.options, createLogger(command.options.verbose));
  }
}
