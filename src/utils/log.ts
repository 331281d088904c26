import { createColors } from 'colorette';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  color?: boolean;
  verbose?: boolean;
  /** Defaults to stdout for info/success/debug and stderr for warn/error. */
  write?: (stream: 'stdout' | 'stderr', line: string) => void;
}

function writeToProcess(stream: 'stdout' | 'stderr', line: string): void {
  process[stream].write(`${line}\n`);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const colors = createColors({ useColor: options.color ?? (process.stdout.isTTY === true && !process.env.NO_COLOR) });
  const write = options.write ?? writeToProcess;
  const verbose = options.verbose ?? false;

  return {
    info: (msg) => write('stdout', `${colors.blue('i')}  ${msg}`),
    success: (msg) => write('stdout', `${colors.green('✔')}  ${msg}`),
    warn: (msg) => write('stderr', `${colors.yellow('⚠')}  ${msg}`),
    error: (msg) => write('stderr', `${colors.red('✖')}  ${msg}`),
    debug: (msg) => {
      if (verbose) write('stdout', colors.dim(`·  ${msg}`));
    },
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
