import path from 'node:path';
import { createColors } from 'colorette';
import { LanguageRegistry } from '../catalogue/registry';
import { loadConfig, resolveConfig, type TranspileConfig } from '../config';
import { generateLanguages, generateStyles, loadStyles } from '../generate';
import { formatError } from '../utils/format';
import { createLogger, type Logger, type LoggerOptions } from '../utils/log';

export interface CLIOptions {
  catalogueDir?: string;
  outDir?: string;
  languages: string[];
  styles: string[];
  noStyles: boolean;
  maxDepth?: number;
  failFast: boolean;
  configPath?: string;
  listConfig: boolean;
  verbose: boolean;
  color: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    languages: [],
    styles: [],
    noStyles: false,
    failFast: false,
    listConfig: false,
    verbose: false,
    color: true,
    help: false,
  };

  const valueOf = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith('--')) throw new UsageError(`${flag} requires a value`);
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--out':
        options.outDir = valueOf(arg, nextArg);
        i++;
        break;
      case '--lang':
        options.languages.push(valueOf(arg, nextArg));
        i++;
        break;
      case '--style':
        options.styles.push(valueOf(arg, nextArg));
        i++;
        break;
      case '--no-styles':
        options.noStyles = true;
        break;
      case '--max-depth': {
        const depth = Number(valueOf(arg, nextArg));
        if (!Number.isInteger(depth) || depth <= 0) {
          throw new UsageError(`--max-depth must be a positive integer, got '${nextArg}'`);
        }
        options.maxDepth = depth;
        i++;
        break;
      }
      case '--fail-fast':
        options.failFast = true;
        break;
      case '--config':
        options.configPath = valueOf(arg, nextArg);
        i++;
        break;
      case '--list-config':
        options.listConfig = true;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--no-color':
        options.color = false;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);
        if (options.catalogueDir !== undefined) throw new UsageError(`Unexpected argument: ${arg}`);
        options.catalogueDir = arg;
    }
  }
  return options;
}

export function helpText(color: boolean): string {
  const c = createColors({ useColor: color });
  const opt = (flag: string, text: string) => `  ${c.green(flag.padEnd(22))}${text}`;
  return [
    '',
    `${c.bold('lang-transpile')} - Translate lexer grammars into source-highlight language definitions`,
    '',
    c.bold('USAGE:'),
    '  lang-transpile [catalogue] [options]',
    '',
    c.bold('OPTIONS:'),
    opt('--out <dir>', 'Output directory (default: ./share/lang)'),
    opt('--lang <name>', 'Only generate this language; repeatable'),
    opt('--style <name>', 'Only generate this style; repeatable'),
    opt('--no-styles', 'Skip style generation'),
    opt('--max-depth <n>', 'Nested state translation limit (default: 64)'),
    opt('--fail-fast', 'Stop at the first language that fails'),
    opt('--config <path>', 'Configuration file (default: ./transpile.config.json)'),
    opt('--list-config', 'Print the resolved configuration and exit'),
    opt('--verbose, -v', 'Enable verbose output'),
    opt('--no-color', 'Disable colored output'),
    opt('--help, -h', 'Show this help'),
    '',
    c.bold('EXAMPLES:'),
    '  lang-transpile ./catalogue --out ./share/lang',
    '  lang-transpile --lang ini --lang diff --no-styles',
    '',
  ].join('\n');
}

function overridesOf(options: CLIOptions): Partial<TranspileConfig> {
  return {
    catalogueDir: options.catalogueDir,
    outDir: options.outDir,
    languages: options.languages.length > 0 ? options.languages : undefined,
    styles: options.styles.length > 0 ? options.styles : undefined,
    maxDepth: options.maxDepth,
    failFast: options.failFast ? true : undefined,
  };
}

export interface CLIEnvironment {
  cwd?: string;
  /** Where help and --list-config output go. */
  print?: (text: string) => void;
  write?: LoggerOptions['write'];
}

/** Runs one CLI invocation and resolves to the process exit code. */
export async function runCli(args: readonly string[], env: CLIEnvironment = {}): Promise<number> {
  const cwd = env.cwd ?? process.cwd();
  const print = env.print ?? ((text: string) => process.stdout.write(`${text}\n`));

  let options: CLIOptions;
  try {
    options = parseArgs(args);
  } catch (error: unknown) {
    if (!(error instanceof UsageError)) throw error;
    createLogger({ write: env.write, color: false }).error(`${error.message} (see --help)`);
    return 1;
  }

  const color = options.color && (env.write === undefined ? process.stdout.isTTY === true : false);
  const log: Logger = createLogger({ color, verbose: options.verbose, write: env.write });

  if (options.help) {
    print(helpText(color));
    return 0;
  }

  let config: TranspileConfig;
  try {
    config = resolveConfig(loadConfig(cwd, options.configPath), overridesOf(options));
  } catch (error: unknown) {
    log.error(formatError(error, color));
    return 1;
  }

  if (options.listConfig) {
    print(JSON.stringify(config, null, 2));
    return 0;
  }

  const catalogueDir = path.resolve(cwd, config.catalogueDir);
  const outDir = path.resolve(cwd, config.outDir);
  log.debug(`Catalogue: ${catalogueDir}`);
  log.debug(`Output: ${outDir}`);

  let failures = 0;
  const { registry, failures: loadFailures } = await LanguageRegistry.load(catalogueDir);
  for (const failure of loadFailures) {
    log.error(`${path.relative(cwd, failure.file)}: ${formatError(failure.error, color)}`);
    failures++;
  }

  let languages = registry.list();
  if (config.languages.length > 0) {
    const selected = registry.select(config.languages);
    selected.missing.forEach((name) => log.error(`No language named '${name}' in the catalogue`));
    failures += selected.missing.length;
    languages = selected.languages;
  }

  const generateOptions = {
    outDir,
    failFast: config.failFast,
    maxDepth: config.maxDepth,
    maxCandidates: config.maxCandidates,
    expansionLimit: config.expansionLimit,
    logger: log,
    color,
  };

  const report = await generateLanguages(languages, registry, generateOptions);
  failures += report.failures.length;
  log.success(`Generated ${report.written.length} of ${languages.length} language(s)`);

  if (!options.noStyles && !(config.failFast && failures > 0)) {
    const loaded = await loadStyles(catalogueDir);
    for (const failure of loaded.failures) {
      log.error(`${failure.name}: ${formatError(failure.error, color)}`);
      failures++;
    }
    const wanted = new Set(config.styles.map((name) => name.toLowerCase()));
    const styles = wanted.size === 0 ? loaded.styles : loaded.styles.filter((s) => wanted.has(s.name.toLowerCase()));
    const styleReport = await generateStyles(styles, generateOptions);
    failures += styleReport.failures.length;
    if (styles.length > 0) {
      log.success(`Generated ${styles.length - styleReport.failures.length} of ${styles.length} style(s)`);
    }
  }

  return failures > 0 ? 1 : 0;
}
