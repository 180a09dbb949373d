#!/usr/bin/env node
// =============================================================================
// super-patch CLI — rewrites weighted super(...) calls in place
// =============================================================================

import path from 'path';
import { existsSync } from 'fs';
import { parseArgs } from 'util';
import { DEFAULT_CONFIG_FILE, PatchConfig, loadConfig, parseConfig, resolveTargets } from './core/config';
import { PatchError, errorMessage } from './core/errors';
import { Patcher } from './core/patcher';
import { ConsoleReporter, LineSink } from './core/reporter';
import { createSuperCallRules } from './core/rules';
import { LocalSandbox } from './infra/sandbox';

export const VERSION = '1.0.0';

const HELP = `
super-patch — rewrite super(weight[, enabled]) calls into setter calls

Usage:
  super-patch [options] [file ...]

Options:
  -c, --config <file>      Config file (default: ${DEFAULT_CONFIG_FILE} when present)
  -g, --glob <pattern>     Add files matching a glob pattern (repeatable)
      --cwd <dir>          Directory the target paths are relative to
      --indent <n>         Spaces before the setter calls (default: 8)
  -n, --dry-run            Report what would change without writing
      --continue-on-error  Report unreadable files as FAILED and keep going
      --no-boundary        Allow paths outside the working directory
      --verbose            Show replacement counts per rule
  -h, --help               Show this help
  -v, --version            Show the version
`;

export interface CliIO {
  write: LineSink;
  error: LineSink;
  cwd: string;
}

const defaultIO: CliIO = {
  write: (line) => console.log(line),
  error: (line) => console.error(line),
  cwd: process.cwd(),
};

export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let args: ReturnType<typeof parse>;
  try {
    args = parse(argv);
  } catch (error) {
    io.error(`error: ${errorMessage(error)}`);
    return 1;
  }
  const { values, positionals } = args;

  if (values.help) {
    io.write(HELP);
    return 0;
  }
  if (values.version) {
    io.write(`super-patch v${VERSION}`);
    return 0;
  }

  try {
    const config = applyOverrides(await readConfig(values.config, io.cwd), values, positionals, io.cwd);
    const sandbox = new LocalSandbox({ workDir: config.workDir, enforceBoundary: config.enforceBoundary });
    const targets = await resolveTargets(config, sandbox);

    const patcher = new Patcher({
      sandbox,
      rules: createSuperCallRules({ indent: config.indent }),
      dryRun: config.dryRun,
      errorPolicy: config.errorPolicy,
    });
    new ConsoleReporter({ write: io.write, verbose: values.verbose }).attach(patcher.events);

    const report = await patcher.run(targets);
    return report.failedCount > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof PatchError) {
      io.error(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      glob: { type: 'string', short: 'g', multiple: true },
      cwd: { type: 'string' },
      indent: { type: 'string' },
      'dry-run': { type: 'boolean', short: 'n' },
      'continue-on-error': { type: 'boolean' },
      'no-boundary': { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });
}

type CliValues = ReturnType<typeof parse>['values'];

async function readConfig(file: string | undefined, cwd: string): Promise<PatchConfig> {
  if (file) {
    return loadConfig(path.resolve(cwd, file));
  }
  const fallback = path.join(cwd, DEFAULT_CONFIG_FILE);
  if (existsSync(fallback)) {
    return loadConfig(fallback);
  }
  return parseConfig({}, cwd);
}

function applyOverrides(config: PatchConfig, values: CliValues, positionals: string[], cwd: string): PatchConfig {
  const next: PatchConfig = { ...config };

  if (positionals.length > 0) next.files = positionals;
  if (values.glob && values.glob.length > 0) next.globs = values.glob;
  if (values.cwd) next.workDir = path.resolve(cwd, values.cwd);
  if (values['dry-run']) next.dryRun = true;
  if (values['continue-on-error']) next.errorPolicy = 'continue';
  if (values['no-boundary']) next.enforceBoundary = false;

  if (values.indent !== undefined) {
    const width = Number(values.indent);
    if (!Number.isInteger(width) || width < 0) {
      throw new PatchError('INVALID_CONFIG', `--indent expects a non-negative integer, got "${values.indent}"`);
    }
    next.indent = ' '.repeat(width);
  }

  return next;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(`✗ Fatal error: ${errorMessage(err)}`);
      process.exitCode = 1;
    });
}
