import { EventBus } from './events';
import { ReplacementCounts } from './types';

export type LineSink = (line: string) => void;

export interface ConsoleReporterOptions {
  write?: LineSink;
  /** Append per-rule replacement counts to FIXED lines. */
  verbose?: boolean;
}

/**
 * Prints the line-oriented progress report for a batch:
 *
 *   SKIP: <path> not found
 *   FIXED: <path>
 *   NO CHANGE: <path>
 *   FAILED: <path> (<message>)
 *
 *   Total files fixed: <N>
 */
export class ConsoleReporter {
  private readonly write: LineSink;
  private readonly verbose: boolean;

  constructor(opts: ConsoleReporterOptions = {}) {
    this.write = opts.write ?? ((line) => console.log(line));
    this.verbose = opts.verbose ?? false;
  }

  attach(bus: EventBus): this {
    bus.onEvent('file:skipped', (event) => this.write(`SKIP: ${event.path} not found`));
    bus.onEvent('file:fixed', (event) => {
      const detail = this.verbose ? ` (${formatCounts(event.replacements)})` : '';
      this.write(`${prefix(event.dryRun)}FIXED: ${event.path}${detail}`);
    });
    bus.onEvent('file:unchanged', (event) => this.write(`${prefix(event.dryRun)}NO CHANGE: ${event.path}`));
    bus.onEvent('file:failed', (event) => this.write(`FAILED: ${event.path} (${event.message})`));
    bus.onEvent('batch:done', (event) => {
      this.write('');
      this.write(`Total files fixed: ${event.fixedCount}${event.dryRun ? ' (dry run)' : ''}`);
    });
    return this;
  }
}

function prefix(dryRun: boolean): string {
  return dryRun ? '[dry-run] ' : '';
}

export function formatCounts(counts: ReplacementCounts): string {
  return Object.entries(counts)
    .map(([rule, count]) => `${rule}: ${count}`)
    .join(', ');
}
