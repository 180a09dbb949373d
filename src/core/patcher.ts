import { Sandbox } from '../infra/sandbox';
import { EventBus } from './events';
import { PatchError, errorMessage } from './errors';
import { RewriteRule, SUPER_CALL_RULES, applyRules } from './rules';
import { ErrorPolicy, FileOutcome, PatchReport } from './types';

export interface PatcherOptions {
  sandbox: Sandbox;
  rules?: readonly RewriteRule[];
  dryRun?: boolean;
  /** `fail` stops the batch on the first read/write error; `continue` records it and moves on. */
  errorPolicy?: ErrorPolicy;
  events?: EventBus;
}

export class Patcher {
  readonly events: EventBus;
  private readonly sandbox: Sandbox;
  private readonly rules: readonly RewriteRule[];
  private readonly dryRun: boolean;
  private readonly errorPolicy: ErrorPolicy;

  constructor(opts: PatcherOptions) {
    this.sandbox = opts.sandbox;
    this.rules = opts.rules ?? SUPER_CALL_RULES;
    this.dryRun = opts.dryRun ?? false;
    this.errorPolicy = opts.errorPolicy ?? 'fail';
    this.events = opts.events ?? new EventBus();
  }

  /**
   * Processes the paths one at a time, in order. Outcomes are reported on the
   * event bus as they happen; the summary is emitted only when every path was
   * handled.
   */
  async run(paths: readonly string[]): Promise<PatchReport> {
    const outcomes: FileOutcome[] = [];
    let fixedCount = 0;
    let failedCount = 0;

    for (const path of paths) {
      let outcome: FileOutcome;
      try {
        outcome = await this.patchFile(path);
      } catch (error) {
        if (this.errorPolicy === 'fail') {
          throw error instanceof PatchError ? error : new PatchError('READ_FAILED', errorMessage(error), path);
        }
        outcome = { path, status: 'failed', replacements: {}, message: errorMessage(error) };
      }

      outcomes.push(outcome);
      switch (outcome.status) {
        case 'skipped':
          this.events.emitEvent({ type: 'file:skipped', path });
          break;
        case 'fixed':
          fixedCount++;
          this.events.emitEvent({ type: 'file:fixed', path, replacements: outcome.replacements, dryRun: this.dryRun });
          break;
        case 'unchanged':
          this.events.emitEvent({ type: 'file:unchanged', path, dryRun: this.dryRun });
          break;
        case 'failed':
          failedCount++;
          this.events.emitEvent({ type: 'file:failed', path, message: outcome.message ?? 'unknown error' });
          break;
      }
    }

    this.events.emitEvent({ type: 'batch:done', fixedCount, failedCount, dryRun: this.dryRun });
    return { outcomes, fixedCount, failedCount, dryRun: this.dryRun };
  }

  async patchFile(path: string): Promise<FileOutcome> {
    if (!(await this.sandbox.fs.exists(path))) {
      return { path, status: 'skipped', replacements: {} };
    }

    const original = await this.sandbox.fs.read(path);
    const result = applyRules(original, this.rules);

    if (!result.changed) {
      return { path, status: 'unchanged', replacements: result.replacements };
    }

    if (!this.dryRun) {
      await this.sandbox.fs.write(path, result.content);
    }
    return { path, status: 'fixed', replacements: result.replacements };
  }
}
