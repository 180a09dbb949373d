// Core
export { Patcher } from './core/patcher';
export type { PatcherOptions } from './core/patcher';
export { EventBus } from './core/events';
export { ConsoleReporter, formatCounts } from './core/reporter';
export type { ConsoleReporterOptions, LineSink } from './core/reporter';
export { SUPER_CALL_RULES, DEFAULT_INDENT, applyRules, createSuperCallRules } from './core/rules';
export type { RewriteRule, RewriteResult, SuperCallRuleOptions } from './core/rules';
export { patchConfigSchema, DEFAULT_CONFIG_FILE, loadConfig, parseConfig, resolveTargets } from './core/config';
export type { PatchConfig, PatchConfigInput } from './core/config';
export { PatchError } from './core/errors';
export type { PatchErrorCode } from './core/errors';

// Types
export * from './core/types';

// Infrastructure
export { LocalSandbox } from './infra/sandbox';
export type { Sandbox, SandboxFS, SandboxKind, GlobOptions, LocalSandboxOptions } from './infra/sandbox';

// CLI
export { runCli, VERSION } from './cli';
export type { CliIO } from './cli';
