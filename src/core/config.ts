import path from 'path';
import { promises as fsp } from 'fs';
import { z } from 'zod';
import { Sandbox } from '../infra/sandbox';
import { PatchError, assert, errorMessage } from './errors';
import { DEFAULT_INDENT } from './rules';

export const DEFAULT_CONFIG_FILE = 'super-patch.config.json';

export const patchConfigSchema = z
  .object({
    files: z.array(z.string().min(1)).default([]).describe('Ordered target paths'),
    globs: z.array(z.string().min(1)).default([]).describe('fast-glob patterns, appended after files'),
    ignore: z.array(z.string()).default(['**/node_modules/**']),
    workDir: z.string().default('.'),
    indent: z.string().regex(/^[ \t]*$/, 'indent may only contain spaces and tabs').default(DEFAULT_INDENT),
    dryRun: z.boolean().default(false),
    errorPolicy: z.enum(['fail', 'continue']).default('fail'),
    enforceBoundary: z.boolean().default(true),
  })
  .strict();

export type PatchConfigInput = z.input<typeof patchConfigSchema>;
export type PatchConfig = z.output<typeof patchConfigSchema>;

/**
 * Validates a raw config object. A relative `workDir` is resolved against
 * `baseDir`.
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): PatchConfig {
  const parsed = patchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new PatchError('INVALID_CONFIG', `Invalid configuration: ${issues}`);
  }
  return { ...parsed.data, workDir: path.resolve(baseDir, parsed.data.workDir) };
}

export async function loadConfig(file: string): Promise<PatchConfig> {
  const resolved = path.resolve(file);
  let text: string;
  try {
    text = await fsp.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new PatchError('INVALID_CONFIG', `Cannot read config ${file}: ${errorMessage(error)}`, file);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PatchError('INVALID_CONFIG', `Config ${file} is not valid JSON: ${errorMessage(error)}`, file);
  }
  return parseConfig(raw, path.dirname(resolved));
}

/**
 * Explicit files keep their order; glob matches follow, sorted, without
 * repeating a path already listed.
 */
export async function resolveTargets(config: PatchConfig, sandbox: Sandbox): Promise<string[]> {
  const targets = [...config.files];
  const seen = new Set(config.files);

  for (const pattern of config.globs) {
    const matches = await sandbox.fs.glob(pattern, { ignore: config.ignore });
    for (const match of matches.sort()) {
      if (seen.has(match)) continue;
      seen.add(match);
      targets.push(match);
    }
  }

  assert(targets.length > 0, 'INVALID_CONFIG', 'No target files: list them under "files" or "globs", or pass paths');
  return targets;
}
