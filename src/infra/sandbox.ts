import path from 'path';
import { promises as fsp } from 'fs';
import fg from 'fast-glob';
import { PatchError, errorMessage } from '../core/errors';

export type SandboxKind = 'local' | 'memory';

export interface GlobOptions {
  cwd?: string;
  ignore?: string[];
  dot?: boolean;
  absolute?: boolean;
}

export interface SandboxFS {
  resolve(path: string): string;
  isInside(path: string): boolean;
  /** True only for an existing regular file. */
  exists(path: string): Promise<boolean>;
  read(path: string): Promise<string>;
  write(path: string, content: string): Promise<void>;
  glob(pattern: string, opts?: GlobOptions): Promise<string[]>;
}

export interface Sandbox {
  kind: SandboxKind;
  workDir: string;
  fs: SandboxFS;
}

export interface LocalSandboxOptions {
  workDir?: string;
  enforceBoundary?: boolean;
  allowPaths?: string[];
}

export class LocalSandbox implements Sandbox {
  kind: SandboxKind = 'local';
  workDir: string;
  fs: SandboxFS;

  constructor(opts: LocalSandboxOptions = {}) {
    this.workDir = path.resolve(opts.workDir || process.cwd());
    this.fs = new LocalFS(this.workDir, {
      enforceBoundary: opts.enforceBoundary !== false,
      allowPaths: (opts.allowPaths || []).map((p) => path.resolve(p)),
    });
  }
}

interface LocalFSOptions {
  enforceBoundary: boolean;
  allowPaths: string[];
}

class LocalFS implements SandboxFS {
  constructor(private workDir: string, private options: LocalFSOptions) {}

  resolve(p: string): string {
    if (path.isAbsolute(p)) return p;
    return path.resolve(this.workDir, p);
  }

  isInside(p: string): boolean {
    const resolved = path.resolve(this.resolve(p)); // resolve 去除 ..

    // 1. 检查是否在 workDir 内
    if (isWithin(this.workDir, resolved)) {
      return true;
    }

    // 2. 如果不强制边界检查，允许所有路径
    if (!this.options.enforceBoundary) return true;

    // 3. 检查白名单
    return this.options.allowPaths.some((allowed) => isWithin(allowed, resolved));
  }

  async exists(p: string): Promise<boolean> {
    const resolved = this.guard(p);
    try {
      const stat = await fsp.stat(resolved);
      return stat.isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw new PatchError('READ_FAILED', `Cannot stat ${p}: ${errorMessage(error)}`, p);
    }
  }

  async read(p: string): Promise<string> {
    const resolved = this.guard(p);
    try {
      const buffer = await fsp.readFile(resolved);
      return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
    } catch (error) {
      throw new PatchError('READ_FAILED', `Cannot read ${p}: ${errorMessage(error)}`, p);
    }
  }

  async write(p: string, content: string): Promise<void> {
    const resolved = this.guard(p);
    try {
      await fsp.writeFile(resolved, content, 'utf-8');
    } catch (error) {
      throw new PatchError('WRITE_FAILED', `Cannot write ${p}: ${errorMessage(error)}`, p);
    }
  }

  async glob(pattern: string, opts?: GlobOptions): Promise<string[]> {
    const cwd = opts?.cwd ? this.resolve(opts.cwd) : this.workDir;
    const matches = await fg(pattern, {
      cwd,
      dot: opts?.dot ?? false,
      absolute: true,
      onlyFiles: true,
      ignore: opts?.ignore,
    });
    const filtered = matches.filter((entry) => this.isInside(entry));
    if (opts?.absolute) {
      return filtered;
    }
    return filtered.map((entry) => path.relative(this.workDir, entry).split(path.sep).join('/'));
  }

  private guard(p: string): string {
    const resolved = this.resolve(p);
    if (!this.isInside(resolved)) {
      throw new PatchError('PATH_OUTSIDE_WORKDIR', `Path outside work directory: ${p}`, p);
    }
    return resolved;
  }
}

// `..Weird.java` is a file name, not a parent segment
function isWithin(base: string, target: string): boolean {
  const relative = path.relative(base, target);
  if (relative === '..' || relative.startsWith('..' + path.sep)) return false;
  return !path.isAbsolute(relative);
}

function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}
