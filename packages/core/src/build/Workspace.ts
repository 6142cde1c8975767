/**
 * Workspace - a scoped directory holding one build's sources and executable.
 *
 * Acquired by Workspace.create(), released by dispose(). dispose() is
 * idempotent and removes the whole directory.
 */

import { mkdir, mkdtemp, rm, writeFile, readdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Logger } from '@recordc/types';
import { BuildError } from '../errors/RecordcError.js';

export interface WorkspaceOptions {
  /** Parent directory; defaults to os.tmpdir() */
  root?: string;
  /** Directory name prefix */
  prefix?: string;
  logger?: Logger;
}

export class Workspace {
  readonly dir: string;
  private readonly logger: Logger | undefined;
  private disposing: Promise<void> | null = null;

  private constructor(dir: string, logger: Logger | undefined) {
    this.dir = dir;
    this.logger = logger;
  }

  /**
   * THROWS BuildError(ERR_BUILD_WORKSPACE_CREATE)
   */
  static async create(options: WorkspaceOptions = {}): Promise<Workspace> {
    const root = options.root ?? tmpdir();
    const prefix = options.prefix ?? 'recordc-';

    try {
      await mkdir(root, { recursive: true });
      const dir = await mkdtemp(join(root, prefix));
      options.logger?.debug('Workspace created', { dir });
      return new Workspace(dir, options.logger);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new BuildError(
        `Cannot create build workspace under ${root}: ${message}`,
        'ERR_BUILD_WORKSPACE_CREATE',
        { workspaceRoot: root },
        'Check that the workspace root exists and is writable'
      );
    }
  }

  get disposed(): boolean {
    return this.disposing !== null;
  }

  path(fileName: string): string {
    return join(this.dir, fileName);
  }

  /**
   * THROWS BuildError(ERR_BUILD_SOURCE_WRITE)
   */
  async writeSource(fileName: string, content: string): Promise<string> {
    const filePath = this.path(fileName);
    try {
      await writeFile(filePath, content, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new BuildError(
        `Cannot write ${fileName}: ${message}`,
        'ERR_BUILD_SOURCE_WRITE',
        { filePath }
      );
    }
    this.logger?.debug('Wrote source file', { file: filePath, bytes: Buffer.byteLength(content) });
    return filePath;
  }

  dispose(): Promise<void> {
    this.disposing ??= this.removeAll();
    return this.disposing;
  }

  private async removeAll(): Promise<void> {
    let entries: string[] = [];
    try {
      entries = await readdir(this.dir);
    } catch {
      // already gone
    }
    for (const entry of entries) {
      this.logger?.info('Removing file', { file: this.path(entry) });
    }
    await rm(this.dir, { recursive: true, force: true });
  }
}
