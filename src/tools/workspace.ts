// src/tools/workspace.ts
import path from 'path';
import { promises as fs } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { Constants } from '@/common/enum';

/**
 * Shared working directory of the Response team.
 * Every document tool resolves file names through {@link Workspace.resolve},
 * so nothing outside `root` can be read or written.
 */
export class Workspace {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /** New workspace at `<basePath>/<8-char id>`; the directory is created on first use */
  static create(basePath: string = Constants.DEFAULT_WORKSPACE_BASE): Workspace {
    return new Workspace(path.join(basePath, uuidv4().slice(0, 8)));
  }

  async ensure(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
  }

  /**
   * Maps a relative file name to an absolute path inside the workspace.
   * @throws when the name is absolute or escapes the root
   */
  resolve(fileName: string): string {
    if (fileName.trim() === '') {
      throw new Error('File name must not be empty.');
    }
    if (path.isAbsolute(fileName)) {
      throw new Error(
        `Absolute paths are not allowed: ${fileName}. Use a file name relative to the working directory.`
      );
    }
    const resolved = path.resolve(this.root, fileName);
    const relative = path.relative(this.root, resolved);
    if (
      relative === '' ||
      relative === '..' ||
      relative.startsWith('..' + path.sep) ||
      path.isAbsolute(relative)
    ) {
      throw new Error(`Path escapes the working directory: ${fileName}`);
    }
    return resolved;
  }

  /** Relative paths of every file under the root, sorted; creates the root if missing */
  async listFiles(): Promise<string[]> {
    await this.ensure();
    const files: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          files.push(path.relative(this.root, full).split(path.sep).join('/'));
        }
      }
    };
    await walk(this.root);
    return files.sort();
  }

  async readText(fileName: string): Promise<string> {
    return fs.readFile(this.resolve(fileName), 'utf8');
  }

  /** Nothing is written once `signal` has fired, e.g. after a tool timeout */
  async writeText(
    fileName: string,
    content: string,
    signal?: AbortSignal
  ): Promise<void> {
    const target = this.resolve(fileName);
    signal?.throwIfAborted();
    await fs.mkdir(path.dirname(target), { recursive: true });
    signal?.throwIfAborted();
    await fs.writeFile(target, content, 'utf8');
  }
}
