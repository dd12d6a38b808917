import { readFile, stat } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';

export type FileStat = {
  isFile: boolean;
  size: number;
};

/**
 * Read-only filesystem capability handed to the validation engine
 */
export type FileSource = {
  read(path: string): Promise<Uint8Array>;
  /** Path the other two methods expect for a candidate as submitted */
  resolve(file: string): string;
  stat(path: string): Promise<FileStat>;
};

/**
 * FileSource over the local disk, with relative candidates resolved against a root directory
 */
export class NodeFileSource implements FileSource {
  constructor(private readonly _rootDir: string = process.cwd()) {}

  resolve(file: string): string {
    return isAbsolute(file) ? file : resolve(this._rootDir, file);
  }

  async stat(path: string): Promise<FileStat> {
    const stats = await stat(path);
    return { isFile: stats.isFile(), size: stats.size };
  }

  async read(path: string): Promise<Uint8Array> {
    return readFile(path);
  }
}
