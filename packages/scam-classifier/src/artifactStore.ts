import { readFile, stat } from 'fs/promises';
import path from 'path';
import { ArtifactPathError } from './errors';

/**
 * Read-only access to bundled model artifacts. Names are relative,
 * forward-slash separated paths such as `scam_lstm_fp16/model.json`.
 */
export interface ArtifactStore {
  readText(name: string): Promise<string>;
  readBinary(name: string): Promise<Uint8Array>;
  /** Location of the artifact, for logs. */
  describe(name: string): string;
}

export class DirectoryArtifactStore implements ArtifactStore {
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = path.resolve(rootDir);
  }

  describe(name: string): string {
    return this.resolve(name);
  }

  async readText(name: string): Promise<string> {
    return readFile(this.resolve(name), 'utf-8');
  }

  async readBinary(name: string): Promise<Uint8Array> {
    const file = this.resolve(name);
    const info = await stat(file);
    if (!info.isFile()) {
      throw new Error(`Artifact is not a file: ${file}`);
    }
    return readFile(file);
  }

  private resolve(name: string): string {
    const resolved = path.resolve(this.root, name);
    const relative = path.relative(this.root, resolved);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ArtifactPathError(name);
    }
    return resolved;
  }
}

export function siblingArtifact(name: string, sibling: string): string {
  const dir = path.posix.dirname(name);
  return dir === '.' ? sibling : path.posix.join(dir, sibling);
}
