import { mkdirSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

/** Persists files produced during a run. */
export interface ArtifactWriter {
  /** Absolute directory artifacts are written under. */
  path(): string;
  /** Write `contents` to `filename` under `path()` and return the absolute path written. */
  writeFile(filename: string, contents: string | Uint8Array): Promise<string>;
}

export class FilesystemArtifactWriter implements ArtifactWriter {
  private readonly dir: string;

  /** Resolves `dir` against the working directory and creates it. Throws if it cannot be created. */
  constructor(dir: string) {
    this.dir = resolve(dir);
    mkdirSync(this.dir, { recursive: true });
  }

  path(): string {
    return this.dir;
  }

  async writeFile(filename: string, contents: string | Uint8Array): Promise<string> {
    const target = join(this.dir, filename);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, contents);
    return target;
  }
}
