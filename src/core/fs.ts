import { createReadStream, realpathSync } from 'node:fs'
import { access, readFile } from 'node:fs/promises'
import { createInterface } from 'node:readline'

export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  exists(path: string): Promise<boolean>;
  readLines(path: string): AsyncIterable<string>;
  /** Canonical absolute path, or undefined when it cannot be resolved (e.g. the directory is gone). */
  realpath(path: string): string | undefined;
}

export class NodeFileSystem implements FileSystem {
  async readText(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  readLines(path: string): AsyncIterable<string> {
    return createInterface({ input: createReadStream(path, { encoding: 'utf8' }), crlfDelay: Infinity });
  }

  realpath(path: string): string | undefined {
    try {
      return realpathSync(path);
    } catch {
      return undefined;
    }
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private realpaths = new Map<string, string>();
  private realpathCalls: string[] = [];

  async readText(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`ENOENT: ${path}`);
    return content;
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async *readLines(path: string): AsyncIterable<string> {
    const content = await this.readText(path);
    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    yield* lines;
  }

  realpath(path: string): string | undefined {
    this.realpathCalls.push(path);
    return this.realpaths.get(path);
  }

  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  setRealpath(path: string, resolved: string): void {
    this.realpaths.set(path, resolved);
  }

  getRealpathCalls(): string[] {
    return [...this.realpathCalls];
  }
}
