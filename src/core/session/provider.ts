/**
 * Where the session reads and writes source text.
 */
import * as path from 'node:path';
import { fileExists, globFiles, readFile, writeFile } from '../../utils/file-system.js';

export interface SourceProvider {
  /** Current text of a file, or undefined when it does not exist */
  read(file: string): Promise<string | undefined>;
  write(file: string, text: string): Promise<void>;
  /** Every candidate file, as keys the session can pass back to read() */
  list(): Promise<string[]>;
}

export interface NodeSourceProviderOptions {
  include?: string[];
  exclude?: string[];
}

/**
 * File-system provider rooted at a project directory. Files are keyed by
 * their path relative to the root, with forward slashes.
 */
export class NodeSourceProvider implements SourceProvider {
  private readonly include: string[];
  private readonly exclude: string[];

  constructor(
    private readonly root: string,
    options: NodeSourceProviderOptions = {}
  ) {
    this.include = options.include ?? ['**/*'];
    this.exclude = options.exclude ?? ['**/node_modules/**', '**/dist/**', '**/.git/**'];
  }

  async read(file: string): Promise<string | undefined> {
    const fullPath = this.resolve(file);
    if (!(await fileExists(fullPath))) return undefined;
    return readFile(fullPath);
  }

  async write(file: string, text: string): Promise<void> {
    await writeFile(this.resolve(file), text);
  }

  async list(): Promise<string[]> {
    return globFiles(this.include, { cwd: this.root, ignore: this.exclude });
  }

  private resolve(file: string): string {
    return path.resolve(this.root, file);
  }
}

/**
 * In-memory provider for embedding tools and tests.
 */
export class MemorySourceProvider implements SourceProvider {
  private readonly files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  async read(file: string): Promise<string | undefined> {
    return this.files.get(file);
  }

  async write(file: string, text: string): Promise<void> {
    this.files.set(file, text);
  }

  async list(): Promise<string[]> {
    return [...this.files.keys()].sort();
  }

  /** Synchronous read for assertions */
  get(file: string): string | undefined {
    return this.files.get(file);
  }
}
