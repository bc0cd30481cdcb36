import * as fs from 'fs';
import * as path from 'path';

const priorityFolders = ['Job', 'Projects'];
const keyFileNames = new Set(['README.md', 'Identity.md']);
const keyFileKeywords = ['Fitness', 'Health'];
const excludedDirs = new Set(['venv', '.venv', 'node_modules', '.git', '.gemini', 'data']);

/**
 * @description Reads the high-signal notes of an Obsidian vault: everything under
 * `Job/` and `Projects/`, plus README, Identity, Fitness and Health notes anywhere.
 */
export class VaultReader {
  readonly vaultPath: string;

  constructor(vaultPath: string) {
    this.vaultPath = path.resolve(vaultPath);
    if (!fs.existsSync(this.vaultPath)) {
      throw new Error(`Vault path does not exist: ${this.vaultPath}`);
    }
  }

  /** Absolute paths, sorted by their vault-relative path */
  getPriorityFiles(): string[] {
    const files = new Set<string>();

    for (const file of this.walkMarkdown(this.vaultPath)) {
      const relative = path.relative(this.vaultPath, file);
      const [topLevel] = relative.split(path.sep);
      if (relative.includes(path.sep) && priorityFolders.includes(topLevel)) {
        files.add(file);
        continue;
      }

      const baseName = path.basename(file);
      if (keyFileNames.has(baseName) || keyFileKeywords.some((keyword) => baseName.includes(keyword))) {
        files.add(file);
      }
    }

    return [...files].sort((a, b) => path.relative(this.vaultPath, a).localeCompare(path.relative(this.vaultPath, b)));
  }

  readFileContent(filePath: string): string {
    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return `Error reading ${filePath}: ${message}`;
    }
  }

  getAllContextText(): string {
    return this.getPriorityFiles()
      .map((file) => {
        const relative = path.relative(this.vaultPath, file).split(path.sep).join('/');
        return `--- FILE: ${relative} ---\n${this.readFileContent(file)}\n`;
      })
      .join('\n');
  }

  private *walkMarkdown(dir: string): Generator<string> {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!excludedDirs.has(entry.name)) {
          yield* this.walkMarkdown(fullPath);
        }
      } else if (entry.isFile() && entry.name.endsWith('.md')) {
        yield fullPath;
      }
    }
  }
}
