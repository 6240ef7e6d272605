import * as fs from 'fs/promises';
import { glob } from 'glob';
import ignore from 'ignore';
import * as path from 'path';
import * as ts from 'typescript';

export const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

type Ignore = ReturnType<typeof ignore>;

const SKIPPED_DIRECTORIES = new Set(['node_modules', '.git']);

/** Lists the source files of a project, honouring tsconfig `rootDir` and `.gitignore` files. */
export class ProjectFileScanner {
  constructor(private readonly extensions: readonly string[] = SOURCE_EXTENSIONS) {}

  async scan(rootPath: string): Promise<string[]> {
    const scanDir = this.getScanDirectory(rootPath);
    const rules = await this.loadIgnoreRules(rootPath);
    return this.collectSourceFiles(scanDir, rootPath, rules);
  }

  private getScanDirectory(rootPath: string): string {
    try {
      const configPath = ts.findConfigFile(rootPath, ts.sys.fileExists, 'tsconfig.json');
      if (configPath) {
        const { config } = ts.readConfigFile(configPath, ts.sys.readFile);
        const rootDir: unknown = config?.compilerOptions?.rootDir;
        if (typeof rootDir === 'string') {
          return path.resolve(rootPath, rootDir);
        }
      }
    } catch (error) {
      console.warn('Failed to read tsconfig.json, scanning project root:', error);
    }
    return rootPath;
  }

  private async loadIgnoreRules(rootPath: string): Promise<Ignore> {
    const rules = ignore();
    try {
      const gitignoreFiles = await glob('**/.gitignore', {
        cwd: rootPath,
        ignore: 'node_modules/**',
      });

      // Outer directories first
      gitignoreFiles.sort((a, b) => a.length - b.length);

      for (const gitignoreFile of gitignoreFiles) {
        const content = await fs.readFile(path.join(rootPath, gitignoreFile), 'utf-8');
        const gitignoreDir = path.dirname(gitignoreFile);
        rules.add(gitignoreDir === '.' ? content : rebasePatterns(content, gitignoreDir));
      }
    } catch (e) {
      console.warn('Failed to process .gitignore files:', e);
    }
    return rules;
  }

  private async collectSourceFiles(dir: string, rootPath: string, rules: Ignore): Promise<string[]> {
    const results: string[] = [];
    try {
      for (const entry of await fs.readdir(dir)) {
        const filePath = path.join(dir, entry);

        const relativePath = path.relative(rootPath, filePath);
        if (relativePath && rules.ignores(relativePath)) {
          continue;
        }

        const stat = await fs.stat(filePath);
        if (stat.isDirectory()) {
          if (!SKIPPED_DIRECTORIES.has(entry)) {
            results.push(...(await this.collectSourceFiles(filePath, rootPath, rules)));
          }
        } else if (this.extensions.some((ext) => entry.endsWith(ext))) {
          results.push(filePath);
        }
      }
    } catch (e) {
      console.warn(`Failed to read directory ${dir}: ${e}`);
    }
    return results;
  }
}

/** Prefixes the patterns of a nested `.gitignore` with its directory. */
function rebasePatterns(content: string, gitignoreDir: string): string[] {
  const prefix = gitignoreDir.split(path.sep).join('/');
  return content.split(/\r?\n/).map((line) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) return line;

    const isNegated = trimmed.startsWith('!');
    const pattern = isNegated ? trimmed.slice(1) : trimmed;
    const cleanPattern = pattern.startsWith('/') ? pattern.slice(1) : pattern;
    const prefixed = path.posix.join(prefix, cleanPattern);

    return isNegated ? `!${prefixed}` : prefixed;
  });
}
