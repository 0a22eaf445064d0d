import { join } from 'path';

import { copyFile, exists, listFiles, readTextFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { LocalPackage } from '../sandbox/local-package.js';

const README_PATTERN = /^readme(\.|$)/i;
const DOCUMENTATION_FILE = 'index.md';

/**
 * Documentation of one package version: a Markdown page built from the
 * package README and its public headers.
 */
export class DocumentationGenerator {
  constructor(
    private readonly pkg: LocalPackage,
    private readonly documentationDir: string,
    private readonly docsRoot: string
  ) {}

  get outputPath(): string {
    return join(this.documentationDir, this.pkg.name, this.pkg.spec.version, DOCUMENTATION_FILE);
  }

  get installPath(): string {
    return join(this.docsRoot, this.pkg.name, this.pkg.spec.version, DOCUMENTATION_FILE);
  }

  async alreadyInstalled(): Promise<boolean> {
    return exists(this.outputPath);
  }

  async render(): Promise<string> {
    const lines = [`# ${this.pkg.name} ${this.pkg.spec.version}`, ''];
    if (this.pkg.spec.summary) {
      lines.push(this.pkg.spec.summary, '');
    }

    const readme = await this.readme();
    if (readme) {
      lines.push(readme.trim(), '');
    }

    const headers = await this.pkg.publicHeaders();
    if (headers.length > 0) {
      lines.push('## Public headers', '', ...headers.map(header => `- \`${header}\``), '');
    }
    return lines.join('\n');
  }

  /**
   * @param install - also copy the page to the shared docs root
   */
  async generate(install: boolean): Promise<void> {
    await writeTextFile(this.outputPath, await this.render());
    logger.debug(`Generated documentation for ${this.pkg.name}`, { path: this.outputPath });
    if (install) {
      await copyFile(this.outputPath, this.installPath);
    }
  }

  private async readme(): Promise<string | undefined> {
    if (!(await exists(this.pkg.root))) {
      return undefined;
    }
    const [first] = (await listFiles(this.pkg.root)).filter(file => README_PATTERN.test(file)).sort();
    return first ? readTextFile(join(this.pkg.root, first)) : undefined;
  }
}
