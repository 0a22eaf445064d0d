import { join } from 'path';

import type { TargetDefinition } from '../../types/index.js';
import { exists, listFiles, readTextFile, writeTextFile } from '../../utils/fs.js';
import type { LocalPackage } from '../sandbox/local-package.js';

const LICENSE_FILE_PATTERN = /^licen[cs]e(\.|$)/i;

/**
 * License text of a package: inline text first, then the declared license
 * file, then any LICENSE file at the package root
 */
export async function licenseText(pkg: LocalPackage): Promise<string | undefined> {
  const license = pkg.spec.license;
  if (license?.text) {
    return license.text.trim();
  }

  const candidates: string[] = [];
  if (license?.file) {
    candidates.push(license.file);
  }
  if (await exists(pkg.root)) {
    candidates.push(...(await listFiles(pkg.root)).filter(file => LICENSE_FILE_PATTERN.test(file)).sort());
  }

  for (const candidate of candidates) {
    const path = join(pkg.root, candidate);
    if (await exists(path)) {
      return (await readTextFile(path)).trim();
    }
  }
  return undefined;
}

export async function renderAcknowledgements(
  target: TargetDefinition,
  packages: readonly LocalPackage[]
): Promise<string> {
  const sections: string[] = [
    '# Acknowledgements',
    '',
    `This target (${target.name}) makes use of the following third party libraries:`
  ];

  for (const pkg of packages) {
    const text = await licenseText(pkg);
    sections.push('', `## ${pkg.name}`, '', text ?? 'No license information provided.');
  }

  sections.push('', 'Generated by sandkit', '');
  return sections.join('\n');
}

export async function writeAcknowledgements(
  target: TargetDefinition,
  packages: readonly LocalPackage[],
  path: string
): Promise<void> {
  await writeTextFile(path, await renderAcknowledgements(target, packages));
}
