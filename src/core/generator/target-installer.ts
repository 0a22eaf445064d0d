import { PROJECT_GROUPS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { LocalPackage } from '../sandbox/local-package.js';
import { isCompiledSource, type BuildProject, type ProjectTarget } from './build-project.js';
import type { TargetLibrary } from './target-library.js';

const SANDBOX_ROOT_SETTING = '${PACKAGES_ROOT}';

/**
 * Creates the project target of one library and writes its settings and
 * prefix header.
 */
export class TargetInstaller {
  private installedTarget: ProjectTarget | undefined;

  constructor(
    private readonly project: BuildProject,
    readonly library: TargetLibrary,
    readonly packages: readonly LocalPackage[]
  ) {}

  get target(): ProjectTarget {
    if (!this.installedTarget) {
      throw new ValidationError(`Target ${this.library.label} has not been installed yet`);
    }
    return this.installedTarget;
  }

  async install(): Promise<void> {
    const target = this.project.addTarget(this.library.label, this.library.definition.platform);
    this.installedTarget = target;

    for (const pkg of this.packages) {
      const group = this.project.packageGroup(pkg.name, pkg.locallySourced);
      for (const ref of group.files) {
        if (isCompiledSource(ref.path)) {
          target.addSourceFile(ref);
        }
      }
    }

    const settings = this.buildSettings();
    Object.assign(target.buildSettings, {
      BASE_CONFIGURATION: this.library.settingsPath,
      GCC_PREFIX_HEADER: this.library.prefixHeaderPath,
      PRODUCT_NAME: this.library.label
    });

    await writeTextFile(this.library.absolute(this.library.settingsPath), renderSettings(settings));
    await writeTextFile(this.library.absolute(this.library.prefixHeaderPath), this.prefixHeader());

    const supportGroup = this.project.mainGroup.group(PROJECT_GROUPS.TARGET_SUPPORT_FILES).group(this.library.label);
    supportGroup.addFile(this.library.settingsPath);
    supportGroup.addFile(this.library.prefixHeaderPath);

    logger.debug(`Installed target ${this.library.label}`, {
      packages: this.packages.map(pkg => pkg.name),
      sources: target.sourceBuildPhase.length
    });
  }

  buildSettings(): Record<string, string> {
    const headerPaths = [
      `"${SANDBOX_ROOT_SETTING}/Headers"`,
      ...this.packages.map(pkg => `"${SANDBOX_ROOT_SETTING}/Headers/${pkg.name}"`)
    ];
    const frameworks = uniqueSorted(this.packages.flatMap(pkg => pkg.spec.frameworks));
    const libraries = uniqueSorted(this.packages.flatMap(pkg => pkg.spec.libraries));
    const linkerFlags = [
      ...libraries.map(lib => `-l${lib}`),
      ...frameworks.map(framework => `-framework ${framework}`)
    ];

    return {
      ALWAYS_SEARCH_USER_PATHS: 'YES',
      HEADER_SEARCH_PATHS: headerPaths.join(' '),
      OTHER_LDFLAGS: linkerFlags.join(' '),
      PACKAGES_ROOT: '${SRCROOT}/Packages'
    };
  }

  private prefixHeader(): string {
    const framework = this.library.definition.platform === 'ios' ? 'UIKit' : 'Foundation';
    return ['#ifdef __OBJC__', `#import <${framework}/${framework}.h>`, '#endif', ''].join('\n');
  }
}

function uniqueSorted(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

function renderSettings(settings: Record<string, string>): string {
  return (
    Object.keys(settings)
      .sort()
      .map(key => `${key} = ${settings[key]}`)
      .join('\n') + '\n'
  );
}
