import { join } from 'path';

import type { TargetDefinition } from '../../types/index.js';
import { DUMMY_CLASS_PREFIX, SANDBOX_DIRS, TARGET_LABEL_PREFIX } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';

/**
 * Names and paths of everything generated for one target
 */
export class TargetLibrary {
  constructor(
    readonly definition: TargetDefinition,
    private readonly sandboxRoot: string
  ) {}

  /** e.g. Packages-App */
  get label(): string {
    return `${TARGET_LABEL_PREFIX}-${this.definition.name}`;
  }

  get libraryName(): string {
    return `lib${this.label}.a`;
  }

  /** Support directory relative to the sandbox root */
  get supportDir(): string {
    return `${SANDBOX_DIRS.TARGET_SUPPORT_FILES}/${this.label}`;
  }

  get settingsPath(): string {
    return `${this.supportDir}/${this.label}.settings`;
  }

  get prefixHeaderPath(): string {
    return `${this.supportDir}/${this.label}-prefix.h`;
  }

  get acknowledgementsPath(): string {
    return `${this.supportDir}/${this.label}-acknowledgements.md`;
  }

  get dummyClassName(): string {
    return `${DUMMY_CLASS_PREFIX}${this.label.replace(/\W/g, '_')}`;
  }

  /** Dummy source file, at the sandbox root */
  get dummySourcePath(): string {
    return `${this.dummyClassName}.m`;
  }

  /** Absolute form of a sandbox-relative path */
  absolute(relativePath: string): string {
    return join(this.sandboxRoot, relativePath);
  }
}

/**
 * Targets whose labels or dummy classes differ only in case or punctuation
 * would share generated files.
 *
 * @throws ValidationError naming both targets
 */
export function assertDistinctLibraries(libraries: readonly TargetLibrary[]): void {
  const owners = new Map<string, string>();
  for (const library of libraries) {
    for (const generated of [library.label, library.dummyClassName]) {
      const key = generated.toLowerCase();
      const owner = owners.get(key);
      if (owner !== undefined && owner !== library.definition.name) {
        throw new ValidationError(
          `Targets '${owner}' and '${library.definition.name}' would both generate ${generated}; rename one of them`,
          { targetName: library.definition.name }
        );
      }
      owners.set(key, library.definition.name);
    }
  }
}
