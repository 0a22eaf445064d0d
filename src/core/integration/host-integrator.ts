import { join, relative } from 'path';

import { FILE_PATTERNS } from '../../constants/index.js';
import { writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { TargetLibrary } from '../generator/target-library.js';

export interface IntegrationRequest {
  projectDir: string;
  sandboxRoot: string;
  /** Path of the serialized build-file container */
  projectPath: string;
  libraries: readonly TargetLibrary[];
}

/**
 * Wires generated artifacts into the user's build project
 */
export interface HostIntegrator {
  integrate(request: IntegrationRequest): Promise<void>;
}

function toPosix(path: string): string {
  return path.split('\\').join('/');
}

/**
 * Writes sandkit-integration.json at the project root, mapping each target
 * to its settings file, library and acknowledgements. Build tools read it
 * instead of having their project files edited.
 */
export class ManifestIntegrator implements HostIntegrator {
  async integrate(request: IntegrationRequest): Promise<void> {
    const fromProject = (path: string): string => toPosix(relative(request.projectDir, path));

    const targets: Record<string, object> = {};
    for (const library of request.libraries) {
      targets[library.definition.name] = {
        label: library.label,
        platform: library.definition.platform,
        library: library.libraryName,
        settings: fromProject(library.absolute(library.settingsPath)),
        acknowledgements: fromProject(library.absolute(library.acknowledgementsPath))
      };
    }

    const outputPath = join(request.projectDir, FILE_PATTERNS.INTEGRATION_FILE);
    await writeJsonFile(outputPath, {
      sandbox: fromProject(request.sandboxRoot),
      project: fromProject(request.projectPath),
      targets
    });
    logger.debug(`Wrote integration manifest to ${outputPath}`, { targets: Object.keys(targets) });
  }
}
