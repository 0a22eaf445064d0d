import { relative } from 'path';

import type { InstallPhase } from '../context.js';
import { requireResolution } from '../context.js';
import { generateRecord, writeRecord } from '../../record/installation-record.js';

/**
 * Record phase: the same bytes go to the project lockfile and to the sandbox
 * manifest. Sets: record.
 */
export const writeRecordPhase: InstallPhase = {
  name: 'write-record',

  async run(ctx) {
    const resolution = requireResolution(ctx);
    const record = generateRecord(resolution, ctx.revisions, ctx.lockfile ?? ctx.sandboxManifest);

    ctx.output.message(`- Writing lockfile in ${relative(ctx.projectDir, ctx.lockfilePath)}`);
    ctx.output.message(`- Writing manifest in ${relative(ctx.projectDir, ctx.sandbox.manifestPath)}`);
    await writeRecord(record, [ctx.lockfilePath, ctx.sandbox.manifestPath]);

    ctx.record = record;
  }
};
