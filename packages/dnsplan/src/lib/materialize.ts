// dnsplan/src/lib/materialize.ts — write a plan's generated files

import { dump } from 'js-yaml';
import { GENERATED_DIR } from './constants.js';
import { formatPath, resolvePath } from './fs.js';
import type { FileSystem } from './fs.js';
import type { BuildPlan } from './types.js';

export const PLAN_FILENAME = 'plan.yml';

/**
 * Write every generated file to `<outDir>/<service>/contents/` and the
 * plan itself to `<outDir>/plan.yml`. Returns the written paths.
 */
export async function materializePlan(plan: BuildPlan, fs: FileSystem, outDir: string): Promise<string[]> {
    const written: string[] = [];
    await fs.mkdir(resolvePath('.', outDir));

    for (const service of Object.values(plan.services)) {
        const dir = resolvePath(`${service.name}/${GENERATED_DIR}`, outDir);
        await fs.mkdir(dir);
        for (const file of service.files) {
            const target = resolvePath(file.filename, formatPath(dir));
            await fs.write(target, file.content);
            written.push(formatPath(target));
        }
    }

    const planFile = resolvePath(PLAN_FILENAME, outDir);
    await fs.write(planFile, dump(plan, { noRefs: true, skipInvalid: true }));
    written.push(formatPath(planFile));
    return written;
}
