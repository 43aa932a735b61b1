/**
 * @crucible/cli
 *
 * The `crucible` command line. The executable is src/bin/crucible.ts; this
 * module exports the configured program and the pieces the tests use.
 */

export { program } from './commands/index.js';
export { resolveBuildRequest } from './commands/build.js';
export type { BuildOptions, BuildRequest } from './commands/build.js';
export { ConsoleReporter, describeEvent } from './output/reporter.js';
export type { EventLine } from './output/reporter.js';
export { formatImageRow, groupBuildImages } from './output/images.js';
export type { BuildImageRow } from './output/images.js';
export { failureLines, toolFailure } from './failure.js';
