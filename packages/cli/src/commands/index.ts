/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 */

import { program } from 'commander'
import { buildCommand } from './build.js'
import { imageBuildCommand } from './image-build.js'
import { initCommand } from './init.js'
import { createCommand } from './create.js'
import { destroyCommand } from './destroy.js'
import { buildsCommand, imagesCommand, shellCommand } from './builds.js'

program
  .name('crucible')
  .description(
    'Crucible — build Ceph from source in containers and compose runtime images.\n' +
    'Stage images are cached; run image-build once per vendor and release.',
  )
  .version('0.1.0')

program.addCommand(initCommand)
program.addCommand(imageBuildCommand)
program.addCommand(buildCommand)
program.addCommand(createCommand)
program.addCommand(destroyCommand)
program.addCommand(buildsCommand)
program.addCommand(imagesCommand)
program.addCommand(shellCommand)

export { program }
