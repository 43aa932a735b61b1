#!/usr/bin/env -S node --import tsx
/**
 * bin/crucible.ts — entry point for the `crucible` command.
 */

const { program } = await import('../commands/index.js')
await program.parseAsync()
