#!/usr/bin/env node

import { Command } from 'commander'
import { registerProcessCommand } from './commands/process.js'

const program = new Command()

program
  .name('common-supplier')
  .description('Merge duplicate vendor-master suppliers into a common supplier upload file')
  .version('0.1.0')

registerProcessCommand(program)

await program.parseAsync(process.argv)
