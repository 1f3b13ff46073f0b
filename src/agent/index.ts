#!/usr/bin/env node

import { Command } from 'commander'
import { registerChatCommand } from './commands/chat'
import { registerKpisCommand } from './commands/kpis'
import { error } from './format'

const program = new Command()

program
  .name('inventory-agent')
  .description('Inventory analytics console: chat with the assistant or print KPIs')
  .version('1.0.0')

registerChatCommand(program)
registerKpisCommand(program)

program.parseAsync(process.argv).catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err))
  process.exitCode = 1
})
