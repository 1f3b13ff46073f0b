import { Command, InvalidArgumentError } from 'commander'
import { env } from '../../config/env'
import { createAnthropicModelClient } from '../anthropic.client'
import { runInventoryChat } from '../chat.service'
import { error, heading, warn } from '../format'
import { executeInventoryTool, INVENTORY_TOOL } from '../inventory.tool'

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

interface ChatCommandOptions {
  model: string
  maxTurns: number
  url: string
}

export function registerChatCommand(program: Command): void {
  program
    .command('chat <question>')
    .description('Ask the inventory analytics assistant a question')
    .option('-m, --model <id>', 'Model id', env.agentModel)
    .option('--max-turns <n>', 'Maximum model replies before giving up', parsePositiveInt, env.agentMaxTurns)
    .option('-u, --url <url>', 'Inventory stats endpoint used by the tool', env.inventoryStatsUrl)
    .action(async (question: string, opts: ChatCommandOptions) => {
      if (!env.anthropicApiKey) {
        error('ANTHROPIC_API_KEY is not set. Add it to your environment or .env file.')
        process.exitCode = 1
        return
      }

      const result = await runInventoryChat(question, {
        model: createAnthropicModelClient({ apiKey: env.anthropicApiKey, model: opts.model }),
        tools: [
          {
            definition: INVENTORY_TOOL,
            execute: (input) => executeInventoryTool(input, { url: opts.url, timeoutMs: env.toolTimeoutMs }),
          },
        ],
        maxTurns: opts.maxTurns,
      })

      if (result.status === 'incomplete') {
        warn(`Stopped after ${result.turns} turns without a final answer`)
      }

      heading('ASSISTANT RESPONSE')
      console.log(result.answer)
      console.log()
    })
}
