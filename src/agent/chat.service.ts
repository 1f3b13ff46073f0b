/**
 * Inventory chat agent
 *
 * Sends the user's question to the model together with the inventory tool,
 * runs every tool call the model asks for, and feeds the results back until
 * the model answers without calling a tool.
 */

import type Anthropic from '@anthropic-ai/sdk'
import { agentLogger as log } from '../config/logger'

// ============================================
// SYSTEM PROMPT
// ============================================

export const SYSTEM_PROMPT = `You are an inventory analytics assistant.
You have access to a tool called \`get_inventory_kpis\` that returns KPIs and daily time series data from an inventory CSV.

Use a ReAct (Reason + Act) pattern:
1. First, think step-by-step about what the user is asking.
2. If you need data from the file (almost always), call the tool.
3. After receiving tool output, carefully analyze it and then respond clearly.

When answering:
- For tables, output Markdown tables.
- For graphs, output a JSON 'chart_spec' object like:
  {"x": [...], "y": [...], "series_name": "...", "type": "line"}
  that a frontend could render.
- Always explain the KPIs in plain language.`

// ============================================
// TYPES
// ============================================

export interface TextBlock {
  type: 'text'
  text: string
}

export interface ToolUseBlock {
  type: 'tool_use'
  id: string
  name: string
  input: unknown
}

export interface ToolResultBlock {
  type: 'tool_result'
  tool_use_id: string
  content: string
  is_error?: boolean
}

export type ReplyBlock = TextBlock | ToolUseBlock

/** Conversation turn in the Messages API shape */
export interface ConversationTurn {
  role: 'user' | 'assistant'
  content: string | Array<ReplyBlock | ToolResultBlock>
}

export interface ModelRequest {
  system: string
  tools: Anthropic.Messages.Tool[]
  messages: ConversationTurn[]
}

export interface ModelReply {
  content: ReplyBlock[]
  stopReason: string | null
}

/** The one model call the agent needs */
export interface ModelClient {
  complete(request: ModelRequest): Promise<ModelReply>
}

export interface AgentTool {
  definition: Anthropic.Messages.Tool
  execute(input: unknown): Promise<string>
}

export interface ChatOptions {
  model: ModelClient
  tools: AgentTool[]
  maxTurns: number
}

export interface ChatResult {
  status: 'completed' | 'incomplete'
  answer: string
  turns: number
  toolCalls: number
}

// ============================================
// LOOP
// ============================================

function isText(block: ReplyBlock): block is TextBlock {
  return block.type === 'text'
}

function isToolUse(block: ReplyBlock): block is ToolUseBlock {
  return block.type === 'tool_use'
}

async function runTool(tools: AgentTool[], call: ToolUseBlock): Promise<ToolResultBlock> {
  const tool = tools.find((t) => t.definition.name === call.name)
  if (!tool) {
    log.warn({ toolName: call.name }, 'Model requested an unknown tool')
    return {
      type: 'tool_result',
      tool_use_id: call.id,
      content: JSON.stringify({ error: `Unknown tool: ${call.name}` }),
      is_error: true,
    }
  }

  log.debug({ toolName: call.name, toolInput: call.input }, 'Executing tool')
  try {
    const output = await tool.execute(call.input)
    return { type: 'tool_result', tool_use_id: call.id, content: output }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Tool execution failed'
    log.error({ toolName: call.name, error: message }, 'Tool execution failed')
    return {
      type: 'tool_result',
      tool_use_id: call.id,
      content: JSON.stringify({ error: message }),
      is_error: true,
    }
  }
}

/**
 * Ask one question and run the tool loop to completion
 * Stops as incomplete when the model is still calling tools after maxTurns replies
 */
export async function runInventoryChat(question: string, options: ChatOptions): Promise<ChatResult> {
  const { model, tools, maxTurns } = options
  const messages: ConversationTurn[] = [{ role: 'user', content: question }]
  const definitions = tools.map((t) => t.definition)

  let answer = ''
  let toolCalls = 0

  for (let turn = 1; turn <= maxTurns; turn++) {
    const reply = await model.complete({ system: SYSTEM_PROMPT, tools: definitions, messages })

    answer = reply.content
      .filter(isText)
      .map((block) => block.text)
      .join('\n')

    const calls = reply.content.filter(isToolUse)
    if (calls.length === 0) {
      return { status: 'completed', answer, turns: turn, toolCalls }
    }

    messages.push({ role: 'assistant', content: reply.content })

    const results: ToolResultBlock[] = []
    for (const call of calls) {
      results.push(await runTool(tools, call))
      toolCalls++
    }
    messages.push({ role: 'user', content: results })
  }

  log.warn({ maxTurns, toolCalls }, 'Agent stopped before producing a final answer')
  return { status: 'incomplete', answer, turns: maxTurns, toolCalls }
}
