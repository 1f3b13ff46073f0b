import { describe, expect, it, vi } from 'vitest'
import {
  runInventoryChat,
  SYSTEM_PROMPT,
  type AgentTool,
  type ConversationTurn,
  type ModelClient,
  type ModelReply,
  type ModelRequest,
} from '../chat.service'
import { INVENTORY_TOOL } from '../inventory.tool'

/**
 * Model stand-in that answers from a script and keeps a copy of every request
 */
function scriptedModel(replies: ModelReply[]) {
  const requests: ModelRequest[] = []
  const model: ModelClient = {
    async complete(request) {
      requests.push({ ...request, messages: structuredClone(request.messages) })
      const reply = replies.shift()
      if (!reply) throw new Error('script exhausted')
      return reply
    },
  }
  return { model, requests }
}

const toolCall = (id: string, input: unknown): ModelReply => ({
  content: [
    { type: 'text', text: 'Let me look that up.' },
    { type: 'tool_use', id, name: 'get_inventory_kpis', input },
  ],
  stopReason: 'tool_use',
})

const finalAnswer = (text: string): ModelReply => ({
  content: [{ type: 'text', text }],
  stopReason: 'end_turn',
})

function inventoryTool(execute: (input: unknown) => Promise<string>): AgentTool {
  return { definition: INVENTORY_TOOL, execute }
}

describe('runInventoryChat', () => {
  it('answers directly when the model calls no tool', async () => {
    const { model, requests } = scriptedModel([finalAnswer('Hello.')])
    const execute = vi.fn()

    const result = await runInventoryChat('hi', { model, tools: [inventoryTool(execute)], maxTurns: 5 })

    expect(result).toEqual({ status: 'completed', answer: 'Hello.', turns: 1, toolCalls: 0 })
    expect(execute).not.toHaveBeenCalled()
    expect(requests[0].system).toBe(SYSTEM_PROMPT)
    expect(requests[0].tools).toEqual([INVENTORY_TOOL])
    expect(requests[0].messages).toEqual([{ role: 'user', content: 'hi' }])
  })

  it('runs the tool and feeds its raw output back', async () => {
    const { model, requests } = scriptedModel([toolCall('call_1', { key: 'y1sp001' }), finalAnswer('Total sales were 2200.')])
    const execute = vi.fn().mockResolvedValue('{"items":[{"key":"y1sp001"}]}')

    const result = await runInventoryChat('How did y1sp001 sell?', {
      model,
      tools: [inventoryTool(execute)],
      maxTurns: 5,
    })

    expect(result).toEqual({ status: 'completed', answer: 'Total sales were 2200.', turns: 2, toolCalls: 1 })
    expect(execute).toHaveBeenCalledWith({ key: 'y1sp001' })

    const expected: ConversationTurn[] = [
      { role: 'user', content: 'How did y1sp001 sell?' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Let me look that up.' },
          { type: 'tool_use', id: 'call_1', name: 'get_inventory_kpis', input: { key: 'y1sp001' } },
        ],
      },
      {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'call_1', content: '{"items":[{"key":"y1sp001"}]}' }],
      },
    ]
    expect(requests[1].messages).toEqual(expected)
  })

  it('reports tool failures to the model as errors', async () => {
    const { model, requests } = scriptedModel([toolCall('call_1', {}), finalAnswer('The data is unavailable.')])
    const execute = vi.fn().mockRejectedValue(new Error('Inventory stats request failed with status 500'))

    const result = await runInventoryChat('Show inventory', { model, tools: [inventoryTool(execute)], maxTurns: 5 })

    expect(result.status).toBe('completed')
    expect(requests[1].messages[2]).toEqual({
      role: 'user',
      content: [
        {
          type: 'tool_result',
          tool_use_id: 'call_1',
          content: '{"error":"Inventory stats request failed with status 500"}',
          is_error: true,
        },
      ],
    })
  })

  it('answers unknown tools with an error result', async () => {
    const { model, requests } = scriptedModel([
      { content: [{ type: 'tool_use', id: 'call_9', name: 'delete_everything', input: {} }], stopReason: 'tool_use' },
      finalAnswer('I cannot do that.'),
    ])

    await runInventoryChat('Delete it', { model, tools: [inventoryTool(vi.fn())], maxTurns: 5 })

    expect(requests[1].messages[2]).toEqual({
      role: 'user',
      content: [
        {
          type: 'tool_result',
          tool_use_id: 'call_9',
          content: '{"error":"Unknown tool: delete_everything"}',
          is_error: true,
        },
      ],
    })
  })

  it('stops as incomplete after maxTurns replies that keep calling tools', async () => {
    const { model, requests } = scriptedModel([toolCall('call_1', {}), toolCall('call_2', {})])
    const execute = vi.fn().mockResolvedValue('{"items":[]}')

    const result = await runInventoryChat('Loop', { model, tools: [inventoryTool(execute)], maxTurns: 2 })

    expect(result).toEqual({ status: 'incomplete', answer: 'Let me look that up.', turns: 2, toolCalls: 2 })
    expect(requests).toHaveLength(2)
  })

  it('propagates model failures', async () => {
    const model: ModelClient = { complete: vi.fn().mockRejectedValue(new Error('overloaded')) }

    await expect(runInventoryChat('hi', { model, tools: [], maxTurns: 3 })).rejects.toThrow('overloaded')
  })
})
