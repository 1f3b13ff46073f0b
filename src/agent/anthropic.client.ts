import Anthropic from '@anthropic-ai/sdk'
import type { ModelClient, ModelReply, ReplyBlock } from './chat.service'

export interface AnthropicClientOptions {
  apiKey: string
  model: string
  maxTokens?: number
}

/**
 * ModelClient backed by the Anthropic Messages API
 * Only text and tool_use blocks are kept from the reply
 */
export function createAnthropicModelClient(options: AnthropicClientOptions): ModelClient {
  const client = new Anthropic({ apiKey: options.apiKey })

  return {
    async complete(request): Promise<ModelReply> {
      const message = await client.messages.create({
        model: options.model,
        max_tokens: options.maxTokens ?? 4096,
        system: request.system,
        tools: request.tools,
        messages: request.messages,
      })

      const content: ReplyBlock[] = []
      for (const block of message.content) {
        if (block.type === 'text') {
          content.push({ type: 'text', text: block.text })
        } else if (block.type === 'tool_use') {
          content.push({ type: 'tool_use', id: block.id, name: block.name, input: block.input })
        }
      }

      return { content, stopReason: message.stop_reason }
    },
  }
}
