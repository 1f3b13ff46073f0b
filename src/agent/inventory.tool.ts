import axios from 'axios'
import type { AxiosInstance } from 'axios'
import type Anthropic from '@anthropic-ai/sdk'
import { z } from 'zod'

// ============================================
// TOOL DEFINITION
// ============================================

export const INVENTORY_TOOL_NAME = 'get_inventory_kpis'

export const INVENTORY_TOOL: Anthropic.Messages.Tool = {
  name: INVENTORY_TOOL_NAME,
  description:
    'Get inventory KPIs and daily time series from the inventory analytics API. ' +
    'Use this whenever the user asks about inventory levels, sales, trends, graphs or KPIs. ' +
    'Pass an item key (e.g. "y1sp001") to restrict the result to one item; omit it for all items. ' +
    'Returns JSON {"items": [{key, key_name, current_month, total_sales, avg_daily_sales, ' +
    'min_inventory, max_inventory, days_below_100, time_series: [{status_date, current_status_inventory, sales}]}]}.',
  input_schema: {
    type: 'object' as const,
    properties: {
      key: { type: 'string', description: 'Optional item key to filter the results' },
    },
  },
}

export const inventoryToolInputSchema = z.object({
  key: z.string().optional(),
})

// ============================================
// RESPONSE SCHEMA
// ============================================

export const kpiSummarySchema = z.object({
  key: z.string(),
  key_name: z.string(),
  current_month: z.number().int(),
  total_sales: z.number(),
  avg_daily_sales: z.number(),
  min_inventory: z.number(),
  max_inventory: z.number(),
  days_below_100: z.number().int(),
  time_series: z.array(
    z.object({
      status_date: z.string(),
      current_status_inventory: z.number(),
      sales: z.number(),
    })
  ),
})

export const inventoryStatsResponseSchema = z.object({
  items: z.array(kpiSummarySchema),
  message: z.string().optional(),
})

export type InventoryStatsPayload = z.infer<typeof inventoryStatsResponseSchema>

// ============================================
// HTTP CLIENT
// ============================================

export interface InventoryClientOptions {
  url: string
  timeoutMs: number
  http?: Pick<AxiosInstance, 'get'>
}

/**
 * Call the inventory stats endpoint and return the raw JSON text
 * The key is only sent when present; non-2xx answers throw with the response body
 */
export async function fetchInventoryKpis(key: string | undefined, options: InventoryClientOptions): Promise<string> {
  const http = options.http ?? axios
  const params = key ? { key } : {}

  try {
    const response = await http.get<string>(options.url, {
      params,
      timeout: options.timeoutMs,
      responseType: 'text',
    })
    return response.data
  } catch (error) {
    if (axios.isAxiosError(error) && error.response) {
      throw new Error(
        `Inventory stats request failed with status ${error.response.status}: ${String(error.response.data)}`
      )
    }
    throw error
  }
}

/**
 * Tool entry point for the agent: validates the model's arguments, then calls the endpoint
 */
export async function executeInventoryTool(input: unknown, options: InventoryClientOptions): Promise<string> {
  const parsed = inventoryToolInputSchema.safeParse(input ?? {})
  if (!parsed.success) {
    throw new Error(`Invalid arguments for ${INVENTORY_TOOL_NAME}: ${parsed.error.errors.map((e) => e.message).join(', ')}`)
  }
  return fetchInventoryKpis(parsed.data.key, options)
}
