import { buildToolEvent } from './event.js';
import type { ToolContext, ToolRegistry } from './tools.js';
import type { JsonRecord, ToolCall, ToolCallRecord, ToolResult } from './types.js';

export class Dispatcher {
  constructor(
    private registry: ToolRegistry,
    private ctx: ToolContext,
    private now: () => number = Date.now
  ) {}

  /** Runs every call in order; one failing call never blocks the rest. */
  dispatch(calls: readonly ToolCall[], payload: JsonRecord): ToolCallRecord[] {
    return calls.map((call) => ({
      name: call.name,
      callId: call.callId,
      arguments: call.arguments,
      result: this.run(call, payload)
    }));
  }

  private run(call: ToolCall, payload: JsonRecord): ToolResult {
    const handler = this.registry.get(call.name);
    if (!handler) {
      this.ctx.log.warn({ tool: call.name, callId: call.callId }, 'unknown tool');
      return { error: `unknown tool: ${call.name}` };
    }
    try {
      const result = handler(buildToolEvent(payload, call, this.now), this.ctx);
      this.ctx.log.info({ tool: call.name, callId: call.callId }, 'tool call handled');
      return result;
    } catch (error) {
      this.ctx.log.error({ tool: call.name, callId: call.callId, err: String(error) }, 'tool handler failed');
      return { error: error instanceof Error ? error.message : String(error) };
    }
  }
}

export interface ToolResponse {
  ok: true;
  tool_calls?: { id: string | null; name: string; result: ToolResult }[];
  results?: Record<string, ToolResult>;
  tool_results?: { name: string; call_id: string | null; arguments: JsonRecord; result: ToolResult }[];
  responses?: { tool_call_id: string | null; result: ToolResult }[];
  tool_call_id?: string | null;
  result?: ToolResult;
}

/** Serialises dispatch records into every response shape consumers expect. */
export function composeResponse(records: readonly ToolCallRecord[]): ToolResponse {
  if (records.length === 0) return { ok: true };

  const response: ToolResponse = {
    ok: true,
    tool_calls: records.map((r) => ({ id: r.callId ?? null, name: r.name, result: r.result })),
    results: Object.fromEntries(records.map((r) => [r.name, r.result])),
    tool_results: records.map((r) => ({
      name: r.name,
      call_id: r.callId ?? null,
      arguments: r.arguments,
      result: r.result
    })),
    responses: records.map((r) => ({ tool_call_id: r.callId ?? null, result: r.result }))
  };

  if (records.length === 1) {
    response.tool_call_id = records[0].callId ?? null;
    response.result = records[0].result;
  }
  return response;
}
