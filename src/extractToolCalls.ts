import { transcriptOf } from './event.js';
import { asRecord, isRecord, nonEmptyString, type JsonRecord, type ToolCall } from './types.js';

/** Decodes tool arguments; a string that is not a JSON object degrades to `{ raw }`. */
export function decodeArguments(value: unknown): JsonRecord {
  if (isRecord(value)) return value;
  if (typeof value !== 'string') return {};
  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : { raw: value };
  } catch {
    return { raw: value };
  }
}

function toolCall(name: string, args: unknown, callId?: unknown): ToolCall {
  const call: ToolCall = { name, arguments: decodeArguments(args) };
  const id = nonEmptyString(callId);
  if (id) call.callId = id;
  return call;
}

type Strategy = (payload: JsonRecord) => ToolCall[];

const fromTypedEvent: Strategy = (payload) => {
  if (payload.event_type !== 'conversation.tool_call') return [];
  const props = asRecord(payload.properties);
  if (typeof props.name !== 'string' || !props.name) return [];
  return [toolCall(props.name, props.arguments, nonEmptyString(props.id) ?? payload.inference_id)];
};

const fromDirectTool: Strategy = (payload) => {
  const tool = payload.tool;
  if (!isRecord(tool) || typeof tool.name !== 'string' || !tool.name) return [];
  return [toolCall(tool.name, tool.arguments, nonEmptyString(tool.id) ?? tool.call_id)];
};

const fromDataTool: Strategy = (payload) => {
  const data = asRecord(payload.data);
  if (typeof data.tool !== 'string' || !data.tool) return [];
  return [toolCall(data.tool, data.arguments, data.call_id)];
};

const fromTranscript: Strategy = (payload) => {
  const calls: ToolCall[] = [];
  for (const msg of transcriptOf(payload)) {
    if (!isRecord(msg) || !Array.isArray(msg.tool_calls)) continue;
    for (const tc of msg.tool_calls) {
      if (!isRecord(tc)) continue;
      const fn = asRecord(tc.function);
      if (typeof fn.name !== 'string' || !fn.name) continue;
      calls.push(toolCall(fn.name, fn.arguments, tc.id));
    }
  }
  return calls;
};

const STRATEGIES: readonly Strategy[] = [fromTypedEvent, fromDirectTool, fromDataTool, fromTranscript];

export function extractToolCalls(payload: JsonRecord): ToolCall[] {
  for (const strategy of STRATEGIES) {
    const calls = strategy(payload);
    if (calls.length > 0) return calls;
  }
  return [];
}
