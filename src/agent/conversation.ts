// pattern: Functional Core

/**
 * Append-only conversation log for one tool-calling run.
 * Turn 0 is always the fixed system instruction and turn 1 the user's request. Every tool-call
 * turn must be answered by one tool result per call, in call order, before the log can be sent
 * to the model again.
 */

import type { Message, ToolCall } from '../model/types.js';
import { buildSystemInstruction } from './prompt.js';
import type { Turn } from './types.js';

export type Conversation = {
  turns(): ReadonlyArray<Turn>;
  pendingCallIds(): ReadonlyArray<string>;
  appendToolCalls(calls: ReadonlyArray<ToolCall>): void;
  appendToolResult(callId: string, payload: string): void;
  appendAssistantText(text: string): void;
  toMessages(): Array<Message>;
};

export function createConversation(userRequest: string): Conversation {
  const turns: Array<Turn> = [
    { kind: 'system', instruction: buildSystemInstruction() },
    { kind: 'user', text: userRequest },
  ];
  const pending: Array<string> = [];

  function assertNoPendingResults(action: string): void {
    if (pending.length > 0) {
      throw new Error(`cannot ${action}: awaiting tool results for ${pending.join(', ')}`);
    }
  }

  return {
    turns(): ReadonlyArray<Turn> {
      return turns.slice();
    },

    pendingCallIds(): ReadonlyArray<string> {
      return pending.slice();
    },

    appendToolCalls(calls: ReadonlyArray<ToolCall>): void {
      assertNoPendingResults('append tool calls');
      if (calls.length === 0) {
        throw new Error('a tool-call turn needs at least one call');
      }
      turns.push({ kind: 'assistant_tool_calls', calls: calls.slice() });
      pending.push(...calls.map((call) => call.id));
    },

    appendToolResult(callId: string, payload: string): void {
      const expected = pending[0];
      if (expected === undefined) {
        throw new Error(`unexpected tool result for ${callId}: no tool call is awaiting a result`);
      }
      if (expected !== callId) {
        throw new Error(`tool result for ${callId} is out of order: expected ${expected}`);
      }
      pending.shift();
      turns.push({ kind: 'tool_result', callId, payload });
    },

    appendAssistantText(text: string): void {
      assertNoPendingResults('append assistant text');
      turns.push({ kind: 'assistant_text', text });
    },

    toMessages(): Array<Message> {
      assertNoPendingResults('send the conversation');
      return turns.map(toMessage);
    },
  };
}

function toMessage(turn: Turn): Message {
  switch (turn.kind) {
    case 'system':
      return { role: 'system', content: turn.instruction };
    case 'user':
      return { role: 'user', content: turn.text };
    case 'assistant_text':
      return { role: 'assistant', content: turn.text };
    case 'assistant_tool_calls':
      return { role: 'assistant', content: '', tool_calls: turn.calls };
    case 'tool_result':
      return { role: 'tool', content: turn.payload, tool_call_id: turn.callId };
  }
}
