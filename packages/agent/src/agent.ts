// Tool-calling agent that answers questions through the Data Commons MCP tools
import type { ChatMessage, ChatProvider, ChatToolCall } from '@datcom/shared';
import { z } from 'zod';
import { getSystemPrompt } from './prompts.js';
import type {
  AgentConfig,
  AgentResult,
  AgentStep,
  ToolCall,
  ToolClient,
  ToolResult,
} from './types.js';

const ToolArgumentsSchema = z.record(z.string(), z.unknown());

export const MAX_STEPS_ANSWER =
  'Maximum steps reached without finding an answer';

type ParsedCall =
  | { ok: true; call: ToolCall }
  | { ok: false; call: ToolCall; error: string };

/**
 * Decode the model's JSON argument string for one tool call
 */
export function parseToolCall(call: ChatToolCall): ParsedCall {
  const base = { id: call.id, name: call.name, arguments: {} };
  if (!call.arguments.trim()) {
    return { ok: true, call: base };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(call.arguments);
  } catch (error) {
    return {
      ok: false,
      call: base,
      error: `Invalid arguments for ${call.name}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const result = ToolArgumentsSchema.safeParse(raw);
  if (!result.success) {
    return {
      ok: false,
      call: base,
      error: `Invalid arguments for ${call.name}: expected a JSON object`,
    };
  }
  return { ok: true, call: { ...base, arguments: result.data } };
}

export class DataCommonsAgent {
  constructor(
    private readonly chat: ChatProvider,
    private readonly tools: ToolClient,
    private config: AgentConfig,
  ) {}

  getVerbose(): boolean {
    return this.config.verbose;
  }

  setVerbose(verbose: boolean): void {
    this.config = { ...this.config, verbose };
  }

  async run(query: string): Promise<AgentResult> {
    const steps: AgentStep[] = [];
    const toolsUsed = new Set<string>();

    const messages: ChatMessage[] = [
      { role: 'system', content: getSystemPrompt() },
      { role: 'user', content: query },
    ];

    const tools = this.tools.getToolSchemas();

    if (this.config.verbose) {
      console.log('\n🤖 Agent starting...');
      console.log(`📝 Query: ${query}`);
      console.log(
        `🔧 Available tools: ${tools.map((t) => t.name).join(', ')}\n`,
      );
    }

    for (let step = 0; step < this.config.maxSteps; step++) {
      if (this.config.verbose) {
        console.log(`\n--- Step ${step + 1} ---`);
      }

      const completion = await this.chat.chat({
        messages,
        tools,
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
      });

      if (completion.content) {
        steps.push({
          type: 'thought',
          content: completion.content,
          timestamp: new Date(),
        });

        if (this.config.verbose) {
          console.log(`💭 Thought: ${completion.content}`);
        }
      }

      // No tool calls = final answer
      if (completion.toolCalls.length === 0) {
        const answer = completion.content ?? 'No answer generated';
        steps.push({ type: 'answer', content: answer, timestamp: new Date() });

        if (this.config.verbose) {
          console.log(
            toolsUsed.size > 0
              ? `\n✅ Final Answer: ${answer}`
              : '\n✅ (No tools needed)',
          );
        }

        return {
          answer,
          steps,
          toolsUsed: Array.from(toolsUsed),
          totalSteps: step + 1,
          success: true,
        };
      }

      const parsed = completion.toolCalls.map(parseToolCall);

      steps.push({
        type: 'action',
        content: `Calling tools: ${parsed.map((p) => p.call.name).join(', ')}`,
        toolCalls: parsed.map((p) => p.call),
        timestamp: new Date(),
      });

      messages.push({
        role: 'assistant',
        content: completion.content,
        toolCalls: completion.toolCalls,
      });

      const toolResults: ToolResult[] = [];
      for (const entry of parsed) {
        const result = await this.execute(entry);
        toolsUsed.add(entry.call.name);
        toolResults.push(result);
        messages.push({
          role: 'tool',
          toolCallId: result.toolCallId,
          content: result.content,
        });
      }

      steps.push({
        type: 'observation',
        content: toolResults.map((r) => r.content).join('\n'),
        toolResults,
        timestamp: new Date(),
      });
    }

    steps.push({
      type: 'answer',
      content: MAX_STEPS_ANSWER,
      timestamp: new Date(),
    });

    return {
      answer: MAX_STEPS_ANSWER,
      steps,
      toolsUsed: Array.from(toolsUsed),
      totalSteps: this.config.maxSteps,
      success: false,
    };
  }

  /**
   * Run one tool call; failures become `Error: …` text for the model
   */
  private async execute(entry: ParsedCall): Promise<ToolResult> {
    const { call } = entry;

    if (this.config.verbose) {
      console.log(
        `🔧 Action: ${call.name}(${JSON.stringify(call.arguments)})`,
      );
    }

    if (!entry.ok) {
      return this.failed(call.id, entry.error);
    }

    try {
      const outcome = await this.tools.callTool(call.name, call.arguments);
      if (outcome.isError) {
        return this.failed(call.id, outcome.text);
      }

      if (this.config.verbose) {
        const truncated =
          outcome.text.length > 200
            ? `${outcome.text.slice(0, 200)}...`
            : outcome.text;
        console.log(`📊 Observation: ${truncated}`);
      }

      return { toolCallId: call.id, content: outcome.text };
    } catch (error) {
      return this.failed(
        call.id,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private failed(toolCallId: string, message: string): ToolResult {
    if (this.config.verbose) {
      console.log(`❌ Error: ${message}`);
    }
    return { toolCallId, content: `Error: ${message}`, isError: true };
  }
}
