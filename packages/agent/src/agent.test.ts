// Tests for the tool-calling loop, driven by a scripted chat model and in-process tools
import { SharedResources } from '@datcom/server';
import {
  type ChatCompletion,
  type ChatProvider,
  defaultConfig,
  type DatcomConfig,
} from '@datcom/shared';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DataCommonsAgent, MAX_STEPS_ANSWER, parseToolCall } from './agent.js';
import { inProcessServer, MCPClient } from './mcp-client.js';

const DEFAULTS = defaultConfig();

const TEST_CONFIG: DatcomConfig = {
  ...DEFAULTS,
  datacommons: {
    ...DEFAULTS.datacommons,
    apiKey: 'test-datcom-key',
  },
};

const RESOLVE_BODY = {
  entities: [{ node: 'California', candidates: [{ dcid: 'geoId/06' }] }],
};

const POPULATION_BODY = {
  byVariable: {
    Count_Person: {
      byEntity: {
        'geoId/06': {
          orderedFacets: [
            {
              facetId: '2176550201',
              observations: [{ date: '2022', value: 39029342 }],
            },
          ],
        },
      },
    },
  },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function toolTurn(
  id: string,
  name: string,
  args: string,
): ChatCompletion {
  return { content: null, toolCalls: [{ id, name, arguments: args }] };
}

function answer(content: string): ChatCompletion {
  return { content, toolCalls: [] };
}

describe('DataCommonsAgent', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const chatMock = vi.fn<ChatProvider['chat']>();
  const chat: ChatProvider = { chat: chatMock };
  let mcpClient: MCPClient;

  beforeEach(async () => {
    fetchMock.mockReset();
    chatMock.mockReset();
    fetchMock.mockImplementation(async (input) =>
      String(input).includes('/resolve')
        ? jsonResponse(RESOLVE_BODY)
        : jsonResponse(POPULATION_BODY),
    );
    mcpClient = new MCPClient(
      inProcessServer(new SharedResources(TEST_CONFIG, { fetch: fetchMock })),
    );
    await mcpClient.connect();
  });

  afterEach(async () => {
    await mcpClient.disconnect();
  });

  function createAgent(maxSteps = 10): DataCommonsAgent {
    return new DataCommonsAgent(chat, mcpClient, { maxSteps, verbose: false });
  }

  it('should answer directly when the model calls no tools', async () => {
    chatMock.mockResolvedValueOnce(answer('Hello! Ask me about a place.'));

    const result = await createAgent().run('hi');

    expect(result).toMatchObject({
      answer: 'Hello! Ask me about a place.',
      toolsUsed: [],
      totalSteps: 1,
      success: true,
    });
  });

  it('should send the system prompt, the query and the MCP tool list', async () => {
    chatMock.mockResolvedValueOnce(answer('ok'));

    await new DataCommonsAgent(chat, mcpClient, {
      maxSteps: 3,
      verbose: false,
      maxTokens: 512,
      temperature: 0.1,
    }).run('Population of Texas?');

    const options = chatMock.mock.calls[0]?.[0];
    expect(options?.messages[0]?.role).toBe('system');
    expect(options?.messages[1]).toEqual({
      role: 'user',
      content: 'Population of Texas?',
    });
    expect(options?.tools?.map((tool) => tool.name).sort()).toEqual([
      'get_available_variables',
      'get_dcid',
      'get_population_count',
    ]);
    expect(options?.maxTokens).toBe(512);
    expect(options?.temperature).toBe(0.1);
  });

  it('should resolve a place, fetch its population and return the answer', async () => {
    chatMock
      .mockResolvedValueOnce(
        toolTurn('call_1', 'get_dcid', '{"place":"California"}'),
      )
      .mockResolvedValueOnce(
        toolTurn(
          'call_2',
          'get_population_count',
          '{"place_dcids":["geoId/06"]}',
        ),
      )
      .mockResolvedValueOnce(
        answer('California had 39,029,342 residents in 2022.'),
      );

    const result = await createAgent().run(
      'What is the population of California?',
    );

    expect(result.answer).toBe('California had 39,029,342 residents in 2022.');
    expect(result.toolsUsed).toEqual(['get_dcid', 'get_population_count']);
    expect(result.totalSteps).toBe(3);
    expect(result.success).toBe(true);
    expect(result.steps.map((step) => step.type)).toEqual([
      'action',
      'observation',
      'action',
      'observation',
      'thought',
      'answer',
    ]);

    const messages = chatMock.mock.calls[2]?.[0].messages ?? [];
    expect(messages.filter((message) => message.role === 'tool')).toEqual([
      {
        role: 'tool',
        toolCallId: 'call_1',
        content: 'DCID for California: geoId/06',
      },
      {
        role: 'tool',
        toolCallId: 'call_2',
        content: 'Population counts:\n\ngeoId/06: 39,029,342 (as of 2022)',
      },
    ]);
  });

  it('should feed tool errors back to the model as text', async () => {
    fetchMock.mockImplementation(async () => new Response('', { status: 403 }));
    chatMock
      .mockResolvedValueOnce(
        toolTurn('call_1', 'get_dcid', '{"place":"California"}'),
      )
      .mockResolvedValueOnce(answer('The statistics service refused access.'));

    const result = await createAgent().run('Population of California?');

    expect(result.success).toBe(true);
    expect(result.steps[1]?.toolResults).toEqual([
      {
        toolCallId: 'call_1',
        content:
          'Error: Data Commons authentication failed: Data Commons rejected the API key (403)',
        isError: true,
      },
    ]);
  });

  it('should report unparsable arguments without calling the tool', async () => {
    chatMock
      .mockResolvedValueOnce(toolTurn('call_1', 'get_dcid', '{"place":'))
      .mockResolvedValueOnce(answer('Sorry, something went wrong.'));

    const result = await createAgent().run('Population of California?');

    const content = result.steps[1]?.toolResults?.[0]?.content ?? '';
    expect(content.startsWith('Error: Invalid arguments for get_dcid: ')).toBe(
      true,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should report an unknown tool as an error result', async () => {
    chatMock
      .mockResolvedValueOnce(toolTurn('call_1', 'get_weather', '{}'))
      .mockResolvedValueOnce(answer('I cannot check the weather.'));

    const result = await createAgent().run('Weather in Paris?');

    const toolResult = result.steps[1]?.toolResults?.[0];
    expect(toolResult?.isError).toBe(true);
    expect(toolResult?.content.startsWith('Error: ')).toBe(true);
    expect(toolResult?.content).toContain('get_weather');
  });

  it('should stop after maxSteps', async () => {
    chatMock.mockResolvedValue(
      toolTurn('call_n', 'get_dcid', '{"place":"California"}'),
    );

    const result = await createAgent(2).run('Loop forever');

    expect(chatMock).toHaveBeenCalledTimes(2);
    expect(result).toMatchObject({
      answer: MAX_STEPS_ANSWER,
      toolsUsed: ['get_dcid'],
      totalSteps: 2,
      success: false,
    });
  });

  it('should propagate model failures', async () => {
    chatMock.mockRejectedValueOnce(new Error('model unavailable'));

    await expect(createAgent().run('hi')).rejects.toThrow('model unavailable');
  });
});

describe('parseToolCall', () => {
  it('should decode a JSON object', () => {
    expect(
      parseToolCall({
        id: 'call_1',
        name: 'get_population_count',
        arguments: '{"place_dcids":"geoId/06","date":"2020"}',
      }),
    ).toEqual({
      ok: true,
      call: {
        id: 'call_1',
        name: 'get_population_count',
        arguments: { place_dcids: 'geoId/06', date: '2020' },
      },
    });
  });

  it('should treat empty arguments as an empty object', () => {
    const parsed = parseToolCall({ id: 'c', name: 'get_dcid', arguments: ' ' });
    expect(parsed).toEqual({
      ok: true,
      call: { id: 'c', name: 'get_dcid', arguments: {} },
    });
  });

  it('should reject JSON that is not an object', () => {
    const parsed = parseToolCall({ id: 'c', name: 'get_dcid', arguments: '[1]' });
    expect(parsed).toEqual({
      ok: false,
      call: { id: 'c', name: 'get_dcid', arguments: {} },
      error: 'Invalid arguments for get_dcid: expected a JSON object',
    });
  });
});
