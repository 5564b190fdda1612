import { describe, it, expect } from 'vitest';
import { buildProviderRequest, withoutEmptyAssistantMessages } from '../../src/core/provider-request.js';
import { createConnectorTool, createToolCall, createToolRound, failureResult, successResult, textContent, toolError } from '../../src/core/tool-model.js';
import { toAnthropicTools, toGeminiTools, toOpenAITools } from '../../src/core/tool-schema-converter.js';
import type { ChatMessage } from '../../src/types/providers.js';

const forecast = createConnectorTool({
  originalName: 'forecast',
  description: 'Daily forecast',
  connectorId: 'wx',
  connectorName: 'Weather',
});

const call = createToolCall(forecast, { city: 'Oslo' }, 'c1');
const round = createToolRound([call], [successResult(call, textContent('Sunny, 21C'), 12)], 'Checking.');

const conversation: ChatMessage[] = [
  { role: 'system', content: 'Be brief' },
  { role: 'user', content: 'Weather in Oslo?' },
  { role: 'assistant', content: 'It is sunny.', toolRounds: [round] },
];

describe('buildProviderRequest', () => {
  it('builds an OpenAI request with tool_calls followed by tool messages', () => {
    expect(buildProviderRequest('openai', conversation, [forecast])).toEqual({
      provider: 'openai',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Weather in Oslo?' },
        {
          role: 'assistant',
          content: 'Checking.',
          tool_calls: [
            { id: 'c1', type: 'function', function: { name: 'weather_forecast', arguments: '{"city":"Oslo"}' } },
          ],
        },
        { role: 'tool', tool_call_id: 'c1', content: 'Sunny, 21C' },
        { role: 'assistant', content: 'It is sunny.' },
      ],
      tools: toOpenAITools([forecast]),
    });
  });

  it('sends null OpenAI content for a round without assistant text', () => {
    const silent = createToolRound([call], [failureResult(call, toolError('offline'), 3)]);
    const request = buildProviderRequest('openai', [
      { role: 'user', content: 'Weather?' },
      { role: 'assistant', content: '', toolRounds: [silent] },
    ]);

    expect(request).toEqual({
      provider: 'openai',
      messages: [
        { role: 'user', content: 'Weather?' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [
            { id: 'c1', type: 'function', function: { name: 'weather_forecast', arguments: '{"city":"Oslo"}' } },
          ],
        },
        { role: 'tool', tool_call_id: 'c1', content: 'offline' },
      ],
    });
  });

  it('builds an Anthropic request with a system prompt and block content', () => {
    expect(buildProviderRequest('anthropic', conversation, [forecast])).toEqual({
      provider: 'anthropic',
      system: 'Be brief',
      messages: [
        { role: 'user', content: [{ type: 'text', text: 'Weather in Oslo?' }] },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Checking.' },
            { type: 'tool_use', id: 'c1', name: 'weather_forecast', input: { city: 'Oslo' } },
          ],
        },
        {
          role: 'user',
          content: [{ type: 'tool_result', tool_use_id: 'c1', content: 'Sunny, 21C', is_error: false }],
        },
        { role: 'assistant', content: [{ type: 'text', text: 'It is sunny.' }] },
      ],
      tools: toAnthropicTools([forecast]),
    });
  });

  it('merges adjacent Anthropic user turns, including later system messages', () => {
    const request = buildProviderRequest('anthropic', [
      { role: 'system', content: 'Rule one' },
      { role: 'system', content: 'Rule two' },
      { role: 'user', content: 'Hi' },
      { role: 'system', content: 'Mid-conversation note' },
    ]);

    expect(request).toEqual({
      provider: 'anthropic',
      system: 'Rule one\n\nRule two',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'Hi' },
            { type: 'text', text: 'Mid-conversation note' },
          ],
        },
      ],
    });
  });

  it('builds a Gemini request with functionCall and functionResponse parts', () => {
    expect(buildProviderRequest('gemini', conversation, [forecast])).toEqual({
      provider: 'gemini',
      systemInstruction: { role: 'user', parts: [{ text: 'Be brief' }] },
      contents: [
        { role: 'user', parts: [{ text: 'Weather in Oslo?' }] },
        {
          role: 'model',
          parts: [{ text: 'Checking.' }, { functionCall: { name: 'weather_forecast', args: { city: 'Oslo' } } }],
        },
        {
          role: 'user',
          parts: [{ functionResponse: { name: 'weather_forecast', response: { content: 'Sunny, 21C' } } }],
        },
        { role: 'model', parts: [{ text: 'It is sunny.' }] },
      ],
      tools: toGeminiTools([forecast]),
    });
  });

  it('withholds tools when the list is empty', () => {
    const request = buildProviderRequest('gemini', [{ role: 'user', content: 'Hi' }], []);
    expect('tools' in request).toBe(false);
  });
});

describe('withoutEmptyAssistantMessages', () => {
  it('drops assistant messages with no text and no rounds', () => {
    const messages: ChatMessage[] = [
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: '' },
      { role: 'assistant', content: '', toolRounds: [round] },
      { role: 'assistant', content: 'Hello' },
    ];
    expect(withoutEmptyAssistantMessages(messages)).toEqual([messages[0], messages[2], messages[3]]);
  });
});
