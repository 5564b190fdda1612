import type {
    AnthropicContentBlock,
    AnthropicMessage,
    AnthropicRequest,
    ChatMessage,
    GeminiContent,
    GeminiPart,
    GeminiRequest,
    OpenAIMessage,
    OpenAIRequest,
    ProviderKind,
    ProviderRequest,
} from '../types/providers.js';
import type { ConnectorTool, ToolExecutionRound } from '../types/tools.js';
import {
    formatAnthropicToolResult,
    formatGeminiToolResult,
    formatOpenAIToolResult,
    toAnthropicTools,
    toGeminiTools,
    toOpenAITools,
} from './tool-schema-converter.js';

/**
 * Assistant messages with no text and no tool rounds. Some providers reject
 * an empty assistant turn, so these are dropped before fallback prompts.
 */
export function withoutEmptyAssistantMessages(messages: readonly ChatMessage[]): ChatMessage[] {
    return messages.filter(
        (message) => !(message.role === 'assistant' && message.content === '' && (message.toolRounds?.length ?? 0) === 0),
    );
}

/** Split leading system messages from the rest of the conversation. */
function splitLeadingSystem(messages: readonly ChatMessage[]): { system: string[]; rest: ChatMessage[] } {
    const firstOther = messages.findIndex((message) => message.role !== 'system');
    const boundary = firstOther === -1 ? messages.length : firstOther;
    return {
        system: messages.slice(0, boundary).map((message) => message.content).filter((text) => text.length > 0),
        rest: messages.slice(boundary),
    };
}

function playedRounds(message: ChatMessage): ToolExecutionRound[] {
    return (message.toolRounds ?? []).filter((round) => round.toolCalls.length > 0);
}

// ── OpenAI ───────────────────────────────────────────────────────────────────

function openAIMessages(messages: readonly ChatMessage[]): OpenAIMessage[] {
    const wire: OpenAIMessage[] = [];

    for (const message of messages) {
        if (message.role !== 'assistant') {
            wire.push({ role: message.role, content: message.content });
            continue;
        }

        for (const round of playedRounds(message)) {
            wire.push({
                role: 'assistant',
                content: round.assistantResponse ?? null,
                tool_calls: round.toolCalls.map((call) => ({
                    id: call.id,
                    type: 'function' as const,
                    function: { name: call.toolName, arguments: JSON.stringify(call.arguments) },
                })),
            });
            wire.push(...round.results.map(formatOpenAIToolResult));
        }

        if (message.content !== '') {
            wire.push({ role: 'assistant', content: message.content });
        }
    }

    return wire;
}

// ── Anthropic ────────────────────────────────────────────────────────────────

function pushAnthropic(wire: AnthropicMessage[], role: AnthropicMessage['role'], blocks: AnthropicContentBlock[]): void {
    if (blocks.length === 0) return;
    const last = wire.at(-1);
    if (last && last.role === role) {
        last.content.push(...blocks);
        return;
    }
    wire.push({ role, content: blocks });
}

function anthropicText(text: string): AnthropicContentBlock[] {
    return text.length > 0 ? [{ type: 'text', text }] : [];
}

function anthropicMessages(messages: readonly ChatMessage[]): AnthropicMessage[] {
    const wire: AnthropicMessage[] = [];

    for (const message of messages) {
        if (message.role !== 'assistant') {
            // System messages after the conversation starts ride along as user text.
            pushAnthropic(wire, 'user', anthropicText(message.content));
            continue;
        }

        for (const round of playedRounds(message)) {
            pushAnthropic(wire, 'assistant', [
                ...anthropicText(round.assistantResponse ?? ''),
                ...round.toolCalls.map((call): AnthropicContentBlock => ({
                    type: 'tool_use',
                    id: call.id,
                    name: call.toolName,
                    input: call.arguments,
                })),
            ]);
            pushAnthropic(wire, 'user', round.results.map(formatAnthropicToolResult));
        }

        pushAnthropic(wire, 'assistant', anthropicText(message.content));
    }

    return wire;
}

// ── Gemini ───────────────────────────────────────────────────────────────────

function pushGemini(wire: GeminiContent[], role: GeminiContent['role'], parts: GeminiPart[]): void {
    if (parts.length === 0) return;
    const last = wire.at(-1);
    if (last && last.role === role) {
        last.parts.push(...parts);
        return;
    }
    wire.push({ role, parts });
}

function geminiText(text: string): GeminiPart[] {
    return text.length > 0 ? [{ text }] : [];
}

function geminiContents(messages: readonly ChatMessage[]): GeminiContent[] {
    const wire: GeminiContent[] = [];

    for (const message of messages) {
        if (message.role !== 'assistant') {
            pushGemini(wire, 'user', geminiText(message.content));
            continue;
        }

        for (const round of playedRounds(message)) {
            pushGemini(wire, 'model', [
                ...geminiText(round.assistantResponse ?? ''),
                ...round.toolCalls.map((call): GeminiPart => ({
                    functionCall: { name: call.toolName, args: call.arguments },
                })),
            ]);
            pushGemini(wire, 'user', round.results.map(formatGeminiToolResult));
        }

        pushGemini(wire, 'model', geminiText(message.content));
    }

    return wire;
}

// ── Entry point ──────────────────────────────────────────────────────────────

/**
 * Convert the canonical conversation (with attached tool rounds) into one
 * provider's request shape. Tools are withheld when `tools` is absent or empty.
 */
export function buildProviderRequest(
    kind: ProviderKind,
    messages: readonly ChatMessage[],
    tools?: readonly ConnectorTool[],
): ProviderRequest {
    const advertised = tools && tools.length > 0 ? tools : undefined;

    switch (kind) {
        case 'openai': {
            const request: OpenAIRequest = { provider: 'openai', messages: openAIMessages(messages) };
            if (advertised) request.tools = toOpenAITools(advertised);
            return request;
        }
        case 'anthropic': {
            const { system, rest } = splitLeadingSystem(messages);
            const request: AnthropicRequest = { provider: 'anthropic', messages: anthropicMessages(rest) };
            if (system.length > 0) request.system = system.join('\n\n');
            if (advertised) request.tools = toAnthropicTools(advertised);
            return request;
        }
        case 'gemini': {
            const { system, rest } = splitLeadingSystem(messages);
            const request: GeminiRequest = { provider: 'gemini', contents: geminiContents(rest) };
            if (system.length > 0) {
                request.systemInstruction = { role: 'user', parts: [{ text: system.join('\n\n') }] };
            }
            if (advertised) request.tools = toGeminiTools(advertised);
            return request;
        }
    }
}
