import type { JsonObject } from './json.js';
import type { ToolExecutionRound } from './tools.js';

export type ProviderKind = 'openai' | 'anthropic' | 'gemini';

// ── Canonical conversation ──────────────────────────────────────────────────

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    role: ChatRole;
    content: string;
    /** Tool rounds that preceded this assistant message's final text. */
    toolRounds?: readonly ToolExecutionRound[];
}

// ── Shared wire schema ──────────────────────────────────────────────────────

/** JSON Schema as sent to a provider (Gemini upper-cases `type`). */
export interface WireSchema {
    type?: string;
    description?: string;
    enum?: string[];
    items?: WireSchema;
    properties?: Record<string, WireSchema>;
    required?: string[];
    minimum?: number;
    maximum?: number;
    minLength?: number;
    maxLength?: number;
    pattern?: string;
}

// ── OpenAI ───────────────────────────────────────────────────────────────────

export interface OpenAIToolDeclaration {
    type: 'function';
    function: {
        name: string;
        description: string;
        parameters: WireSchema;
    };
}

export interface OpenAIToolCallPayload {
    id: string;
    type: 'function';
    function: { name: string; arguments: string };
}

export type OpenAIMessage =
    | { role: 'system' | 'user'; content: string }
    | { role: 'assistant'; content: string | null; tool_calls?: OpenAIToolCallPayload[] }
    | OpenAIToolResultMessage;

export interface OpenAIToolResultMessage {
    role: 'tool';
    tool_call_id: string;
    content: string;
}

// ── Anthropic ────────────────────────────────────────────────────────────────

export interface AnthropicToolDeclaration {
    name: string;
    description: string;
    input_schema: WireSchema;
}

export interface AnthropicTextBlock {
    type: 'text';
    text: string;
}

export interface AnthropicToolUseBlock {
    type: 'tool_use';
    id: string;
    name: string;
    input: JsonObject;
}

export interface AnthropicToolResultBlock {
    type: 'tool_result';
    tool_use_id: string;
    content: string;
    is_error: boolean;
}

export type AnthropicContentBlock = AnthropicTextBlock | AnthropicToolUseBlock | AnthropicToolResultBlock;

export interface AnthropicMessage {
    role: 'user' | 'assistant';
    content: AnthropicContentBlock[];
}

// ── Gemini ───────────────────────────────────────────────────────────────────

export interface GeminiFunctionDeclaration {
    name: string;
    description: string;
    parameters: WireSchema;
}

export interface GeminiToolDeclaration {
    function_declarations: GeminiFunctionDeclaration[];
}

export interface GeminiFunctionResponsePart {
    functionResponse: {
        name: string;
        response: { content: string } | { error: string };
    };
}

export type GeminiPart =
    | { text: string }
    | { functionCall: { name: string; args: JsonObject } }
    | GeminiFunctionResponsePart;

export interface GeminiContent {
    role: 'user' | 'model';
    parts: GeminiPart[];
}

// ── Requests & generations ──────────────────────────────────────────────────

export interface OpenAIRequest {
    provider: 'openai';
    messages: OpenAIMessage[];
    tools?: OpenAIToolDeclaration[];
}

export interface AnthropicRequest {
    provider: 'anthropic';
    system?: string;
    messages: AnthropicMessage[];
    tools?: AnthropicToolDeclaration[];
}

export interface GeminiRequest {
    provider: 'gemini';
    systemInstruction?: GeminiContent;
    contents: GeminiContent[];
    tools?: GeminiToolDeclaration[];
}

export type ProviderRequest = OpenAIRequest | AnthropicRequest | GeminiRequest;

/** A tool invocation exactly as a provider emitted it, before resolution. */
export type RawToolInvocation =
    | { provider: 'openai'; id: string; name: string; arguments: string }
    | { provider: 'anthropic'; id: string; name: string; input: unknown }
    | { provider: 'gemini'; name: string; args: unknown };

export interface ProviderGeneration {
    /** Assistant text, possibly empty when only tools were requested. */
    content: string | null;
    toolInvocations: RawToolInvocation[];
}

/**
 * Boundary to a model provider's HTTP client. Implementations translate the
 * request into their API call and report text plus raw tool invocations.
 */
export interface ToolCallingProvider {
    readonly kind: ProviderKind;
    readonly name: string;
    generate(request: ProviderRequest, signal: AbortSignal): Promise<ProviderGeneration>;
}
