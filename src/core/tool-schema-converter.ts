import { randomUUID } from 'node:crypto';
import { ProviderPayloadError } from '../types/errors.js';
import { toJsonObject, type JsonObject } from '../types/json.js';
import type { JsonSchema, JsonSchemaProperty } from '../types/json-schema.js';
import type {
    AnthropicToolDeclaration,
    AnthropicToolResultBlock,
    GeminiFunctionResponsePart,
    GeminiToolDeclaration,
    OpenAIToolDeclaration,
    OpenAIToolResultMessage,
    ProviderKind,
    RawToolInvocation,
    WireSchema,
} from '../types/providers.js';
import type { ConnectorTool, ToolCall, ToolResult } from '../types/tools.js';
import { createToolCall, resultTextForLLM } from './tool-model.js';

export const MISSING_DESCRIPTION = 'No description available';

type TypeMapper = (type: string) => string;

const keepType: TypeMapper = (type) => type;
const upperType: TypeMapper = (type) => type.toUpperCase();

// ── Declarations ─────────────────────────────────────────────────────────────

function convertProperty(property: JsonSchemaProperty, mapType: TypeMapper): WireSchema {
    const wire: WireSchema = {};
    if (property.type !== undefined) wire.type = mapType(property.type);
    if (property.description !== undefined) wire.description = property.description;
    if (property.enum !== undefined) wire.enum = [...property.enum];
    if (property.items !== undefined) wire.items = convertProperty(property.items, mapType);
    if (property.properties !== undefined) wire.properties = convertProperties(property.properties, mapType);
    if (property.required !== undefined) wire.required = [...property.required];
    if (property.minimum !== undefined) wire.minimum = property.minimum;
    if (property.maximum !== undefined) wire.maximum = property.maximum;
    if (property.minLength !== undefined) wire.minLength = property.minLength;
    if (property.maxLength !== undefined) wire.maxLength = property.maxLength;
    if (property.pattern !== undefined) wire.pattern = property.pattern;
    return wire;
}

function convertProperties(
    properties: Record<string, JsonSchemaProperty>,
    mapType: TypeMapper,
): Record<string, WireSchema> {
    const converted: Record<string, WireSchema> = {};
    for (const [name, property] of Object.entries(properties)) {
        converted[name] = convertProperty(property, mapType);
    }
    return converted;
}

function convertSchema(schema: JsonSchema, mapType: TypeMapper): WireSchema {
    const wire: WireSchema = {
        type: mapType(schema.type),
        properties: convertProperties(schema.properties ?? {}, mapType),
    };
    if (schema.description !== undefined) wire.description = schema.description;
    if (schema.required !== undefined && schema.required.length > 0) wire.required = [...schema.required];
    return wire;
}

export function toOpenAITool(tool: ConnectorTool): OpenAIToolDeclaration {
    return {
        type: 'function',
        function: {
            name: tool.name,
            description: tool.description ?? MISSING_DESCRIPTION,
            parameters: convertSchema(tool.inputSchema, keepType),
        },
    };
}

export function toOpenAITools(tools: readonly ConnectorTool[]): OpenAIToolDeclaration[] {
    return tools.map(toOpenAITool);
}

export function toAnthropicTool(tool: ConnectorTool): AnthropicToolDeclaration {
    return {
        name: tool.name,
        description: tool.description ?? MISSING_DESCRIPTION,
        input_schema: convertSchema(tool.inputSchema, keepType),
    };
}

export function toAnthropicTools(tools: readonly ConnectorTool[]): AnthropicToolDeclaration[] {
    return tools.map(toAnthropicTool);
}

/** Gemini takes every declaration inside a single `function_declarations` wrapper. */
export function toGeminiTools(tools: readonly ConnectorTool[]): GeminiToolDeclaration[] {
    if (tools.length === 0) return [];
    return [
        {
            function_declarations: tools.map((tool) => ({
                name: tool.name,
                description: tool.description ?? MISSING_DESCRIPTION,
                parameters: convertSchema(tool.inputSchema, upperType),
            })),
        },
    ];
}

export type ProviderToolDeclarations = OpenAIToolDeclaration[] | AnthropicToolDeclaration[] | GeminiToolDeclaration[];

export function toProviderTools(kind: ProviderKind, tools: readonly ConnectorTool[]): ProviderToolDeclarations {
    switch (kind) {
        case 'openai':
            return toOpenAITools(tools);
        case 'anthropic':
            return toAnthropicTools(tools);
        case 'gemini':
            return toGeminiTools(tools);
    }
}

// ── Parsing ──────────────────────────────────────────────────────────────────

export function findToolByName(name: string, tools: readonly ConnectorTool[]): ConnectorTool | undefined {
    return tools.find((tool) => tool.name === name);
}

function structuredArguments(toolName: string, value: unknown): JsonObject {
    if (value === undefined || value === null) return {};
    const args = toJsonObject(value);
    if (!args) {
        throw new ProviderPayloadError(`Arguments for '${toolName}' must be a JSON object.`);
    }
    return args;
}

function decodeArgumentsJson(toolName: string, argumentsJson: string): JsonObject {
    if (argumentsJson.trim() === '') return {};

    let parsed: unknown;
    try {
        parsed = JSON.parse(argumentsJson);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ProviderPayloadError(`Arguments for '${toolName}' are not valid JSON: ${message}`, { cause: err });
    }
    return structuredArguments(toolName, parsed);
}

/** OpenAI sends arguments as a JSON-encoded string. */
export function parseOpenAIToolCall(
    id: string,
    name: string,
    argumentsJson: string,
    tools: readonly ConnectorTool[],
): ToolCall | undefined {
    const tool = findToolByName(name, tools);
    if (!tool) return undefined;
    return createToolCall(tool, decodeArgumentsJson(name, argumentsJson), id);
}

export function parseAnthropicToolUse(
    id: string,
    name: string,
    input: unknown,
    tools: readonly ConnectorTool[],
): ToolCall | undefined {
    const tool = findToolByName(name, tools);
    if (!tool) return undefined;
    return createToolCall(tool, structuredArguments(name, input), id);
}

/** Gemini does not identify calls, so one is minted here. */
export function parseGeminiFunctionCall(
    name: string,
    args: unknown,
    tools: readonly ConnectorTool[],
): ToolCall | undefined {
    const tool = findToolByName(name, tools);
    if (!tool) return undefined;
    return createToolCall(tool, structuredArguments(name, args), randomUUID());
}

export function parseToolInvocation(raw: RawToolInvocation, tools: readonly ConnectorTool[]): ToolCall | undefined {
    switch (raw.provider) {
        case 'openai':
            return parseOpenAIToolCall(raw.id, raw.name, raw.arguments, tools);
        case 'anthropic':
            return parseAnthropicToolUse(raw.id, raw.name, raw.input, tools);
        case 'gemini':
            return parseGeminiFunctionCall(raw.name, raw.args, tools);
    }
}

// ── Reading provider responses ──────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function listField(container: Record<string, unknown>, field: string, label: string): unknown[] {
    const value = container[field];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
        throw new ProviderPayloadError(`${label}: '${field}' must be an array.`);
    }
    return value;
}

/** Extract tool calls from an OpenAI chat completion `message`. */
export function readOpenAIToolCalls(message: unknown): RawToolInvocation[] {
    if (!isRecord(message)) throw new ProviderPayloadError('OpenAI message must be an object.');

    return listField(message, 'tool_calls', 'OpenAI message').map((entry, index): RawToolInvocation => {
        const id = isRecord(entry) ? entry.id : undefined;
        const fn = isRecord(entry) ? entry.function : undefined;
        const name = isRecord(fn) ? fn.name : undefined;
        if (typeof id !== 'string' || typeof name !== 'string' || !isRecord(fn)) {
            throw new ProviderPayloadError(`OpenAI tool call #${index} is missing an id or function name.`);
        }
        const args = fn.arguments;
        return {
            provider: 'openai',
            id,
            name,
            arguments: typeof args === 'string' ? args : JSON.stringify(args ?? {}),
        };
    });
}

/** Extract `tool_use` blocks from an Anthropic message `content` array. */
export function readAnthropicToolUses(content: unknown): RawToolInvocation[] {
    if (!Array.isArray(content)) throw new ProviderPayloadError('Anthropic content must be an array.');

    const invocations: RawToolInvocation[] = [];
    content.forEach((block: unknown, index) => {
        if (!isRecord(block) || block.type !== 'tool_use') return;
        const { id, name } = block;
        if (typeof id !== 'string' || typeof name !== 'string') {
            throw new ProviderPayloadError(`Anthropic tool_use block #${index} is missing an id or name.`);
        }
        invocations.push({ provider: 'anthropic', id, name, input: block.input });
    });
    return invocations;
}

/** Extract `functionCall` parts from a Gemini candidate's `parts` array. */
export function readGeminiFunctionCalls(parts: unknown): RawToolInvocation[] {
    if (!Array.isArray(parts)) throw new ProviderPayloadError('Gemini parts must be an array.');

    const invocations: RawToolInvocation[] = [];
    parts.forEach((part: unknown, index) => {
        if (!isRecord(part) || part.functionCall === undefined) return;
        const call = part.functionCall;
        const name = isRecord(call) ? call.name : undefined;
        if (!isRecord(call) || typeof name !== 'string') {
            throw new ProviderPayloadError(`Gemini functionCall part #${index} is missing a name.`);
        }
        invocations.push({ provider: 'gemini', name, args: call.args });
    });
    return invocations;
}

// ── Results ──────────────────────────────────────────────────────────────────

export function formatOpenAIToolResult(result: ToolResult): OpenAIToolResultMessage {
    return { role: 'tool', tool_call_id: result.callId, content: resultTextForLLM(result) };
}

export function formatAnthropicToolResult(result: ToolResult): AnthropicToolResultBlock {
    return {
        type: 'tool_result',
        tool_use_id: result.callId,
        content: resultTextForLLM(result),
        is_error: result.outcome.kind === 'error',
    };
}

export function formatGeminiToolResult(result: ToolResult): GeminiFunctionResponsePart {
    return {
        functionResponse: {
            name: result.toolName,
            response: result.outcome.kind === 'success'
                ? { content: resultTextForLLM(result) }
                : { error: resultTextForLLM(result) },
        },
    };
}
