import { isJsonValue } from '../types/json.js';
import type { JsonSchema, JsonSchemaProperty } from '../types/json-schema.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] | undefined {
    if (!Array.isArray(value)) return undefined;
    const strings = value.filter((item): item is string => typeof item === 'string');
    return strings.length > 0 ? strings : undefined;
}

function finiteNumber(value: unknown): number | undefined {
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/** `type` may be a union array in the wild; the first non-null entry wins. */
function schemaType(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) {
        return value.find((entry): entry is string => typeof entry === 'string' && entry !== 'null');
    }
    return undefined;
}

function parseProperties(value: unknown): Record<string, JsonSchemaProperty> | undefined {
    if (!isRecord(value)) return undefined;
    const properties: Record<string, JsonSchemaProperty> = {};
    for (const [name, raw] of Object.entries(value)) {
        properties[name] = parseJsonSchemaProperty(raw);
    }
    return properties;
}

export function parseJsonSchemaProperty(raw: unknown): JsonSchemaProperty {
    if (!isRecord(raw)) return {};

    const property: JsonSchemaProperty = {};
    const type = schemaType(raw.type);
    if (type !== undefined) property.type = type;
    if (typeof raw.description === 'string') property.description = raw.description;

    const enumValues = stringList(raw.enum);
    if (enumValues) property.enum = enumValues;

    if (raw.items !== undefined) property.items = parseJsonSchemaProperty(raw.items);

    const properties = parseProperties(raw.properties);
    if (properties) property.properties = properties;

    const required = stringList(raw.required);
    if (required) property.required = required;

    const minimum = finiteNumber(raw.minimum);
    if (minimum !== undefined) property.minimum = minimum;
    const maximum = finiteNumber(raw.maximum);
    if (maximum !== undefined) property.maximum = maximum;
    const minLength = finiteNumber(raw.minLength);
    if (minLength !== undefined) property.minLength = minLength;
    const maxLength = finiteNumber(raw.maxLength);
    if (maxLength !== undefined) property.maxLength = maxLength;
    if (typeof raw.pattern === 'string') property.pattern = raw.pattern;
    if (raw.default !== undefined && isJsonValue(raw.default)) property.default = raw.default;

    return property;
}

/**
 * Narrow a tool's advertised input schema (MCP `inputSchema`, or anything
 * shaped like JSON Schema) into the structural subset providers accept.
 */
export function parseJsonSchema(raw: unknown): JsonSchema {
    if (!isRecord(raw)) return { type: 'object', properties: {} };

    const schema: JsonSchema = { type: schemaType(raw.type) ?? 'object' };
    if (typeof raw.description === 'string') schema.description = raw.description;
    schema.properties = parseProperties(raw.properties) ?? {};
    const required = stringList(raw.required);
    if (required) schema.required = required;
    return schema;
}
