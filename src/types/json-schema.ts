import type { JsonValue } from './json.js';

/** Property-level JSON Schema subset describing one tool parameter. */
export interface JsonSchemaProperty {
    type?: string;
    description?: string;
    enum?: string[];
    /** Element schema for `array` properties. */
    items?: JsonSchemaProperty;
    /** Nested fields for `object` properties. */
    properties?: Record<string, JsonSchemaProperty>;
    required?: string[];
    minimum?: number;
    maximum?: number;
    minLength?: number;
    maxLength?: number;
    pattern?: string;
    default?: JsonValue;
}

/** Top-level parameter schema of a tool. Always an object schema in practice. */
export interface JsonSchema {
    type: string;
    description?: string;
    properties?: Record<string, JsonSchemaProperty>;
    required?: string[];
}
