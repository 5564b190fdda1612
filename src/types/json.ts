/** Closed JSON value model used for tool arguments and structured results. */
export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
    [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export function isJsonObject(value: unknown): value is JsonObject {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    return Object.values(value).every(isJsonValue);
}

export function isJsonValue(value: unknown): value is JsonValue {
    if (value === null) return true;
    switch (typeof value) {
        case 'string':
        case 'boolean':
            return true;
        case 'number':
            return Number.isFinite(value);
        case 'object':
            return Array.isArray(value) ? value.every(isJsonValue) : isJsonObject(value);
        default:
            return false;
    }
}

/** Narrow an unknown record to a JSON object, or return undefined when it is not one. */
export function toJsonObject(value: unknown): JsonObject | undefined {
    return isJsonObject(value) ? value : undefined;
}
