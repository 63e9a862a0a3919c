/**
 * JSON value types for opaque documents carried by the content model.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** A JSON-schema document produced by an external schema library. Stored, never interpreted. */
export type JsonSchemaDocument = { [key: string]: JsonValue };
