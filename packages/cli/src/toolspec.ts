/**
 * OpenAI function-calling schema generated from the operation registry.
 */

import type { Operation, ParamSpec } from "./operations/define.js";

export interface JsonSchemaProperty {
  readonly type: "string" | "integer" | "boolean";
  readonly description: string;
  readonly default?: string | boolean;
}

export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly parameters: {
    readonly type: "object";
    readonly properties: Record<string, JsonSchemaProperty>;
    readonly required?: readonly string[];
  };
}

/** listingId → listing_id */
export function toSnakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

function property(param: ParamSpec): JsonSchemaProperty {
  return param.defaultValue === undefined
    ? { type: param.type, description: param.description }
    : { type: param.type, description: param.description, default: param.defaultValue };
}

export function generateOpenAiSpec(operations: readonly Operation[]): ToolSpec[] {
  return operations.map((op) => {
    const properties: Record<string, JsonSchemaProperty> = {};
    const required: string[] = [];
    for (const param of op.params) {
      const key = toSnakeCase(param.name);
      properties[key] = property(param);
      if (param.required === true) {
        required.push(key);
      }
    }
    return {
      name: op.name,
      description: op.description,
      parameters:
        required.length > 0
          ? { type: "object", properties, required }
          : { type: "object", properties },
    };
  });
}
