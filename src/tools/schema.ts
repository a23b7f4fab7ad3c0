/*
UNO MIDI MCP - An MCP Server for the Arduino UNO R4 WiFi MIDI sequencer
Copyright (C) 2025 Christian Gleissner

Licensed under the GNU General Public License v2.0 or later.
See <https://www.gnu.org/licenses/> for details.
*/

import type { JsonSchema } from "./types.js";
import {
  EmptyCollectionError,
  MissingRequiredFieldError,
  OutOfRangeError,
  TooManyItemsError,
  ToolValidationError,
} from "./errors.js";

/** A parser for untrusted tool arguments that also describes itself as JSON schema. */
export interface Schema<T> {
  readonly jsonSchema: JsonSchema;
  parse(value: unknown, path?: string): T;
}

type Parser<T> = (value: unknown, path: string) => T;

const hasOwn = Object.prototype.hasOwnProperty;

function createSchema<T>(jsonSchema: JsonSchema, parser: Parser<T>): Schema<T> {
  return {
    jsonSchema,
    parse(value: unknown, path?: string): T {
      return parser(value, path ?? "$");
    },
  };
}

function schemaHasDefault(schema: Schema<unknown>): boolean {
  return hasOwn.call(schema.jsonSchema, "default");
}

/** `$.sequence[2].note` -> `note` */
export function fieldNameFromPath(path: string): string {
  const segment = path.slice(path.lastIndexOf(".") + 1);
  return segment.length > 0 ? segment : path;
}

export interface IntegerSchemaOptions {
  readonly description?: string;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly default?: number;
  readonly examples?: readonly number[];
}

export function integerSchema(options: IntegerSchemaOptions = {}): Schema<number> {
  const jsonSchema: JsonSchema = {
    type: "integer",
    ...(options.description ? { description: options.description } : {}),
    ...(options.minimum !== undefined ? { minimum: options.minimum } : {}),
    ...(options.maximum !== undefined ? { maximum: options.maximum } : {}),
    ...(options.default !== undefined ? { default: options.default } : {}),
    ...(options.examples ? { examples: options.examples } : {}),
  };

  return createSchema<number>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      if (options.default !== undefined) {
        return options.default;
      }
      throw new MissingRequiredFieldError(fieldNameFromPath(path), { path });
    }

    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw new ToolValidationError("Expected an integer", {
        path,
        code: "invalid_type",
        details: { receivedType: typeof value },
      });
    }

    const tooLow = options.minimum !== undefined && value < options.minimum;
    const tooHigh = options.maximum !== undefined && value > options.maximum;
    if (tooLow || tooHigh) {
      throw new OutOfRangeError(
        fieldNameFromPath(path),
        value,
        { minimum: options.minimum, maximum: options.maximum },
        { path },
      );
    }

    return value;
  });
}

export function stringSchema(options: { description?: string } = {}): Schema<string> {
  const jsonSchema: JsonSchema = {
    type: "string",
    ...(options.description ? { description: options.description } : {}),
  };

  return createSchema<string>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      throw new MissingRequiredFieldError(fieldNameFromPath(path), { path });
    }
    if (typeof value !== "string") {
      throw new ToolValidationError("Expected a string", {
        path,
        code: "invalid_type",
        details: { receivedType: typeof value },
      });
    }
    return value;
  });
}

/**
 * Advertise extra JSON schema keywords (ranges, enums) without enforcing them.
 * For values whose rules are checked by the domain model after parsing.
 */
export function describedSchema<T>(schema: Schema<T>, keywords: JsonSchema): Schema<T> {
  return {
    jsonSchema: { ...schema.jsonSchema, ...keywords },
    parse: (value, path) => schema.parse(value, path),
  };
}

export function arraySchema<T>(
  itemSchema: Schema<T>,
  options: { description?: string; minItems?: number; maxItems?: number } = {},
): Schema<readonly T[]> {
  const jsonSchema: JsonSchema = {
    type: "array",
    ...(options.description ? { description: options.description } : {}),
    items: itemSchema.jsonSchema,
    ...(options.minItems !== undefined ? { minItems: options.minItems } : {}),
    ...(options.maxItems !== undefined ? { maxItems: options.maxItems } : {}),
  };

  return createSchema<readonly T[]>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      throw new MissingRequiredFieldError(fieldNameFromPath(path), { path });
    }
    if (!Array.isArray(value)) {
      throw new ToolValidationError("Expected an array", {
        path,
        code: "invalid_type",
        details: { receivedType: typeof value },
      });
    }

    const result: T[] = [];
    for (let index = 0; index < value.length; index += 1) {
      result.push(itemSchema.parse(value[index], `${path}[${index}]`));
    }

    if (options.minItems !== undefined && result.length < options.minItems) {
      throw new EmptyCollectionError(fieldNameFromPath(path), { path });
    }

    if (options.maxItems !== undefined && result.length > options.maxItems) {
      throw new TooManyItemsError(fieldNameFromPath(path), options.maxItems, result.length, { path });
    }

    return result;
  });
}

export function optionalSchema<T>(schema: Schema<T>): Schema<T | undefined> {
  const baseType = schema.jsonSchema.type;
  const optionalType = Array.isArray(baseType)
    ? baseType.includes("null")
      ? baseType
      : [...baseType, "null"]
    : typeof baseType === "string"
      ? [baseType, "null"]
      : undefined;

  const jsonSchema: JsonSchema = {
    ...schema.jsonSchema,
    ...(optionalType ? { type: optionalType } : {}),
  };

  return createSchema<T | undefined>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      return undefined;
    }
    return schema.parse(value, path);
  });
}

export interface ObjectSchemaOptions<T extends Record<string, unknown>> {
  readonly description?: string;
  readonly properties: { [K in keyof T]: Schema<T[K]> };
  readonly required?: readonly (keyof T & string)[];
  readonly additionalProperties?: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function objectSchema<T extends Record<string, unknown>>(
  options: ObjectSchemaOptions<T>,
): Schema<T> {
  const required = options.required ?? [];
  const propertyEntries = Object.entries(options.properties).map(([key, schema]) => [key, schema.jsonSchema] as const);
  const jsonSchema: JsonSchema = {
    type: "object",
    ...(options.description ? { description: options.description } : {}),
    properties: Object.fromEntries(propertyEntries),
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: options.additionalProperties ?? false,
  };

  return createSchema<T>(jsonSchema, (value, path) => {
    if (!isPlainObject(value)) {
      throw new ToolValidationError("Expected an object", {
        path,
        code: "invalid_type",
        details: { receivedType: value === null ? "null" : typeof value },
      });
    }

    for (const key of required) {
      if (!hasOwn.call(value, key) || value[key] === undefined) {
        throw new MissingRequiredFieldError(key, { path: `${path}.${key}` });
      }
    }

    const result: Record<string, unknown> = {};

    for (const [key, schema] of Object.entries(options.properties)) {
      const propertyPath = `${path}.${key}`;
      if (hasOwn.call(value, key)) {
        const parsed = schema.parse(value[key], propertyPath);
        if (parsed !== undefined) {
          result[key] = parsed;
        }
        continue;
      }

      if (schemaHasDefault(schema)) {
        const parsed = schema.parse(undefined, propertyPath);
        if (parsed !== undefined) {
          result[key] = parsed;
        }
      }
    }

    if (options.additionalProperties !== true) {
      for (const key of Object.keys(value)) {
        if (!hasOwn.call(options.properties, key)) {
          throw new ToolValidationError("Unexpected property", {
            path: `${path}.${key}`,
            code: "unexpected_property",
          });
        }
      }
    }

    return result as T;
  });
}
