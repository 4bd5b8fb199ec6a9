// src/dataset/metadata.ts

import { z } from "zod";

export enum DatarefValueType {
  INTEGER = "int",
  FLOAT = "float",
  DOUBLE = "double",
  INT_ARRAY = "int_array",
  FLOAT_ARRAY = "float_array",
  DATA = "data",
}

/**
 * Shape of a dataref value, resolved once from its metadata so that inbound
 * payloads are decoded by kind rather than by inspecting each value.
 */
export enum ValueKind {
  Scalar = "scalar",
  Array = "array",
  Bytes = "bytes", // base64 on the wire
}

export function valueKindOf(valueType: string): ValueKind {
  switch (valueType) {
    case DatarefValueType.INT_ARRAY:
    case DatarefValueType.FLOAT_ARRAY:
      return ValueKind.Array;
    case DatarefValueType.DATA:
      return ValueKind.Bytes;
    default:
      return ValueKind.Scalar;
  }
}

// --- REST payloads ---

export const DatarefDefinitionSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  value_type: z.string(),
  is_writable: z.boolean(),
});

export const CommandDefinitionSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().default(""),
});

export const DatarefListSchema = z.object({
  data: z.array(DatarefDefinitionSchema),
});

export const CommandListSchema = z.object({
  data: z.array(CommandDefinitionSchema),
});

export type IDatarefDefinition = z.infer<typeof DatarefDefinitionSchema>;
export type ICommandDefinition = z.infer<typeof CommandDefinitionSchema>;

// --- Cached metadata ---

export interface DatarefMeta {
  readonly kind: "dataref";
  readonly name: string;
  readonly identifier: number;
  readonly valueType: string;
  readonly valueKind: ValueKind;
  readonly isArray: boolean;
  readonly isWritable: boolean;
}

export interface CommandMeta {
  readonly kind: "command";
  readonly name: string;
  readonly identifier: number;
  readonly description: string;
}

export type ObjectMeta = DatarefMeta | CommandMeta;

export function toDatarefMeta(definition: IDatarefDefinition): DatarefMeta {
  const valueKind = valueKindOf(definition.value_type);
  return {
    kind: "dataref",
    name: definition.name,
    identifier: definition.id,
    valueType: definition.value_type,
    valueKind,
    isArray: valueKind === ValueKind.Array,
    isWritable: definition.is_writable,
  };
}

export function toCommandMeta(definition: ICommandDefinition): CommandMeta {
  return {
    kind: "command",
    name: definition.name,
    identifier: definition.id,
    description: definition.description,
  };
}

export const DatarefValueResponseSchema = z.object({
  data: z.union([z.number(), z.string(), z.array(z.number())]),
});
