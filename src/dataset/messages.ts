// src/dataset/messages.ts

import { z } from "zod";
import { WritableValue } from "./common";

/**
 * Outbound WebSocket request types. Every request carries a req_id the
 * simulator echoes back in its `result` frame.
 */
export const wsRequestTypes = {
  datarefSubscribe: "dataref_subscribe_values",
  datarefUnsubscribe: "dataref_unsubscribe_values",
  datarefSet: "dataref_set_values",
  commandSubscribe: "command_subscribe_is_active",
  commandUnsubscribe: "command_unsubscribe_is_active",
  commandSetActive: "command_set_is_active",
} as const;

export const wsResponseTypes = {
  result: "result",
  datarefUpdate: "dataref_update_values",
  commandActive: "command_update_is_active",
} as const;

// --- Outbound ---

export interface IDatarefRef {
  id: number;
  index?: number[];
}

export interface IDatarefSetValue {
  id: number;
  value: WritableValue;
  index?: number;
}

export interface ICommandRef {
  id: number;
}

export interface ICommandSetActive {
  id: number;
  is_active: boolean;
  duration?: number;
}

export type OutboundRequest =
  | {
      type:
        | typeof wsRequestTypes.datarefSubscribe
        | typeof wsRequestTypes.datarefUnsubscribe;
      params: { datarefs: IDatarefRef[] };
    }
  | {
      type: typeof wsRequestTypes.datarefSet;
      params: { datarefs: IDatarefSetValue[] };
    }
  | {
      type:
        | typeof wsRequestTypes.commandSubscribe
        | typeof wsRequestTypes.commandUnsubscribe;
      params: { commands: ICommandRef[] };
    }
  | {
      type: typeof wsRequestTypes.commandSetActive;
      params: { commands: ICommandSetActive[] };
    };

export type OutboundFrame = OutboundRequest & { req_id: number };

// --- Inbound ---

export const ResultFrameSchema = z.object({
  type: z.literal(wsResponseTypes.result),
  req_id: z.number().int(),
  success: z.boolean(),
  error_code: z.union([z.string(), z.number()]).transform(String).optional(),
  error_message: z.string().optional(),
});

export const DatarefUpdateFrameSchema = z.object({
  type: z.literal(wsResponseTypes.datarefUpdate),
  data: z.record(
    z.string(),
    z.union([z.number(), z.string(), z.array(z.number())])
  ),
});

export const CommandActiveFrameSchema = z.object({
  type: z.literal(wsResponseTypes.commandActive),
  data: z.record(z.string(), z.boolean()),
});

export const InboundFrameSchema = z.discriminatedUnion("type", [
  ResultFrameSchema,
  DatarefUpdateFrameSchema,
  CommandActiveFrameSchema,
]);

export type ResultFrame = z.infer<typeof ResultFrameSchema>;
export type DatarefUpdateFrame = z.infer<typeof DatarefUpdateFrameSchema>;
export type CommandActiveFrame = z.infer<typeof CommandActiveFrameSchema>;
export type InboundFrame = z.infer<typeof InboundFrameSchema>;

/** Outcome of a request as reported by the simulator's `result` frame. */
export interface RequestResult {
  requestId: number;
  success: boolean;
  errorCode?: string;
  errorMessage?: string;
}
