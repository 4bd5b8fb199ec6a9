// src/dataset/capabilities.ts

import { z } from "zod";

export const CapabilitiesSchema = z.object({
  api: z
    .object({
      versions: z.array(z.string()).default([]),
    })
    .default({ versions: [] }),
  "x-plane": z
    .object({
      version: z.string().optional(),
    })
    .optional(),
});

export type ICapabilities = z.infer<typeof CapabilitiesSchema>;

/** /api/capabilities only exists from v2 on; this is what a v1-only simulator offers. */
export const V1_CAPABILITIES: ICapabilities = {
  api: { versions: ["v1"] },
  "x-plane": { version: "12.1.1" },
};
