/**
 * Zod schemas for classify_events tool parameters.
 */

import { z } from "zod";

export const classifyEventsSchema = {
  events: z
    .array(z.string().min(1))
    .min(1)
    .describe("Event names to classify (e.g. 'OVHD_APU_MASTER_BT_LEFT_BUTTON_DOWN')."),
};
