import { z } from "zod";
import { defineFetchable } from "./fetchable.js";
import { padded } from "./format.js";

// ============ TYPES ============

/** One layout cell; `cameras` are camera IDs, not checked against the camera list. */
export const slotSchema = z.object({
  cameras: z.array(z.string()),
  cycleMode: z.string(),
  /** seconds */
  cycleInterval: z.number().int(),
});

export const liveviewSchema = z.object({
  id: z.string(),
  name: z.string(),
  isDefault: z.boolean(),
  isGlobal: z.boolean(),
  owner: z.string(),
  layout: z.number().int(),
  slots: z.array(slotSchema),
});

export type Slot = z.infer<typeof slotSchema>;
export type Liveview = z.infer<typeof liveviewSchema>;

// ============ KIND ============

export const LiveviewKind = defineFetchable<Liveview>({
  resource: "liveviews",
  urlSuffix: "liveviews",
  schema: liveviewSchema,
  // slots are not part of the CSV projection
  csvHeader: "name,id,isDefault,isGlobal,owner,layout",
  toCsv: (lv) => `${lv.name},${lv.id},${lv.isDefault},${lv.isGlobal},${lv.owner},${lv.layout}`,
  describe: (lv) => `${padded(lv.name, 17)} <${lv.id}> ${lv.isDefault ? "(default)" : ""}`,
});
