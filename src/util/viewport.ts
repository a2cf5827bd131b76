import { z } from "zod";
import { defineFetchable } from "./fetchable.js";
import { padded } from "./format.js";

/** A viewer device; the API calls these "viewers". */
export const viewportSchema = z.object({
  id: z.string(),
  name: z.string(),
  /** ID of the liveview currently on screen */
  liveview: z.string(),
  state: z.string(),
  streamLimit: z.number().int(),
});

export type Viewport = z.infer<typeof viewportSchema>;

export const ViewportKind = defineFetchable<Viewport>({
  resource: "viewports",
  urlSuffix: "viewers",
  schema: viewportSchema,
  csvHeader: "name,id,liveview,state,streamLimit",
  toCsv: (vp) => `${vp.name},${vp.id},${vp.liveview},${vp.state},${vp.streamLimit}`,
  describe: (vp) => `${padded(vp.name, 17)} <${vp.id}> (viewing '${vp.liveview}')`,
});
