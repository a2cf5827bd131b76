import { z } from "zod";
import { defineFetchable } from "./fetchable.js";
import { padded } from "./format.js";

export const cameraSchema = z.object({
  id: z.string(),
  name: z.string(),
  /** e.g. "CONNECTED", "DISCONNECTED" */
  state: z.string(),
  isMicEnabled: z.boolean(),
  /** 0-100, passed through as the controller reports it */
  micVolume: z.number().int(),
  videoMode: z.string(),
  hdrType: z.string(),
});

export type Camera = z.infer<typeof cameraSchema>;

export const CameraKind = defineFetchable<Camera>({
  resource: "cameras",
  urlSuffix: "cameras",
  schema: cameraSchema,
  csvHeader: "name,id,state,isMicEnabled,micVolume,videoMode,hdrType",
  toCsv: (cam) =>
    `${cam.name},${cam.id},${cam.state},${cam.isMicEnabled},${cam.micVolume},${cam.videoMode},${cam.hdrType}`,
  describe: (cam) => `${padded(cam.name, 17)} <${cam.id}> [${cam.state}]`,
});
