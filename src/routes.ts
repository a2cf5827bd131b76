import express, { type Request, type Response } from "express";
import bodyParser from "body-parser";
import cors from "cors";
import { z } from "zod";
import {
  CameraKind,
  DecodingError,
  HTTPStatusError,
  LiveviewKind,
  NotFoundError,
  TransportError,
  ViewportKind,
  sortByName,
  toCsvTable,
  type Fetchable,
  type NamedResource,
  type ProtectAPI,
} from "./util/index.js";

/** The part of ProtectAPI the gateway calls. */
export type GatewayAPI = Pick<
  ProtectAPI,
  | "cameras"
  | "liveviews"
  | "viewports"
  | "getSnapshot"
  | "changeViewportView"
  | "lookupCameraId"
  | "lookupViewportId"
  | "lookupLiveviewName"
>;

const changeViewSchema = z.object({
  liveview: z.string().trim().min(1, "liveview is required"),
});

function sendError(res: Response, err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof NotFoundError) {
    res.status(404).json({ success: false, error: message });
  } else if (err instanceof HTTPStatusError) {
    res.status(502).json({ success: false, error: message, upstreamStatus: err.status });
  } else if (err instanceof TransportError || err instanceof DecodingError) {
    res.status(502).json({ success: false, error: message });
  } else {
    res.status(500).json({ success: false, error: message });
  }
}

function sendCollection<T extends NamedResource>(
  req: Request,
  res: Response,
  kind: Fetchable<T>,
  items: readonly T[]
) {
  const sorted = sortByName(items);
  if (req.query.format === "csv") {
    res.type("text/csv").send(toCsvTable(kind, sorted));
  } else {
    res.json(sorted);
  }
}

export function createApp(api: GatewayAPI) {
  const app = express();
  app.use(cors());
  app.use(bodyParser.json());

  // ============ COLLECTIONS ============

  app.get("/cameras", async (req, res) => {
    try {
      sendCollection(req, res, CameraKind, await api.cameras());
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/liveviews", async (req, res) => {
    try {
      sendCollection(req, res, LiveviewKind, await api.liveviews());
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/viewports", async (req, res) => {
    try {
      sendCollection(req, res, ViewportKind, await api.viewports());
    } catch (err) {
      sendError(res, err);
    }
  });

  // ============ LOOKUPS ============

  app.get("/cameras/:name/id", async (req, res) => {
    try {
      const id = await api.lookupCameraId(req.params.name);
      if (id === undefined) {
        res.status(404).json({ success: false, error: `Camera '${req.params.name}' not found` });
        return;
      }
      res.json({ id });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/viewports/:name/id", async (req, res) => {
    try {
      const id = await api.lookupViewportId(req.params.name);
      if (id === undefined) {
        res.status(404).json({ success: false, error: `Viewport '${req.params.name}' not found` });
        return;
      }
      res.json({ id });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/liveviews/:id/name", async (req, res) => {
    try {
      const name = await api.lookupLiveviewName(req.params.id);
      if (name === undefined) {
        res.status(404).json({ success: false, error: `Liveview '${req.params.id}' not found` });
        return;
      }
      res.json({ name });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ============ SNAPSHOT ============

  app.get("/cameras/:name/snapshot", async (req, res) => {
    try {
      const image = await api.getSnapshot(req.params.name, req.query.quality === "high");
      res.type("image/jpeg").send(image);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ============ VIEWPORT CONTROL ============

  app.patch("/viewports/:id", async (req, res) => {
    const parsed = changeViewSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.issues[0]?.message ?? "Invalid body" });
      return;
    }
    try {
      await api.changeViewportView(req.params.id, parsed.data.liveview);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  return app;
}

export default createApp;
