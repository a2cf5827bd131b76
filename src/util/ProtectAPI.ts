/**
 * Protect API - cameras, liveviews, viewports
 * Collections are fetched once per instance and kept for its lifetime.
 */

import { CameraKind, type Camera } from "./camera.js";
import { NotFoundError } from "./errors.js";
import type { Fetchable, NamedResource } from "./fetchable.js";
import { LiveviewKind, type Liveview } from "./liveview.js";
import { createLogger, type Logger } from "./logger.js";
import { MIME_TYPES, ProtectClient, type ProtectConnection } from "./protectClient.js";
import { ViewportKind, type Viewport } from "./viewport.js";

interface CacheSlot<T> {
  value?: T[];
}

// ============ PROTECT API CLASS ============

/**
 * @example
 * const api = new ProtectAPI({ host: "192.168.1.1", apiKey: "test-key" });
 * const cams = await api.cameras();
 */
export class ProtectAPI {
  private client: ProtectClient;
  private logger: Logger;

  private cachedCameras: CacheSlot<Camera> = {};
  private cachedLiveviews: CacheSlot<Liveview> = {};
  private cachedViewports: CacheSlot<Viewport> = {};

  constructor(connection: ProtectConnection) {
    this.logger = connection.logger ?? createLogger("ProtectAPI");
    this.client = new ProtectClient({ ...connection, logger: this.logger });
  }

  get baseUrl(): string {
    return this.client.baseUrl;
  }

  // ========== Collections ==========

  async cameras(): Promise<Camera[]> {
    return this.fetchAndCache(CameraKind, this.cachedCameras);
  }

  async liveviews(): Promise<Liveview[]> {
    return this.fetchAndCache(LiveviewKind, this.cachedLiveviews);
  }

  async viewports(): Promise<Viewport[]> {
    return this.fetchAndCache(ViewportKind, this.cachedViewports);
  }

  // ========== Snapshot ==========

  /**
   * Live JPEG from the named camera; never cached. Sent with `Accept: image/jpeg`.
   * `highQuality` is accepted but the integration request does not carry it yet.
   */
  async getSnapshot(camera: string, highQuality: boolean = false): Promise<Buffer> {
    this.logger.debug(`Getting snapshot for camera '${camera}'`, { highQuality });
    const cameraId = await this.lookupCameraId(camera);
    if (cameraId === undefined) {
      throw new NotFoundError("camera", camera);
    }

    const url = this.client.buildUrl(`/cameras/${encodeURIComponent(cameraId)}/snapshot`);
    return this.client.request({ url, accepting: MIME_TYPES.jpeg });
  }

  // ========== Viewport control ==========

  /** Neither ID is checked here; the controller rejects unknown ones. */
  async changeViewportView(viewportId: string, liveviewId: string): Promise<void> {
    const body = JSON.stringify({ liveview: liveviewId });
    await this.client.request({
      path: `/viewers/${encodeURIComponent(viewportId)}`,
      method: "PATCH",
      body,
    });
  }

  // ========== Lookups ==========

  async lookupLiveviewName(id: string): Promise<string | undefined> {
    this.logger.debug(`Getting liveview name for ${id}`);
    return (await this.liveviews()).find((lv) => lv.id === id)?.name;
  }

  /** Case-insensitive; the first match in server order wins. */
  async lookupCameraId(name: string): Promise<string | undefined> {
    this.logger.debug(`Getting camera id for ${name}`);
    return findIdByName(await this.cameras(), name);
  }

  /** Case-insensitive; the first match in server order wins. */
  async lookupViewportId(name: string): Promise<string | undefined> {
    this.logger.debug(`Getting viewport id for ${name}`);
    return findIdByName(await this.viewports(), name);
  }

  // ========== Helpers ==========

  private async fetchAndCache<T extends NamedResource>(
    kind: Fetchable<T>,
    cache: CacheSlot<T>
  ): Promise<T[]> {
    if (cache.value) {
      this.logger.debug(`Returning cached result for ${kind.urlSuffix}`);
      return cache.value;
    }

    this.logger.debug(`Loading ${kind.urlSuffix} data from server`);
    const data = await this.client.request({ path: kind.urlSuffix, accepting: MIME_TYPES.json });
    const result = kind.parse(data);
    cache.value = result;
    return result;
  }
}

function findIdByName(items: readonly NamedResource[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  return items.find((item) => item.name.toLowerCase() === wanted)?.id;
}

export default ProtectAPI;
