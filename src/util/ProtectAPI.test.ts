import { describe, expect, it } from 'vitest';

import { createFakeHttp, routeBySuffix, type FakeReply } from '../test-utils/fakeHttp.js';
import {
  backYard,
  frontDoor,
  frontDoorDuplicate,
  garageView,
  kitchen,
  livingRoom,
  mainView,
} from '../test-utils/fixtures.js';
import { DecodingError, HTTPStatusError, NotFoundError, TransportError } from './errors.js';
import { createLogger } from './logger.js';
import { ProtectAPI } from './ProtectAPI.js';

const BASE = 'http://nvr.test/proxy/protect/integration/v1';
const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);

const defaultRoutes: Record<string, FakeReply> = {
  '/cameras': { body: [frontDoor, backYard, frontDoorDuplicate] },
  '/liveviews': { body: [mainView, garageView] },
  '/viewers': { body: [livingRoom, kitchen] },
  '/cameras/cam1/snapshot': { body: JPEG },
};

function setup(routes: Record<string, FakeReply> = defaultRoutes) {
  const fake = createFakeHttp(routeBySuffix(routes));
  const api = new ProtectAPI({
    host: 'nvr.test',
    apiKey: 'test-key',
    http: fake.http,
    logger: createLogger('test', { level: 'silent' }),
  });
  return { api, requests: fake.requests };
}

describe('ProtectAPI collections', () => {
  it('fetches cameras from the cameras endpoint', async () => {
    const { api, requests } = setup();

    const cameras = await api.cameras();

    expect(cameras).toEqual([frontDoor, backYard, frontDoorDuplicate]);
    expect(requests[0]?.url).toBe(`${BASE}/cameras`);
    expect(requests[0]?.headers.get('X-API-KEY')).toBe('test-key');
    expect(requests[0]?.headers.get('Accept')).toBe('application/json');
  });

  it('fetches liveviews and viewports from their endpoints', async () => {
    const { api, requests } = setup();

    expect(await api.liveviews()).toEqual([mainView, garageView]);
    expect(await api.viewports()).toEqual([livingRoom, kitchen]);
    expect(requests.map((r) => r.url)).toEqual([`${BASE}/liveviews`, `${BASE}/viewers`]);
  });

  it('returns the cached collection instance on later calls', async () => {
    const { api, requests } = setup();

    const first = await api.cameras();
    const second = await api.cameras();

    expect(second).toBe(first);
    expect(requests).toHaveLength(1);
  });

  it('keeps one cache slot per resource kind', async () => {
    const { api, requests } = setup();

    await api.cameras();
    await api.liveviews();
    await api.viewports();
    await api.cameras();
    await api.liveviews();
    await api.viewports();

    expect(requests).toHaveLength(3);
  });

  it('does not cache a status failure', async () => {
    let calls = 0;
    const fake = createFakeHttp(() => {
      calls += 1;
      return calls === 1 ? { status: 500 } : { body: [frontDoor] };
    });
    const api = new ProtectAPI({
      host: 'nvr.test',
      apiKey: 'test-key',
      http: fake.http,
      logger: createLogger('test', { level: 'silent' }),
    });

    await expect(api.cameras()).rejects.toBeInstanceOf(HTTPStatusError);
    await expect(api.cameras()).resolves.toEqual([frontDoor]);
    expect(fake.requests).toHaveLength(2);
  });

  it('does not cache a decoding failure', async () => {
    let calls = 0;
    const fake = createFakeHttp(() => {
      calls += 1;
      return calls === 1 ? { body: [{ id: 'vp1' }] } : { body: [livingRoom] };
    });
    const api = new ProtectAPI({
      host: 'nvr.test',
      apiKey: 'test-key',
      http: fake.http,
      logger: createLogger('test', { level: 'silent' }),
    });

    await expect(api.viewports()).rejects.toMatchObject({ resource: 'viewports', path: '[0].name' });
    await expect(api.viewports()).resolves.toEqual([livingRoom]);
  });

  it('propagates transport failures', async () => {
    const fake = createFakeHttp(() => {
      throw new Error('getaddrinfo ENOTFOUND nvr.test');
    });
    const api = new ProtectAPI({
      host: 'nvr.test',
      apiKey: 'test-key',
      http: fake.http,
      logger: createLogger('test', { level: 'silent' }),
    });

    await expect(api.liveviews()).rejects.toBeInstanceOf(TransportError);
  });

  it('rejects a collection with one malformed element', async () => {
    const { api } = setup({ '/cameras': { body: [frontDoor, { ...backYard, micVolume: 'loud' }] } });

    await expect(api.cameras()).rejects.toBeInstanceOf(DecodingError);
  });

  it('settles on a valid collection when two fetches race', async () => {
    let calls = 0;
    const fake = createFakeHttp(async () => {
      calls += 1;
      await new Promise((resolve) => setTimeout(resolve, 5));
      return { body: [frontDoor, backYard] };
    });
    const api = new ProtectAPI({
      host: 'nvr.test',
      apiKey: 'test-key',
      http: fake.http,
      logger: createLogger('test', { level: 'silent' }),
    });

    const [a, b] = await Promise.all([api.cameras(), api.cameras()]);
    const settled = await api.cameras();

    expect(calls).toBe(2);
    expect(a).toEqual(b);
    expect([a, b]).toContain(settled);
    expect(settled).toEqual([frontDoor, backYard]);
    expect(fake.requests).toHaveLength(2);
  });
});

describe('ProtectAPI lookups', () => {
  it('finds a camera ID whatever the case of the name', async () => {
    const { api } = setup({ '/cameras': { body: [frontDoor] } });

    expect(await api.lookupCameraId('front door')).toBe('cam1');
    expect(await api.lookupCameraId('FRONT DOOR')).toBe('cam1');
    expect(await api.lookupCameraId('Front Door')).toBe('cam1');
  });

  it('returns undefined for an unknown camera name', async () => {
    const { api } = setup();

    await expect(api.lookupCameraId('Nonexistent')).resolves.toBeUndefined();
  });

  it('picks the first camera in server order when names collide', async () => {
    const { api } = setup();

    expect(await api.lookupCameraId('front door')).toBe('cam1');
  });

  it('follows server order rather than sorted order', async () => {
    const { api } = setup({ '/cameras': { body: [frontDoorDuplicate, frontDoor] } });

    expect(await api.lookupCameraId('Front Door')).toBe('cam3');
  });

  it('finds a viewport ID whatever the case of the name', async () => {
    const { api } = setup();

    expect(await api.lookupViewportId('living room')).toBe('vp1');
    expect(await api.lookupViewportId('KITCHEN')).toBe('vp2');
    expect(await api.lookupViewportId('Garage')).toBeUndefined();
  });

  it('finds a liveview name by exact ID', async () => {
    const { api } = setup();

    expect(await api.lookupLiveviewName('lv1')).toBe('Main View');
    expect(await api.lookupLiveviewName('lv2')).toBe('Garage');
    expect(await api.lookupLiveviewName('LV1')).toBeUndefined();
    expect(await api.lookupLiveviewName('nonexistent')).toBeUndefined();
  });

  it('serves repeated lookups from the cache', async () => {
    const { api, requests } = setup();

    await api.lookupCameraId('front door');
    await api.lookupCameraId('back yard');
    await api.cameras();

    expect(requests).toHaveLength(1);
  });

  it('propagates fetch failures instead of reporting absence', async () => {
    const { api } = setup({});

    await expect(api.lookupViewportId('Kitchen')).rejects.toMatchObject({ status: 404 });
  });
});

describe('ProtectAPI snapshots', () => {
  it('resolves the camera by name and returns the JPEG bytes', async () => {
    const { api, requests } = setup();

    const image = await api.getSnapshot('front door', false);

    expect(image.equals(JPEG)).toBe(true);
    expect(requests.map((r) => r.url)).toEqual([`${BASE}/cameras`, `${BASE}/cameras/cam1/snapshot`]);
    expect(requests[1]?.headers.get('Accept')).toBe('image/jpeg');
  });

  it('sends the same request whatever the quality flag', async () => {
    const { api, requests } = setup();

    await api.getSnapshot('Front Door', true);
    await api.getSnapshot('Front Door', false);

    const snapshots = requests.filter((r) => r.url?.endsWith('/snapshot'));
    expect(snapshots).toHaveLength(2);
    expect(snapshots[0]?.url).toBe(snapshots[1]?.url);
    expect(snapshots[0]?.headers.toJSON()).toEqual(snapshots[1]?.headers.toJSON());
  });

  it('fetches a fresh snapshot on every call', async () => {
    const { api, requests } = setup();

    await api.getSnapshot('Front Door');
    await api.getSnapshot('Front Door');

    expect(requests.filter((r) => r.url === `${BASE}/cameras`)).toHaveLength(1);
    expect(requests.filter((r) => r.url === `${BASE}/cameras/cam1/snapshot`)).toHaveLength(2);
  });

  it('throws NotFoundError for an unknown camera without requesting a snapshot', async () => {
    const { api, requests } = setup();

    const attempt = api.getSnapshot('Attic', false);

    await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
    await expect(attempt).rejects.toThrow("Camera 'Attic' not found");
    expect(requests.map((r) => r.url)).toEqual([`${BASE}/cameras`]);
  });
});

describe('ProtectAPI viewport control', () => {
  it('PATCHes the viewer with the liveview body', async () => {
    const { api, requests } = setup({ '/viewers/vp1': { body: { ...livingRoom, liveview: 'lv2' } } });

    await expect(api.changeViewportView('vp1', 'lv2')).resolves.toBeUndefined();

    expect(requests).toHaveLength(1);
    const [sent] = requests;
    expect(sent?.method).toBe('patch');
    expect(sent?.url).toBe(`${BASE}/viewers/vp1`);
    expect(sent?.data).toBe('{"liveview":"lv2"}');
    expect(sent?.headers.get('Content-Type')).toBe('application/json');
  });

  it('does not check either ID before sending', async () => {
    const { api, requests } = setup({ '/viewers/vp-missing': { status: 200 } });

    await api.changeViewportView('vp-missing', 'lv-missing');

    expect(requests.map((r) => r.url)).toEqual([`${BASE}/viewers/vp-missing`]);
  });

  it('surfaces a rejected liveview as HTTPStatusError', async () => {
    const { api } = setup({ '/viewers/vp1': { status: 404 } });

    await expect(api.changeViewportView('vp1', 'nope')).rejects.toMatchObject({
      name: 'HTTPStatusError',
      status: 404,
    });
  });

  it('exposes the base URL', () => {
    const { api } = setup();

    expect(api.baseUrl).toBe(BASE);
  });
});
