import type { Camera, Liveview, Viewport } from '../util/index.js';

export const frontDoor: Camera = {
  id: 'cam1',
  name: 'Front Door',
  state: 'CONNECTED',
  isMicEnabled: true,
  micVolume: 75,
  videoMode: 'default',
  hdrType: 'auto',
};

export const backYard: Camera = {
  id: 'cam2',
  name: 'Back Yard',
  state: 'DISCONNECTED',
  isMicEnabled: false,
  micVolume: 0,
  videoMode: 'highFps',
  hdrType: 'off',
};

/** Same name as frontDoor in a different case, listed after it. */
export const frontDoorDuplicate: Camera = {
  ...frontDoor,
  id: 'cam3',
  name: 'FRONT DOOR',
};

export const mainView: Liveview = {
  id: 'lv1',
  name: 'Main View',
  isDefault: true,
  isGlobal: false,
  owner: 'owner-1',
  layout: 4,
  slots: [
    { cameras: ['cam1', 'cam2'], cycleMode: 'time', cycleInterval: 30 },
    { cameras: [], cycleMode: 'motion', cycleInterval: 10 },
  ],
};

export const garageView: Liveview = {
  id: 'lv2',
  name: 'Garage',
  isDefault: false,
  isGlobal: true,
  owner: 'owner-2',
  layout: 1,
  slots: [{ cameras: ['cam9'], cycleMode: 'time', cycleInterval: 5 }],
};

export const livingRoom: Viewport = {
  id: 'vp1',
  name: 'Living Room',
  liveview: 'lv1',
  state: 'CONNECTED',
  streamLimit: 4,
};

export const kitchen: Viewport = {
  id: 'vp2',
  name: 'Kitchen',
  liveview: 'lv2',
  state: 'DISCONNECTED',
  streamLimit: 8,
};
