// ============ API CLASSES ============
export { ProtectAPI } from './ProtectAPI.js';
export { ProtectClient, MIME_TYPES } from './protectClient.js';
export type { ProtectConnection, RequestOptions } from './protectClient.js';

// ============ RESOURCE KINDS ============
export { CameraKind, cameraSchema } from './camera.js';
export { LiveviewKind, liveviewSchema, slotSchema } from './liveview.js';
export { ViewportKind, viewportSchema } from './viewport.js';
export type { Camera } from './camera.js';
export type { Liveview, Slot } from './liveview.js';
export type { Viewport } from './viewport.js';

// ============ CAPABILITY ============
export {
  compareByName,
  equalsByName,
  sortByName,
  describeResource,
  decodeCollection,
  defineFetchable,
} from './fetchable.js';
export type { Fetchable, FetchableDefinition, NamedResource, CsvConvertible } from './fetchable.js';
export { padded, toCsvTable } from './format.js';

// ============ ERRORS & LOGGING ============
export {
  ProtectError,
  TransportError,
  HTTPStatusError,
  DecodingError,
  NotFoundError,
} from './errors.js';
export { createLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './logger.js';

// ============ DEFAULT EXPORT ============
export { ProtectAPI as default } from './ProtectAPI.js';
