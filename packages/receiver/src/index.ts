export { ReceiverServer } from './ReceiverServer.js';
export { SampleStore } from './SampleStore.js';
export { registerSystemRoutes, toSystemInfoView } from './routes/system.js';

export type { ReceiverServerOptions } from './ReceiverServer.js';
export type { StoredSample } from './SampleStore.js';
export type { SystemInfoView } from './routes/system.js';
