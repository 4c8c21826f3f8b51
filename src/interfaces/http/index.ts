export { default as eventTypeRoutes } from './event-type-routes.js';
export type { EventTypeRoutesOptions } from './event-type-routes.js';
