export { type RouteContext, type ErrorBody, BaseRouteHandler } from './RouteContext.js';
export { HealthRoutes, SERVICE_NAME } from './HealthRoutes.js';
export { SearchRoutes } from './SearchRoutes.js';
