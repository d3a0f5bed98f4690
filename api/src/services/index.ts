/**
 * Services barrel exports
 */
export { MapService } from "./map-service.js";
export type { MapsResult, RatiosResult, SessionInfo } from "./map-service.js";
