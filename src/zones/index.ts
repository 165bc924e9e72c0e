/**
 * Zones Module - Public API
 */
export type { ZoneError } from "./errors.js";
export type { ZoneCreate } from "./schema.js";

export { formatZoneError } from "./errors.js";
export { IdParamSchema, ZoneCreateSchema } from "./schema.js";
export {
  createZone,
  deleteZone,
  getZone,
  getZoneByName,
  listZones,
} from "./service.js";
