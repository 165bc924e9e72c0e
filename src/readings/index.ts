/**
 * Readings Module - Public API
 */
export type { ReadingError } from "./errors.js";
export type { ReadingCreate, ReadingOut } from "./schema.js";

export { formatReadingError } from "./errors.js";
export { ReadingCreateSchema } from "./schema.js";
export { addReading, listReadings, toReadingOut } from "./service.js";
