/**
 * Zones Module - Service Layer
 *
 * Parse at the boundary, then read or write through the store.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { Store, Zone } from "../store/index.js";
import {
  type ZoneError,
  storeFailed,
  validationError,
  zoneNameTaken,
  zoneNotFound,
} from "./errors.js";
import { IdParamSchema, ZoneCreateSchema } from "./schema.js";

const log = createLogger("zones");

/**
 * Create a zone. Names are unique.
 */
export function createZone(
  store: Store,
  rawInput: unknown,
  requestId: string,
): Result<Zone, ZoneError> {
  const parsed = ZoneCreateSchema.safeParse(rawInput);
  if (!parsed.success) {
    log.warn(
      { operation: "createZone", requestId, issues: parsed.error.issues },
      "  ↳ Validation failed",
    );
    return err(validationError(parsed.error.issues));
  }

  const { name, description } = parsed.data;

  const existing = store.findZoneByName(name);
  if (existing.isErr()) {
    return err(storeFailed(existing.error));
  }
  if (existing.value) {
    return err(zoneNameTaken(name));
  }

  const inserted = store.insertZone({ name, description });
  if (inserted.isErr()) {
    // A concurrent insert can still win the unique index
    return err(
      inserted.error.type === "CONSTRAINT_VIOLATION"
        ? zoneNameTaken(name)
        : storeFailed(inserted.error),
    );
  }

  log.info({ requestId, zoneId: inserted.value.id, name }, "Zone created");
  return ok(inserted.value);
}

export function listZones(store: Store): Result<Zone[], ZoneError> {
  return store.listZones().mapErr(storeFailed);
}

export function getZone(store: Store, rawId: unknown): Result<Zone, ZoneError> {
  const id = IdParamSchema.safeParse(rawId);
  if (!id.success) {
    return err(validationError(id.error.issues));
  }

  const zoneId = id.data;
  return store
    .getZone(zoneId)
    .mapErr(storeFailed)
    .andThen((zone) => (zone ? ok(zone) : err(zoneNotFound(zoneId))));
}

/**
 * Look a zone up by name, e.g. for a manual run.
 */
export function getZoneByName(
  store: Store,
  name: string,
): Result<Zone, ZoneError> {
  return store
    .findZoneByName(name)
    .mapErr(storeFailed)
    .andThen((zone) => (zone ? ok(zone) : err(zoneNotFound(name))));
}

/**
 * Delete a zone and, through the foreign key, all of its schedules.
 * Readings and runs keep the zone name and stay.
 */
export function deleteZone(
  store: Store,
  rawId: unknown,
  requestId: string,
): Result<number, ZoneError> {
  const id = IdParamSchema.safeParse(rawId);
  if (!id.success) {
    return err(validationError(id.error.issues));
  }

  const deleted = store.deleteZone(id.data);
  if (deleted.isErr()) {
    return err(storeFailed(deleted.error));
  }
  if (!deleted.value) {
    return err(zoneNotFound(id.data));
  }

  log.info({ requestId, zoneId: id.data }, "Zone deleted");
  return ok(id.data);
}
