/**
 * Irrigation Module - Valve Actuator
 *
 * The boundary to the physical valves. Only a logging stand-in exists for
 * now: the run log is the source of truth, and whatever drives the relays
 * is expected to follow it.
 */
import { type Result, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { ActuatorError } from "./errors.js";

const log = createLogger("actuator");

export interface Actuator {
  /** Open the zone's valve for `minutes`. Resolves once the command is sent. */
  start(zoneName: string, minutes: number): Promise<Result<void, ActuatorError>>;
}

/**
 * Actuator that only records the command in the log.
 */
export function createLoggingActuator(): Actuator {
  return {
    async start(zoneName, minutes) {
      log.info({ zone: zoneName, minutes }, "Valve open requested (no hardware attached)");
      return ok(undefined);
    },
  };
}
