import { DeviceApiAdapter } from "../adapters/http/deviceApiAdapter";
import { Logger, silentLogger } from "../adapters/log/logStream";
import { SlotId, slotIdsFromDetected } from "../domain/slots";

export type SlotDiscoverySource = Pick<DeviceApiAdapter, "authenticate" | "getDetectedSlots" | "probeSlot">;

export const FALLBACK_SLOTS: ReadonlyArray<SlotId> = [1];

/**
 * Finds the occupied slots: the aggregate `detected_coll` document first,
 * then a sequential probe of `1..maxSlots`, then slot 1.
 */
export async function discoverSlots(
  source: SlotDiscoverySource,
  maxSlots: number,
  logger: Logger = silentLogger
): Promise<SlotId[]> {
  logger.info("Detecting available slots");

  try {
    await source.authenticate();
  } catch (error) {
    logger.warn(`Authentication failed before slot detection: ${(error as Error).message}`);
  }

  try {
    const detected = slotIdsFromDetected(await source.getDetectedSlots());
    if (detected) {
      logger.info(`Detected slots: ${detected.join(", ")}`);
      return detected;
    }
    logger.info("Aggregate slot list unavailable, probing slots individually");
  } catch (error) {
    logger.warn(`Aggregate slot query failed: ${(error as Error).message}`);
  }

  const present: SlotId[] = [];
  for (let slotId = 1; slotId <= maxSlots; slotId += 1) {
    const result = await source.probeSlot(slotId);
    logger.debug(`Probe of slot ${slotId}: ${result}`);
    if (result === "present") {
      present.push(slotId);
    }
  }
  if (present.length > 0) {
    logger.info(`Detected slots by probing: ${present.join(", ")}`);
    return present;
  }

  logger.warn(`discovery.no_slots_found: no slot answered, assuming slot ${FALLBACK_SLOTS.join(", ")}`);
  return [...FALLBACK_SLOTS];
}
