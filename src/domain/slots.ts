import { TechnicalError } from "./errors";
import { isRecord, readPath } from "./json";
import { SectionName, isSectionName } from "./sections";

export type SlotId = number;

export interface RawSlotPayload {
  data: Partial<Record<SectionName, unknown>>;
}

export type FetchOutcome =
  | { ok: true; slotId: SlotId; payload: RawSlotPayload }
  | { ok: false; slotId: SlotId; error: TechnicalError };

export type RunStatus = "all_succeeded" | "partial_success" | "none_succeeded" | "cancelled";

export interface SlotFetchReport {
  status: RunStatus;
  outcomes: Map<SlotId, FetchOutcome>;
  startedAt: string;
  finishedAt: string;
}

export function emptyPayload(): RawSlotPayload {
  return { data: {} };
}

export function sectionCount(payload: RawSlotPayload): number {
  return Object.keys(payload.data).length;
}

export function isSlotId(value: unknown): value is SlotId {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/** Ascending, de-duplicated, positive integers only. */
export function normalizeSlotIds(values: Iterable<unknown>): SlotId[] {
  const distinct = new Set<SlotId>();
  for (const value of values) {
    const parsed = typeof value === "string" && /^\s*\d+\s*$/.test(value) ? Number(value) : value;
    if (isSlotId(parsed)) {
      distinct.add(parsed);
    }
  }
  return [...distinct].sort((left, right) => left - right);
}

const DETECTED_SLOTS_PATH = ["data", "shelf", "slots", "detected_coll"];

/** Reads the slot ids out of a `detected_coll` document; `undefined` when the shape does not match. */
export function slotIdsFromDetected(document: unknown): SlotId[] | undefined {
  const collection = readPath(document, DETECTED_SLOTS_PATH);
  if (!isRecord(collection)) {
    return undefined;
  }
  const slots = normalizeSlotIds(Object.keys(collection));
  return slots.length > 0 ? slots : undefined;
}

/**
 * Builds a payload from a combined `data.json` document. Known sections with
 * object values are taken from its `data` object, or from the document root
 * when there is none.
 */
export function payloadFromCombined(document: unknown): RawSlotPayload {
  const payload = emptyPayload();
  if (!isRecord(document)) {
    return payload;
  }
  const source = isRecord(document.data) ? document.data : document;
  for (const [key, value] of Object.entries(source)) {
    if (isSectionName(key) && isRecord(value)) {
      payload.data[key] = value;
    }
  }
  return payload;
}

type SlotFailureCode = "http.timeout" | "client.malformed_response" | "client.section_unavailable";

function slotFailureMessage(code: SlotFailureCode, slotId: SlotId): string {
  switch (code) {
    case "http.timeout":
      return `Every data request for slot ${slotId} timed out.`;
    case "client.malformed_response":
      return `Slot ${slotId} answered with data that is not a JSON object.`;
    case "client.section_unavailable":
      return `No data sections could be fetched for slot ${slotId}.`;
  }
}

/**
 * The error for a slot where no section survived. It is a timeout when every
 * request timed out and malformed data when bodies arrived but none was a
 * JSON object; anything else leaves the slot unavailable.
 */
export function slotFailure(slotId: SlotId, failures: ReadonlyArray<TechnicalError>): TechnicalError {
  const codes = failures.map((failure) => failure.code);
  const unreachable = codes.some((code) => code === "http.timeout" || code === "http.network_error");
  let code: SlotFailureCode = "client.section_unavailable";
  if (codes.length > 0 && codes.every((entry) => entry === "http.timeout")) {
    code = "http.timeout";
  } else if (!unreachable && codes.includes("client.malformed_response")) {
    code = "client.malformed_response";
  }
  return { code, message: slotFailureMessage(code, slotId) };
}

export function classifyRun(outcomes: Iterable<FetchOutcome>): RunStatus {
  let succeeded = 0;
  let failed = 0;
  for (const outcome of outcomes) {
    if (outcome.ok) {
      succeeded += 1;
    } else {
      failed += 1;
    }
  }
  if (failed === 0) {
    return "all_succeeded";
  }
  return succeeded === 0 ? "none_succeeded" : "partial_success";
}
