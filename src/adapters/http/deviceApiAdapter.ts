import { FetchLike, HttpClient, HttpTextResponse } from "./httpClient";
import { DeviceSession } from "./deviceSession";
import { Logger, silentLogger } from "../log/logStream";
import { EndpointDto, MonitorSettingsDto } from "../../domain/settings";
import { MonitorError, TechnicalError, asTechnicalError } from "../../domain/errors";
import { isRecord, parseTolerantJson } from "../../domain/json";
import { isLoginPage } from "../../domain/loginForm";
import {
  ALL_SECTIONS,
  FOCUSED_SECTIONS,
  SectionName,
  isRequiredSection
} from "../../domain/sections";
import {
  RawSlotPayload,
  SlotId,
  emptyPayload,
  payloadFromCombined,
  sectionCount,
  slotFailure
} from "../../domain/slots";

export type ProbeResult = "present" | "absent" | "unknown";

type SectionResult =
  | { ok: true; section: SectionName; document: Record<string, unknown> }
  | { ok: false; section: SectionName; failure: TechnicalError };

interface CollectedSlot {
  payload: RawSlotPayload;
  failures: TechnicalError[];
}

export interface DeviceApiOptions {
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export const DETECTED_SLOTS_PATH = "/api/data/shelf/slots/detected_coll";

function sectionPath(slotId: SlotId, section: SectionName): string {
  return `/slot/${slotId}/api/data/${section}.json`;
}

function combinedPath(slotId: SlotId): string {
  return `/slot/${slotId}/api/data.json`;
}

/** Errors that end a whole slot fetch instead of degrading one section. */
function isTerminal(error: unknown): boolean {
  return (
    error instanceof MonitorError &&
    (error.code === "client.authentication_failed" || error.code === "orchestrator.cancelled")
  );
}

export class DeviceApiAdapter {
  readonly session: DeviceSession;
  private readonly http: HttpClient;
  private readonly fullTimeoutMs: number;
  private readonly focusedTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    endpoint: EndpointDto,
    settings: Pick<MonitorSettingsDto, "requestTimeoutS" | "focusedTimeoutS">,
    options: DeviceApiOptions = {}
  ) {
    this.fullTimeoutMs = settings.requestTimeoutS * 1000;
    this.focusedTimeoutMs = settings.focusedTimeoutS * 1000;
    this.logger = options.logger ?? silentLogger;
    this.http = new HttpClient(endpoint.host, this.fullTimeoutMs, options.fetchImpl);
    this.session = new DeviceSession(this.http, endpoint, this.fullTimeoutMs, this.logger.child("session"));
  }

  get origin(): string {
    return this.http.origin;
  }

  async authenticate(signal?: AbortSignal): Promise<void> {
    await this.session.authenticate(signal);
  }

  /**
   * Fetches `sections` in parallel. Sections that fail are left out; when none
   * survives the slot fails with an error named after what went wrong.
   */
  async fetchSlotSections(
    slotId: SlotId,
    sections: ReadonlyArray<SectionName> = ALL_SECTIONS,
    timeoutMs = this.fullTimeoutMs,
    signal?: AbortSignal
  ): Promise<RawSlotPayload> {
    const collected = await this.collectSections(slotId, sections, timeoutMs, signal);
    if (sectionCount(collected.payload) === 0) {
      throw new MonitorError(slotFailure(slotId, collected.failures));
    }
    return collected.payload;
  }

  async fetchFocused(slotId: SlotId, signal?: AbortSignal): Promise<RawSlotPayload> {
    return this.fetchSlotSections(slotId, FOCUSED_SECTIONS, this.focusedTimeoutMs, signal);
  }

  async fetchFallback(slotId: SlotId, signal?: AbortSignal): Promise<RawSlotPayload> {
    return (await this.collectFallback(slotId, signal)).payload;
  }

  async fetchSlot(slotId: SlotId, signal?: AbortSignal): Promise<RawSlotPayload> {
    const sections = await this.collectSections(slotId, ALL_SECTIONS, this.fullTimeoutMs, signal);
    if (sectionCount(sections.payload) > 0) {
      return sections.payload;
    }
    const fallback = await this.collectFallback(slotId, signal);
    if (sectionCount(fallback.payload) > 0) {
      return fallback.payload;
    }
    throw new MonitorError(slotFailure(slotId, [...sections.failures, ...fallback.failures]));
  }

  async getDetectedSlots(): Promise<unknown> {
    const response = await this.getWithRelogin(DETECTED_SLOTS_PATH, this.fullTimeoutMs);
    if (response.status !== 200) {
      this.logger.warn(`Slot detection returned status ${response.status}`);
      return undefined;
    }
    const document = parseTolerantJson(response.body);
    if (document === undefined) {
      this.logger.warn("Slot detection response is not JSON");
    }
    return document;
  }

  async probeSlot(slotId: SlotId): Promise<ProbeResult> {
    try {
      const response = await this.http.requestText({
        path: sectionPath(slotId, "dev"),
        timeoutMs: this.focusedTimeoutMs
      });
      if (response.status === 404) {
        return "absent";
      }
      if (response.status === 200 && !isLoginPage(response.url, response.status, response.body)) {
        return "present";
      }
      return "unknown";
    } catch (error) {
      this.logger.debug(`Probe of slot ${slotId} failed: ${(error as Error).message}`);
      return "unknown";
    }
  }

  private async collectSections(
    slotId: SlotId,
    sections: ReadonlyArray<SectionName>,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<CollectedSlot> {
    await this.session.authenticate(signal);
    this.logger.debug(`Fetching ${sections.join(", ")} for slot ${slotId}`);

    const settled = await Promise.allSettled(
      sections.map((section) => this.fetchSection(slotId, section, timeoutMs, signal))
    );

    const collected: CollectedSlot = { payload: emptyPayload(), failures: [] };
    for (const result of settled) {
      if (result.status === "rejected") {
        throw result.reason;
      }
      if (result.value.ok) {
        collected.payload.data[result.value.section] = result.value.document;
      } else {
        collected.failures.push(result.value.failure);
      }
    }

    const count = sectionCount(collected.payload);
    if (count > 0) {
      this.logger.info(`Fetched ${count} data sections for slot ${slotId}`);
    } else {
      this.logger.warn(`No data sections could be fetched for slot ${slotId}`);
    }
    return collected;
  }

  private async collectFallback(slotId: SlotId, signal?: AbortSignal): Promise<CollectedSlot> {
    const failed = (failure: TechnicalError): CollectedSlot => {
      this.logger.error(failure.message);
      return { payload: emptyPayload(), failures: [failure] };
    };

    this.logger.info(`Trying combined data endpoint for slot ${slotId}`);
    try {
      const response = await this.getWithRelogin(combinedPath(slotId), this.fullTimeoutMs, signal);
      if (response.status !== 200) {
        return failed({
          status: response.status,
          code: "client.section_unavailable",
          message: `Combined data for slot ${slotId} returned status ${response.status}`
        });
      }
      const document = parseTolerantJson(response.body);
      if (!isRecord(document)) {
        return failed({
          code: "client.malformed_response",
          message: `Could not extract a JSON object from combined data for slot ${slotId}`
        });
      }
      const payload = payloadFromCombined(document);
      if (sectionCount(payload) === 0) {
        return failed({
          code: "client.section_unavailable",
          message: `Combined data for slot ${slotId} contains no data sections`
        });
      }
      return { payload, failures: [] };
    } catch (error) {
      if (isTerminal(error)) {
        throw error;
      }
      const failure = asTechnicalError(error);
      return failed({ ...failure, message: `Combined data request for slot ${slotId} failed: ${failure.message}` });
    }
  }

  private async fetchSection(
    slotId: SlotId,
    section: SectionName,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<SectionResult> {
    const failed = (failure: TechnicalError): SectionResult => {
      if (isRequiredSection(section)) {
        this.logger.warn(failure.message);
      } else {
        this.logger.debug(failure.message);
      }
      return { ok: false, section, failure };
    };

    try {
      const response = await this.getWithRelogin(sectionPath(slotId, section), timeoutMs, signal);
      if (response.status !== 200) {
        return failed({
          status: response.status,
          code: "client.section_unavailable",
          message: `Section ${section} of slot ${slotId} unavailable: status ${response.status}`
        });
      }
      const document = parseTolerantJson(response.body);
      if (!isRecord(document)) {
        return failed({
          code: "client.malformed_response",
          message: `Could not extract a JSON object from section ${section} of slot ${slotId}`
        });
      }
      return { ok: true, section, document };
    } catch (error) {
      if (isTerminal(error)) {
        throw error;
      }
      const failure = asTechnicalError(error);
      return failed({ ...failure, message: `Error fetching section ${section} of slot ${slotId}: ${failure.message}` });
    }
  }

  /**
   * GET with one re-login and one retry when the device answers with its
   * login page. A second login page fails the request.
   */
  private async getWithRelogin(path: string, timeoutMs: number, signal?: AbortSignal): Promise<HttpTextResponse> {
    const observed = this.session.generation;
    const first = await this.http.requestText({ path, timeoutMs, signal });
    if (!isLoginPage(first.url, first.status, first.body)) {
      return first;
    }

    this.logger.warn(`Session expired while requesting ${path}, re-authenticating`);
    try {
      await this.session.reauthenticate(observed, signal);
    } catch (error) {
      if (error instanceof MonitorError && error.code === "orchestrator.cancelled") {
        throw error;
      }
      throw new MonitorError({
        code: "client.authentication_failed",
        message: `Re-authentication failed: ${(error as Error).message}`,
        cause: error
      });
    }

    const retry = await this.http.requestText({ path, timeoutMs, signal });
    if (isLoginPage(retry.url, retry.status, retry.body)) {
      throw new MonitorError({
        code: "client.section_unavailable",
        message: `${path} still answers with the login page after re-authentication.`
      });
    }
    return retry;
  }
}
