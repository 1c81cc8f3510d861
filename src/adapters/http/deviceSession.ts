import { HttpClient, HttpTextResponse } from "./httpClient";
import { Logger, silentLogger } from "../log/logStream";
import { EndpointDto } from "../../domain/settings";
import { MonitorError } from "../../domain/errors";
import {
  buildLoginBody,
  hasLoginFailure,
  isLoginPage,
  parseLoginForm,
  resolveLoginAction
} from "../../domain/loginForm";

export type SessionState = "unauthenticated" | "authenticated";

export const LOGIN_ENTRY_PATH = "/slot/1/api/data.html";

/**
 * Cookie-backed login state for one device endpoint.
 *
 * Logins are serialized: `authenticate()` and `reauthenticate()` queue on a
 * single promise chain, and every successful login bumps `generation`. A
 * request that hit an expired session re-authenticates with the generation
 * it observed before sending, so concurrent requests that expire together
 * share one login. A caller's abort signal releases it from the queue
 * and cancels its own login requests.
 */
export class DeviceSession {
  private readonly http: HttpClient;
  private readonly endpoint: EndpointDto;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private currentState: SessionState = "unauthenticated";
  private loginGeneration = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(http: HttpClient, endpoint: EndpointDto, timeoutMs: number, logger: Logger = silentLogger) {
    this.http = http;
    this.endpoint = endpoint;
    this.timeoutMs = timeoutMs;
    this.logger = logger;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get generation(): number {
    return this.loginGeneration;
  }

  isAuthenticated(): boolean {
    return this.currentState === "authenticated";
  }

  async authenticate(signal?: AbortSignal): Promise<void> {
    if (this.isAuthenticated()) {
      return;
    }
    return this.exclusive(async () => {
      if (this.isAuthenticated()) {
        return;
      }
      await this.login(signal);
    }, signal);
  }

  async reauthenticate(observedGeneration: number, signal?: AbortSignal): Promise<void> {
    return this.exclusive(async () => {
      if (this.isAuthenticated() && this.loginGeneration !== observedGeneration) {
        this.logger.debug("Session already refreshed by another request");
        return;
      }
      this.currentState = "unauthenticated";
      await this.login(signal);
    }, signal);
  }

  invalidate(): void {
    this.currentState = "unauthenticated";
    this.http.cookies.clear();
  }

  private exclusive(task: () => Promise<void>, signal?: AbortSignal): Promise<void> {
    const run = this.queue.then(() => {
      if (signal?.aborted) {
        throw loginAborted();
      }
      return task();
    });
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return signal ? leaveOnAbort(run, signal) : run;
  }

  private async login(signal?: AbortSignal): Promise<void> {
    this.logger.info(`Authenticating to ${this.http.origin}`);
    const entry = await this.send({ path: LOGIN_ENTRY_PATH }, signal);
    if (entry.status !== 200) {
      throw new MonitorError({
        status: entry.status,
        code: "auth.protocol_mismatch",
        message: `Login page request returned status ${entry.status}.`
      });
    }

    if (!isLoginPage(entry.url, entry.status, entry.body)) {
      this.logger.info("Session cookies are still valid");
      this.markAuthenticated();
      return;
    }

    const form = parseLoginForm(entry.body);
    if (!form) {
      throw new MonitorError({
        code: "auth.protocol_mismatch",
        message: "Login page does not contain a form.",
        hint: "Check that the host points at the device's management interface."
      });
    }

    const action = resolveLoginAction(form, this.http.origin);
    const fieldNames = form.fields.map((field) => field.name).join(", ");
    this.logger.debug(`Submitting login form to ${action} with fields ${fieldNames}`);
    const result = await this.send({
      method: "POST",
      path: action,
      form: buildLoginBody(form, this.endpoint.username, this.endpoint.password)
    }, signal);

    if (result.status === 401 || result.status === 403 || hasLoginFailure(result.body)) {
      throw new MonitorError({
        status: result.status,
        code: "auth.invalid_credentials",
        message: `Login as ${this.endpoint.username} was rejected by the device.`,
        hint: "Check the username and password."
      });
    }
    if (result.status !== 200) {
      throw new MonitorError({
        status: result.status,
        code: "auth.protocol_mismatch",
        message: `Login request returned status ${result.status}.`
      });
    }

    this.logger.info("Authentication successful");
    this.markAuthenticated();
  }

  private markAuthenticated(): void {
    this.currentState = "authenticated";
    this.loginGeneration += 1;
  }

  private async send(
    options: {
      method?: "GET" | "POST";
      path: string;
      form?: URLSearchParams;
    },
    signal?: AbortSignal
  ): Promise<HttpTextResponse> {
    try {
      return await this.http.requestText({ ...options, timeoutMs: this.timeoutMs, signal });
    } catch (error) {
      if (error instanceof MonitorError && error.code === "orchestrator.cancelled") {
        throw error;
      }
      throw new MonitorError({
        code: "auth.transport",
        message: `Authentication request failed: ${(error as Error).message}`,
        cause: error
      });
    }
  }
}

function loginAborted(): MonitorError {
  return new MonitorError({ code: "orchestrator.cancelled", message: "Login was aborted." });
}

/** Settles with `run`, or rejects as soon as `signal` aborts. */
function leaveOnAbort(run: Promise<void>, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.reject(loginAborted());
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => reject(loginAborted());
    signal.addEventListener("abort", onAbort, { once: true });
    void run.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
  });
}
