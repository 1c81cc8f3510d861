import { MonitorSettingsDto } from "../../domain/settings";
import { attachConsoleSink } from "./consoleLogSink";
import { attachFileSink } from "./fileLogSink";
import { LogStream } from "./logStream";

export interface LoggingHandle {
  stream: LogStream;
  dispose: () => Promise<void>;
}

/** A log stream wired to the console and, when `logFile` is set, to that file. */
export function createLogging(
  settings: Pick<MonitorSettingsDto, "debugLogging" | "logFile">,
  stream = new LogStream()
): LoggingHandle {
  const detachConsole = attachConsoleSink(stream, settings.debugLogging);
  const closeFile = settings.logFile ? attachFileSink(stream, settings.logFile) : undefined;

  return {
    stream,
    dispose: async () => {
      detachConsole();
      if (closeFile) {
        await closeFile();
      }
    }
  };
}
