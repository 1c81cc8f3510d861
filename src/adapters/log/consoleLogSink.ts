import { LogEntry, LogStream } from "./logStream";

export function formatConsoleLine(entry: LogEntry): string {
  return `[${entry.component}] ${entry.message}`;
}

/** Mirrors the stream to the console; debug entries only when `debugLogging` is on. */
export function attachConsoleSink(stream: LogStream, debugLogging: boolean): () => void {
  return stream.subscribe((entry) => {
    const line = formatConsoleLine(entry);
    switch (entry.level) {
      case "debug":
        if (debugLogging) {
          console.debug(line);
        }
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  });
}
