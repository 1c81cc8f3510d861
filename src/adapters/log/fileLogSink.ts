import { createWriteStream } from "fs";
import { LogEntry, LogStream } from "./logStream";

export function formatFileLine(entry: LogEntry): string {
  return `${entry.timestamp} - ${entry.level.toUpperCase()} - ${entry.component} - ${entry.message}\n`;
}

/**
 * Appends every entry to `path`. The returned function unsubscribes and
 * resolves once the file is flushed and closed.
 */
export function attachFileSink(stream: LogStream, path: string): () => Promise<void> {
  const file = createWriteStream(path, { flags: "a", encoding: "utf8" });
  file.on("error", (error) => {
    console.error(`[FileLogSink] cannot write ${path}: ${error.message}`);
  });
  const unsubscribe = stream.subscribe((entry) => {
    file.write(formatFileLine(entry));
  });

  return () =>
    new Promise<void>((resolve) => {
      unsubscribe();
      if (file.closed) {
        resolve();
        return;
      }
      file.once("close", () => resolve());
      file.end();
    });
}
