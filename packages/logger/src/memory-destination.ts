export type LogRecord = Record<string, unknown> & { level: number; msg?: string };

export interface MemoryDestination {
  write(line: string): void;
  readonly records: LogRecord[];
}

function isLogRecord(value: unknown): value is LogRecord {
  return typeof value === "object" && value !== null && "level" in value && typeof value.level === "number";
}

/** Collects parsed log lines in memory; used to assert on log output. */
export function createMemoryDestination(): MemoryDestination {
  const records: LogRecord[] = [];
  return {
    records,
    write(line: string) {
      const parsed: unknown = JSON.parse(line);
      if (isLogRecord(parsed)) records.push(parsed);
    },
  };
}
