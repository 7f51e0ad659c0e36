import type { Logger } from "@flakepatch/core";

export interface MemoryLogger extends Logger {
  readonly lines: { level: keyof Logger; message: string }[];
  messages(level: keyof Logger): string[];
}

export function createMemoryLogger(): MemoryLogger {
  const lines: { level: keyof Logger; message: string }[] = [];
  return {
    lines,
    messages: (level) => lines.filter((line) => line.level === level).map((line) => line.message),
    log: (message) => {
      lines.push({ level: "log", message });
    },
    info: (message) => {
      lines.push({ level: "info", message });
    },
    warn: (message) => {
      lines.push({ level: "warn", message });
    },
    error: (message) => {
      lines.push({ level: "error", message });
    },
  };
}
