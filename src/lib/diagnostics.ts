import { format } from "date-fns";

export type DiagnosticLevel = "info" | "success" | "warning" | "error";

export type DiagnosticEntry = {
  timestamp: string;
  level: DiagnosticLevel;
  message: string;
  context?: string;
};

type Listener = (entries: readonly DiagnosticEntry[]) => void;

export type DiagnosticsOptions = {
  /** Mirror entries to the console. */
  echo?: boolean;
  maxEntries?: number;
  now?: () => Date;
};

export class DiagnosticsLog {
  private entries: DiagnosticEntry[] = [];
  private listeners = new Set<Listener>();
  private readonly echo: boolean;
  private readonly maxEntries: number;
  private readonly now: () => Date;

  constructor(options: DiagnosticsOptions = {}) {
    this.echo = options.echo ?? true;
    this.maxEntries = options.maxEntries ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  add(level: DiagnosticLevel, message: string, context?: string): DiagnosticEntry {
    const entry: DiagnosticEntry = {
      timestamp: format(this.now(), "yyyy-MM-dd HH:mm:ss.SSS"),
      level,
      message,
      ...(context !== undefined ? { context } : {}),
    };

    this.entries = [...this.entries, entry].slice(-this.maxEntries);
    this.notify();

    if (this.echo) {
      const prefix = `[${entry.timestamp}] [${level.toUpperCase()}]${context ? ` [${context}]` : ""}`;
      if (level === "error") console.error(prefix, message);
      else if (level === "warning") console.warn(prefix, message);
      else console.log(prefix, message);
    }
    return entry;
  }

  info(message: string, context?: string) {
    return this.add("info", message, context);
  }

  success(message: string, context?: string) {
    return this.add("success", message, context);
  }

  warn(message: string, context?: string) {
    return this.add("warning", message, context);
  }

  private notify() {
    this.listeners.forEach((l) => l(this.entries));
  }

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    listener(this.entries);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getEntries(): readonly DiagnosticEntry[] {
    return this.entries;
  }
}
