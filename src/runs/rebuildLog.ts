import type { JsonObject } from "../core/json.js";

export interface RebuildLogEvent {
  ts: string;
  kind: string;
  message: string;
  data: JsonObject | null;
}

/**
 * Collects one target's structured events as JSON lines; the lines become the `logs` asset.
 */
export class RebuildLog {
  private readonly lines: string[] = [];
  private readonly events: RebuildLogEvent[] = [];

  constructor(
    private readonly opts: {
      label?: string;
      echo?: boolean;
      now?: () => Date;
    } = {}
  ) {}

  event(kind: string, message: string, data: JsonObject | null = null): void {
    const ev: RebuildLogEvent = { ts: (this.opts.now?.() ?? new Date()).toISOString(), kind, message, data };
    this.events.push(ev);
    this.lines.push(JSON.stringify(ev));
    if (this.opts.echo) console.error(`${this.opts.label ? `[${this.opts.label}] ` : ""}${kind}: ${message}`);
  }

  /** Events recorded so far, optionally narrowed to one kind. */
  list(kind?: string): RebuildLogEvent[] {
    return kind ? this.events.filter((e) => e.kind === kind) : [...this.events];
  }

  text(): string {
    return this.lines.length ? `${this.lines.join("\n")}\n` : "";
  }
}
