import type { IOutputService } from "../interfaces/output.interface";

export interface OutputEvent {
  kind: keyof IOutputService;
  text?: string;
  value?: unknown;
}

/**
 * IOutputService that records every call for assertions.
 */
export class RecordingOutput implements IOutputService {
  readonly events: OutputEvent[] = [];

  success(text: string): void {
    this.events.push({ kind: "success", text });
  }
  warn(text: string): void {
    this.events.push({ kind: "warn", text });
  }
  error(text: string): void {
    this.events.push({ kind: "error", text });
  }
  dim(text: string): void {
    this.events.push({ kind: "dim", text });
  }
  json(value: unknown): void {
    this.events.push({ kind: "json", value });
  }
  startSpinner(text: string): void {
    this.events.push({ kind: "startSpinner", text });
  }
  succeedSpinner(text?: string): void {
    this.events.push({ kind: "succeedSpinner", text });
  }
  failSpinner(text?: string): void {
    this.events.push({ kind: "failSpinner", text });
  }

  /** Text of every event of one kind, in order */
  lines(kind: keyof IOutputService): string[] {
    return this.events
      .filter((event) => event.kind === kind && event.text !== undefined)
      .map((event) => event.text ?? "");
  }
}
