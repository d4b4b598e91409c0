export type OutputFormat = "text" | "json" | "yaml";

export interface DeviceSummary {
  readonly brand: string;
  readonly model: string;
  /** null when the device has no serial assertion yet. */
  readonly serial: string | null;
}
