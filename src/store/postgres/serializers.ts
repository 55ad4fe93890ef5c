import type { ConfirmationEntry } from "../../schemas/report_package";

export function toIsoTimestamp(value: unknown): string {
  if (!value) {
    return "";
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === "string") {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed.toISOString();
    }
  }

  return "";
}

/** JSONB arrives decoded from pg, but a text column or a cast may still hand back a string. */
export function toJsonDocument(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }

  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}

export interface ConfirmationRow {
  entry_id: string;
  package_id: string;
  sequence: number | string;
  section: string;
  acknowledged: boolean;
  comment: string | null;
  recorded_at: Date | string;
}

export function confirmationFromRow(row: ConfirmationRow): ConfirmationEntry {
  return {
    entry_id: row.entry_id,
    package_id: row.package_id,
    sequence: Number(row.sequence),
    section: row.section,
    acknowledged: row.acknowledged,
    comment: row.comment,
    recorded_at: toIsoTimestamp(row.recorded_at),
  };
}
