import type { AuditEntry } from "@/models";

function serialOf(entry: AuditEntry): number {
  const serial = Number(entry.id.slice(entry.id.lastIndexOf("_") + 1));
  return Number.isFinite(serial) ? serial : 0;
}

/** Oldest first; entries stamped with the same instant fall back to their serial. */
export function sortAudit(entries: AuditEntry[]): AuditEntry[] {
  return [...entries].sort((a, b) => a.at.localeCompare(b.at) || serialOf(a) - serialOf(b));
}

export function summarizeAudit(entry: AuditEntry): string {
  const actor = entry.actor?.name ?? entry.actor?.id ?? "system";
  return `${entry.at} • ${actor} • ${entry.summary}`;
}

/** The session's history log as the shell shows it, one line per command. */
export function renderHistoryLog(entries: AuditEntry[]): string[] {
  return sortAudit(entries).map(summarizeAudit);
}
