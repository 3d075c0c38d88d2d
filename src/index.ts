export * from "@/models";
export * from "@/engine";
export { renderHistoryLog, sortAudit, summarizeAudit } from "@/admin/audit";
export * from "@/store/tournamentStore";
