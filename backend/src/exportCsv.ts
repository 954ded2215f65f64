import { NothingToExportError } from "./errors";
import type { QualifiedMetricId, SeriesSnapshot } from "./types";

export type ExportRow = string[];

export interface ExportTable {
    header: string[];
    rows: ExportRow[];
}

// union of metric ids across snapshots, first-seen order
function exportColumns(snapshots: readonly SeriesSnapshot[]): QualifiedMetricId[] {
    const seen = new Set<QualifiedMetricId>();
    for (const s of snapshots) {
        for (const id of s.metricIds) seen.add(id);
    }
    return [...seen];
}

function formatValue(value: number | null | undefined): string {
    if (value === null || value === undefined || !Number.isFinite(value)) return "";
    return String(value);
}

/**
 * One row per sample per saved series:
 * `series, t_s, <sensor:metric>...`; absent values become empty cells.
 */
export function buildExportTable(snapshots: readonly SeriesSnapshot[]): ExportTable {
    if (snapshots.length === 0) throw new NothingToExportError();

    const columns = exportColumns(snapshots);
    const rows: ExportRow[] = [];

    for (const snapshot of snapshots) {
        snapshot.times.forEach((t, i) => {
            const row = [snapshot.name, t.toFixed(2)];
            for (const id of columns) {
                row.push(formatValue(snapshot.values[id]?.[i]));
            }
            rows.push(row);
        });
    }

    return { header: ["series", "t_s", ...columns], rows };
}

function escapeCell(cell: string): string {
    return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

export function toCsv(table: ExportTable): string {
    const lines = [table.header, ...table.rows].map((row) => row.map(escapeCell).join(","));
    return `${lines.join("\r\n")}\r\n`;
}
