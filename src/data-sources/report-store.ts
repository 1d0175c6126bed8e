import path from "path";
import { getErrorMessage, logInfo, logWarn } from "../core/logging.js";
import type { GateReport, GateStatus } from "../domain/gates/gate-types.js";
import { parseReport, serializeReport, type ReportSink } from "../domain/gates/report-builder.js";
import { SqliteDatabase, rowNumber, rowText, type Row, type SqlValue } from "./sqlite-adapter.js";

export interface ReportSummary {
  id: number;
  timestamp: string;
  status: GateStatus;
  exit_code: number;
  check_count: number;
  cancelled: boolean;
}

export interface ListReportsOptions {
  status?: GateStatus;
  limit?: number;
}

const DB_FILENAME = "reports.db";
const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

/**
 * Gate report persistence: a history row per run plus a single "latest"
 * row that each save overwrites. Stored reports are never edited.
 */
export class ReportStore implements ReportSink {
  private db: SqliteDatabase | null = null;
  private dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  initialize(): void {
    this.db = SqliteDatabase.open(path.join(this.dataDir, DB_FILENAME));

    this.db.sqlExec(`
      CREATE TABLE IF NOT EXISTS gate_reports (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp   TEXT NOT NULL,
        status      TEXT NOT NULL CHECK(status IN ('PASS','FAIL','PARTIAL','SKIP','ERROR')),
        exit_code   INTEGER NOT NULL,
        check_count INTEGER NOT NULL,
        cancelled   INTEGER NOT NULL DEFAULT 0,
        report_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS latest_gate_report (
        slot        INTEGER PRIMARY KEY CHECK(slot = 1),
        report_id   INTEGER NOT NULL,
        report_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_gate_reports_status ON gate_reports(status);
      CREATE INDEX IF NOT EXISTS idx_gate_reports_timestamp ON gate_reports(timestamp);
    `);

    this.db.persist();
    logInfo("ReportStore initialized");
  }

  /** History insert and latest overwrite commit together, then hit disk. */
  save(report: GateReport): void {
    const db = this.open();
    const json = serializeReport(report);
    const write = db.transaction((r: GateReport) => {
      const info = db
        .prepare(`
          INSERT INTO gate_reports (timestamp, status, exit_code, check_count, cancelled, report_json)
          VALUES (?, ?, ?, ?, ?, ?)
        `)
        .run(r.timestamp, r.status, r.exit_code, r.checks.length, r.cancelled ? 1 : 0, json);
      db.prepare(
        "INSERT OR REPLACE INTO latest_gate_report (slot, report_id, report_json) VALUES (1, ?, ?)",
      ).run(info.lastInsertRowid, json);
    });
    write(report);
    db.persist();
  }

  getLatest(): GateReport | null {
    const row = this.open().prepare("SELECT report_json FROM latest_gate_report WHERE slot = 1").get();
    return row ? parseReport(rowText(row, "report_json"), "latest gate report") : null;
  }

  getReport(id: number): GateReport | null {
    const row = this.open().prepare("SELECT report_json FROM gate_reports WHERE id = ?").get(id);
    return row ? parseReport(rowText(row, "report_json"), `gate report ${id}`) : null;
  }

  listReports(options?: ListReportsOptions): ReportSummary[] {
    const params: SqlValue[] = [];
    let where = "";
    if (options?.status) {
      where = "WHERE status = ?";
      params.push(options.status);
    }
    const limit = Math.max(1, Math.min(options?.limit ?? DEFAULT_LIMIT, MAX_LIMIT));

    return this.open()
      .prepare(`SELECT * FROM gate_reports ${where} ORDER BY id DESC LIMIT ?`)
      .all(...params, limit)
      .map(mapSummary);
  }

  close(): void {
    if (this.db) {
      try {
        this.db.close();
      } catch (err) {
        logWarn(`ReportStore.close(): ${getErrorMessage(err)}`);
      }
      this.db = null;
    }
  }

  private open(): SqliteDatabase {
    if (!this.db) {
      throw new Error("ReportStore not initialized. Call initialize() first.");
    }
    return this.db;
  }
}

const STATUSES: readonly GateStatus[] = ["PASS", "FAIL", "PARTIAL", "SKIP", "ERROR"];

function mapSummary(row: Row): ReportSummary {
  const raw = rowText(row, "status");
  const status = STATUSES.find((s) => s === raw);
  if (!status) {
    throw new Error(`Unknown gate status in report ${rowNumber(row, "id")}: ${raw}`);
  }
  return {
    id: rowNumber(row, "id"),
    timestamp: rowText(row, "timestamp"),
    status,
    exit_code: rowNumber(row, "exit_code"),
    check_count: rowNumber(row, "check_count"),
    cancelled: rowNumber(row, "cancelled") === 1,
  };
}
