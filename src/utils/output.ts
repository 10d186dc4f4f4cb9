/**
 * Output Formatter Module
 * 輸出格式化模組 - 支援 JSON、Table、CSV 格式
 *
 * 結果一律寫到 stdout，成功 / 提示 / 錯誤訊息寫到 stderr
 */

import Table from 'cli-table3';
import { AuthenticationError } from '../services/auth.js';
import { ApiError } from '../services/api.js';
import { formatErrorDetail } from '../lib/error-detail.js';
import { ResolutionAmbiguousError, ResolutionNotFoundError } from '../lib/identifier-resolver.js';

/**
 * 輸出格式類型
 */
export type OutputFormat = 'json' | 'table' | 'csv';

export interface OutputOptions {
  format?: OutputFormat;
  /** JSON 單行輸出 */
  compact?: boolean;
}

/**
 * 欄位定義
 */
export interface ColumnDef {
  key: string;
  label?: string;
  format?: (value: unknown) => string;
}

type Row = Record<string, unknown>;

function isRecord(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 取得值（支援巢狀路徑）
 */
function getValue(row: Row, path: string): unknown {
  let current: unknown = row;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function cellText(row: Row, column: ColumnDef): string {
  const value = getValue(row, column.key);
  if (column.format) return column.format(value);
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * 從回應取出資料列：陣列本身，或清單回應的 entries
 */
export function extractRows(data: unknown): Row[] | undefined {
  const list = Array.isArray(data) ? data : isRecord(data) && Array.isArray(data.entries) ? data.entries : undefined;
  if (!list) return undefined;
  const rows: Row[] = [];
  for (const item of list) {
    if (!isRecord(item)) return undefined;
    rows.push(item);
  }
  return rows;
}

/**
 * 未指定欄位時使用第一筆資料的鍵
 */
function inferColumns(rows: Row[]): ColumnDef[] {
  return rows.length > 0 ? Object.keys(rows[0]).map((key) => ({ key })) : [];
}

/**
 * 格式化 JSON
 */
export function formatJSON(data: unknown, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 格式化表格
 */
export function formatTable(rows: Row[], columns: ColumnDef[]): string {
  if (rows.length === 0) {
    return 'No data to display';
  }

  const table = new Table({
    head: columns.map((col) => col.label ?? col.key),
    style: { head: [], border: [] },
    wordWrap: true,
  });

  for (const row of rows) {
    table.push(columns.map((col) => cellText(row, col)));
  }

  return table.toString();
}

/**
 * 格式化 CSV
 */
export function formatCSV(rows: Row[], columns: ColumnDef[]): string {
  if (rows.length === 0) {
    return '';
  }

  const escapeCSV = (value: string): string => {
    if (value.includes(',') || value.includes('"') || value.includes('\n')) {
      return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
  };

  const lines: string[] = [];

  // 表頭
  lines.push(columns.map((col) => escapeCSV(col.label ?? col.key)).join(','));

  // 資料列
  for (const row of rows) {
    lines.push(columns.map((col) => escapeCSV(cellText(row, col))).join(','));
  }

  return lines.join('\n');
}

/**
 * 依格式產生輸出字串
 * table / csv 無法取得資料列時退回 JSON；204 等空回應輸出 {}
 */
export function renderOutput(data: unknown, options: OutputOptions = {}, columns?: ColumnDef[]): string {
  const { format = 'json', compact = false } = options;
  const value = data === undefined ? {} : data;

  if (format === 'json') {
    return formatJSON(value, !compact);
  }

  const rows = extractRows(value);
  if (!rows) {
    return formatJSON(value, !compact);
  }

  const cols = columns ?? inferColumns(rows);
  return format === 'table' ? formatTable(rows, cols) : formatCSV(rows, cols);
}

/**
 * 通用輸出函數
 */
export function outputData(data: unknown, options: OutputOptions = {}, columns?: ColumnDef[]): void {
  console.log(renderOutput(data, options, columns));
}

export function printSuccess(message: string): void {
  console.error(`✓ ${message}`);
}

export function printInfo(message: string): void {
  console.error(message);
}

/**
 * 將錯誤轉成顯示用的多行訊息
 */
export function describeError(error: unknown): string[] {
  if (error instanceof ApiError) {
    return [
      `API Error (${error.status}): ${error.method} ${error.url}`,
      ...formatErrorDetail(error.detail).map((line) => `  ${line}`),
    ];
  }

  if (error instanceof AuthenticationError) {
    const lines = [`Error: ${error.message}`];
    if (error.detail) {
      lines.push(...formatErrorDetail(error.detail).map((line) => `  ${line}`));
    }
    return lines;
  }

  if (error instanceof ResolutionNotFoundError) {
    const lines = [`Error: ${error.message}`];
    if (error.suggestion) {
      lines.push(error.suggestion);
    }
    return lines;
  }

  if (error instanceof ResolutionAmbiguousError) {
    return [`Error: ${error.message}`, 'Use the full name or the ID to disambiguate.'];
  }

  return [`Error: ${error instanceof Error ? error.message : String(error)}`];
}

/**
 * 指令錯誤處理：寫入 stderr 後以 exit code 1 結束
 */
export function handleCommandError(error: unknown): never {
  for (const line of describeError(error)) {
    console.error(line);
  }
  process.exit(1);
}
