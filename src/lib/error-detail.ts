/**
 * Error Detail
 * 將平台回傳的錯誤內容整理成 ErrorDetail（結構化 JSON 或原始文字）
 */

import type { ErrorDetail } from '../types/api.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

function fromRecord(record: Record<string, unknown>): ErrorDetail {
  return {
    kind: 'structured',
    // OAuth 端點使用 error / error_description
    message: pickString(record, 'message', 'error_description', 'error') ?? 'Unknown error',
    code: pickString(record, 'code'),
    requestId: pickString(record, 'requestId'),
  };
}

/**
 * 解析錯誤回應內容
 * @param data ofetch 已解析的 body（物件、字串或 undefined）
 */
export function parseErrorDetail(data: unknown): ErrorDetail {
  if (isRecord(data)) {
    return fromRecord(data);
  }

  if (typeof data === 'string') {
    const text = data.trim();
    if (text.startsWith('{')) {
      try {
        const parsed: unknown = JSON.parse(text);
        if (isRecord(parsed)) {
          return fromRecord(parsed);
        }
      } catch {
        // 不是 JSON，當作原始文字
      }
    }
    return { kind: 'raw', body: data };
  }

  if (data === undefined || data === null) {
    return { kind: 'raw', body: '' };
  }

  return { kind: 'raw', body: JSON.stringify(data) };
}

/**
 * 轉成單行摘要（用於錯誤訊息）
 */
export function summarizeErrorDetail(detail: ErrorDetail): string {
  if (detail.kind === 'structured') {
    return detail.code ? `${detail.message} (${detail.code})` : detail.message;
  }
  return detail.body.trim() || '(empty response body)';
}

/**
 * 轉成多行顯示
 */
export function formatErrorDetail(detail: ErrorDetail): string[] {
  if (detail.kind === 'structured') {
    return [
      `Message: ${detail.message}`,
      `Code: ${detail.code ?? 'UNKNOWN'}`,
      `Request ID: ${detail.requestId ?? 'N/A'}`,
    ];
  }
  return [detail.body.trim() || '(empty response body)'];
}
