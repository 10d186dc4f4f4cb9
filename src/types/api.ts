/**
 * Sigma REST API 資料型別
 * 只定義 CLI 有實際讀取的欄位，其餘欄位原樣輸出
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | undefined>;

/**
 * 平台錯誤內容：可解析的 JSON 錯誤物件，或原始文字
 */
export type ErrorDetail =
  | { kind: 'structured'; message: string; code?: string; requestId?: string }
  | { kind: 'raw'; body: string };

/**
 * 清單 API 回應（單頁）
 */
export interface ListResponse<T> {
  entries: T[];
  hasMore?: boolean;
  nextPage?: string | null;
  total?: number;
}

export interface Team {
  teamId: string;
  name: string;
  description?: string;
  createdAt?: string;
  updatedAt?: string;
}

export interface Member {
  memberId: string;
  email: string;
  firstName?: string;
  lastName?: string;
  memberType?: string;
  accountType?: string;
  userKind?: string;
  createdAt?: string;
  updatedAt?: string;
}

/**
 * 團隊成員異動（PATCH /v2/teams/{teamId}/members）
 */
export interface TeamMembershipChange {
  add?: string[];
  remove?: string[];
}

export type JsonObject = Record<string, unknown>;
