/**
 * 名稱解析結果型別
 */

export type MatchKind = 'identifier' | 'exact' | 'composite' | 'partial';

/**
 * 解析成功
 */
export interface ResolveResult<T> {
  success: true;
  id: string;
  matchedBy: MatchKind;
  /** 以 UUID 直接通過時沒有紀錄 */
  record?: T;
}

/**
 * 解析失敗：找不到
 */
export interface ResolveNotFound {
  success: false;
  error: {
    code: 'NOT_FOUND';
    message: string;
    suggestion?: string;
    candidates: string[];
  };
}

/**
 * 解析失敗：多筆部分符合
 */
export interface ResolveAmbiguous {
  success: false;
  error: {
    code: 'AMBIGUOUS';
    message: string;
    matches: string[];
  };
}

export type ResolveResponse<T> = ResolveResult<T> | ResolveNotFound | ResolveAmbiguous;

/**
 * 值為字串（或可選字串）的欄位
 */
export type StringField<T> = {
  [K in keyof T]-?: T[K] extends string | undefined ? K : never;
}[keyof T] & string;

export interface ResolverConfig<T> {
  /** 實體名稱，用於訊息，例如 "team" */
  entity: string;
  /** 取得集合（單頁） */
  fetchCollection: () => Promise<T[]>;
  /** 識別碼欄位 */
  idField: StringField<T>;
  /** 主要名稱欄位（精確與部分比對） */
  primaryField: StringField<T>;
  /** 組合名稱欄位，例如 firstName + lastName */
  compositeFields?: readonly [StringField<T>, StringField<T>];
  /** 找不到時附加的提示 */
  notFoundHint?: string;
}
