/**
 * Fuzzy matching using Levenshtein distance
 * 模糊比對模組，用於「找不到」時提供相近名稱建議（不分大小寫）
 */

export interface FuzzyMatchResult {
  match: string;
  distance: number;
}

/**
 * 計算兩個字串之間的 Levenshtein 編輯距離
 * 只保留上一列，空間 O(min(a, b))
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const [short, long] = a.length <= b.length ? [a, b] : [b, a];
  let previous = Array.from({ length: short.length + 1 }, (_, i) => i);

  for (let i = 1; i <= long.length; i++) {
    const current = [i];
    for (let j = 1; j <= short.length; j++) {
      const cost = long.charAt(i - 1) === short.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        previous[j - 1] + cost, // 替換
        current[j - 1] + 1,     // 插入
        previous[j] + 1         // 刪除
      );
    }
    previous = current;
  }

  return previous[short.length];
}

function rank(input: string, candidates: string[]): FuzzyMatchResult[] {
  const needle = input.toLowerCase();
  return candidates
    .map((candidate) => ({
      match: candidate,
      distance: levenshteinDistance(needle, candidate.toLowerCase()),
    }))
    .sort((x, y) => x.distance - y.distance);
}

/**
 * 在候選清單中找出最佳匹配
 * @param maxDistance 最大允許距離（預設 3）
 * @returns 匹配結果，若無符合條件則回傳 null
 */
export function findBestMatch(
  input: string,
  candidates: string[],
  maxDistance: number = 3
): FuzzyMatchResult | null {
  const [best] = rank(input, candidates);
  if (!best || best.distance > maxDistance) {
    return null;
  }
  return best;
}

/**
 * 取得距離最近的前 N 個候選（同距離維持原順序）
 */
export function getTopCandidates(
  input: string,
  candidates: string[],
  limit: number = 5
): string[] {
  return rank(input, candidates)
    .slice(0, limit)
    .map((result) => result.match);
}
