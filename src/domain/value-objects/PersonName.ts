/**
 * 把與會者字串轉成 vault 中人物筆記的標題
 * - "Full Name <someone@example.com>" → "Full Name"
 * - "john.doe@example.com" → "John Doe"
 * - 其他字串原樣（去除頭尾空白）
 */
export function toPersonDisplayName(raw: string): string {
  const trimmed = raw.trim();

  const angle = /^(.+?)\s*<[^>]*>$/.exec(trimmed);
  if (angle) return angle[1].trim();

  if (trimmed.includes('@')) {
    const local = trimmed.split('@')[0].replace(/[._]+/g, ' ');
    return local
      .split(/\s+/)
      .filter(Boolean)
      .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
      .join(' ');
  }

  return trimmed;
}

/** 清除會破壞 wikilink 語法的字元後輸出 [[Name]] */
export function toWikilink(name: string): string {
  const safe = name.replace(/[[\]|#^]/g, '').replace(/\s+/g, ' ').trim();
  return `[[${safe}]]`;
}
