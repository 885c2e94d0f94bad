// テキストを指定文字数で切り詰める
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 3) + '...';
}

// 連続する空白・改行を1つの空白にまとめる（一覧表示用）
export function toSingleLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// 件数の比率をパーセント表記にする
export function formatPercent(count: number, total: number): string {
  if (total === 0) {
    return '0.0%';
  }
  return `${((count / total) * 100).toFixed(1)}%`;
}
