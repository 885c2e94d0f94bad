import { parseHTML } from 'linkedom';
import { getLogger } from './logger.js';

const logger = getLogger();

// 本文抽出前に除去する要素（関連記事・共有ボタン・埋め込み・図版など）
const NOISE_SELECTOR = [
  'script',
  'style',
  'iframe',
  'embed',
  'object',
  'noscript',
  'form',
  'figure',
  'figcaption',
  '.related-posts',
  '.sharedaddy',
  '.jp-relatedposts',
].join(', ');

// テキストを抽出するブロック要素
const BLOCK_SELECTOR = 'p, h2, h3, ul, ol';

// この文字数未満のブロックは定型句チェックの対象
export const BOILERPLATE_MAX_LENGTH = 100;

// 「続きを読む」「おすすめ」系の定型句
export const BOILERPLATE_PHRASES: readonly string[] = ['Прочитајте', 'Read More', 'Ви препорачуваме'];

export interface NormalizeOptions {
  phrases?: readonly string[];
  maxBoilerplateLength?: number;
}

function parseFragment(html: string) {
  return parseHTML(`<!DOCTYPE html><html><head></head><body>${html}</body></html>`).document;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

interface TreeNode {
  parentElement: TreeNode | null;
}

function hasTakenAncestor(element: TreeNode, taken: ReadonlySet<TreeNode>): boolean {
  for (let parent = element.parentElement; parent; parent = parent.parentElement) {
    if (taken.has(parent)) return true;
  }
  return false;
}

export function isBoilerplate(
  block: string,
  phrases: readonly string[] = BOILERPLATE_PHRASES,
  maxLength: number = BOILERPLATE_MAX_LENGTH
): boolean {
  if (block.length >= maxLength) {
    return false;
  }
  const lower = block.toLowerCase();
  return phrases.some((phrase) => lower.includes(phrase.toLowerCase()));
}

/**
 * 記事本文のHTMLをプレーンテキストに変換する
 *
 * 段落・見出し・リストのテキストを文書順に取り出し、空行区切りで連結する。
 * 短い定型句ブロックは除外する。壊れたHTMLでも例外は投げず、取れた分だけ返す。
 */
export function normalizeContent(html: string | null | undefined, options: NormalizeOptions = {}): string {
  if (!html || html.trim().length === 0) {
    return '';
  }

  const phrases = options.phrases ?? BOILERPLATE_PHRASES;
  const maxLength = options.maxBoilerplateLength ?? BOILERPLATE_MAX_LENGTH;

  try {
    const document = parseFragment(html);

    for (const node of Array.from(document.querySelectorAll(NOISE_SELECTOR))) {
      node.remove();
    }

    const blocks: string[] = [];
    const taken = new Set<TreeNode>();
    for (const element of Array.from(document.querySelectorAll(BLOCK_SELECTOR))) {
      // リスト内の段落などは親ブロックのテキストに含まれている
      if (hasTakenAncestor(element, taken)) continue;
      taken.add(element);

      const text = collapseWhitespace(element.textContent ?? '');
      if (!text) continue;
      if (isBoilerplate(text, phrases, maxLength)) continue;
      blocks.push(text);
    }

    return blocks.join('\n\n');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.warn({ error: message }, '本文HTMLの解析に失敗したため空の本文として扱います');
    return '';
  }
}

// タイトルのHTMLエンティティを復号する（'<' はタグとして解釈せずそのまま残す）
export function decodeTitle(html: string | null | undefined): string {
  if (!html) {
    return '';
  }
  try {
    return collapseWhitespace(parseFragment(html.replace(/</g, '&lt;')).body.textContent ?? '');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.warn({ error: message }, 'タイトルの復号に失敗');
    return html.trim();
  }
}
