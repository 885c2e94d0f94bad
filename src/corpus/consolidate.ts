import type { CategoryMergePolicy } from '../config/index.js';
import { writeJsonAtomic, type CategoryStore } from '../storage/category-store.js';
import { mergeCollections, type MergeResult } from './merger.js';
import { loadCorpus } from './query.js';
import { getLogger } from '../utils/logger.js';

export class ConsolidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConsolidationError';
  }
}

// 全カテゴリを1つのJSONファイルに統合する
export async function consolidate(
  store: CategoryStore,
  outputPath: string,
  policy: CategoryMergePolicy = 'union'
): Promise<MergeResult> {
  const logger = getLogger();
  const corpus = await loadCorpus(store);

  const merged = mergeCollections(
    [...corpus].map(([name, articles]) => ({ name, articles })),
    policy
  );

  if (merged.articles.length === 0) {
    throw new ConsolidationError(`統合する記事がありません: ${store.dataDir}`);
  }

  await writeJsonAtomic(outputPath, merged.articles);

  for (const [category, counts] of Object.entries(merged.stats)) {
    logger.info(
      { category, original: counts.original, unique: counts.unique, duplicates: counts.original - counts.unique },
      'カテゴリを統合'
    );
  }
  logger.info(
    { articles: merged.articles.length, duplicates: merged.duplicates, policy, path: outputPath },
    '統合が完了しました'
  );

  return merged;
}
