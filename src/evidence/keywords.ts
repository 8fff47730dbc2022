/**
 * 关键词提取（通用检查的兜底匹配）
 */

const STOP_WORDS = new Set([
  'page', 'element', 'have', 'must', 'should', 'repo', 'repository', 'file', 'files',
  'with', 'that', 'this', 'from', 'into', 'when', 'then', 'there', 'their', 'which',
  'will', 'uses', 'using', 'contains', 'contain', 'includes', 'include', 'shows',
  'show', 'displays', 'display', 'some', 'each', 'every', 'also', 'only', 'least',
])

/** Lower-case words of 4+ letters, stopwords removed, first occurrence order */
export function extractKeywords(text: string): string[] {
  const words = text.toLowerCase().match(/[a-z]{4,}/g) ?? []
  const result = new Set<string>()
  for (const word of words) {
    if (!STOP_WORDS.has(word)) result.add(word)
  }
  return [...result]
}
