/** Substrings that suggest a broken page when they show up in visible text */
export const ERROR_BANNERS = [
  'uncaught',
  'undefined is not a function',
  'is not defined',
  'traceback (most recent call last)',
  'application error',
  'internal server error',
  '404 not found',
  'page not found',
  'stack trace',
] as const

export function detectErrorBanners(text: string): string[] {
  const lower = text.toLowerCase()
  return ERROR_BANNERS.filter(banner => lower.includes(banner))
}
