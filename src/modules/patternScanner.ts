/**
 * Substrings whose presence in an archived URL points at an endpoint or
 * parameter worth a closer look. Order is the report order.
 */
export const SENSITIVE_PATTERNS = [
  '/api/',
  '/admin/',
  '/js/',
  '/account/',
  '/cgi-bin/',
  '/wp-admin/',
  'response_type=token',
  'password=',
  'isAdmin=',
] as const;

export type SensitivePattern = typeof SENSITIVE_PATTERNS[number];

export type PatternCounts = Record<SensitivePattern, number>;

export function emptyPatternCounts(): PatternCounts {
  return {
    '/api/': 0,
    '/admin/': 0,
    '/js/': 0,
    '/account/': 0,
    '/cgi-bin/': 0,
    '/wp-admin/': 0,
    'response_type=token': 0,
    'password=': 0,
    'isAdmin=': 0,
  };
}

/**
 * Count URLs containing each pattern. Case-sensitive; a URL counts once per
 * pattern no matter how often the pattern repeats in it.
 */
export function scanUrls(urls: Iterable<string>): PatternCounts {
  const counts = emptyPatternCounts();
  for (const url of urls) {
    for (const pattern of SENSITIVE_PATTERNS) {
      if (url.includes(pattern)) {
        counts[pattern] += 1;
      }
    }
  }
  return counts;
}

/** Non-zero patterns in report order */
export function interestingPatterns(counts: PatternCounts): Array<[SensitivePattern, number]> {
  const result: Array<[SensitivePattern, number]> = [];
  for (const pattern of SENSITIVE_PATTERNS) {
    if (counts[pattern] > 0) {
      result.push([pattern, counts[pattern]]);
    }
  }
  return result;
}
