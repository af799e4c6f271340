import { PlatformPolicy } from '../interfaces/pipeline-options.interface';
import { RawValue } from '../interfaces/raw-record.interface';
import { cleanText } from './text.normalizer';

export type CanonicalPlatform = 'Windows' | 'Mac' | 'Linux';

/**
 * Keyword rules checked per token, most specific first:
 * "steamos" is Linux even though it contains "steam".
 */
const PLATFORM_KEYWORDS: ReadonlyArray<{ platform: CanonicalPlatform; pattern: RegExp }> = [
  { platform: 'Linux', pattern: /linux|steamos/ },
  { platform: 'Mac', pattern: /mac|macos|osx|os x/ },
  { platform: 'Windows', pattern: /windows|win|pc|steam|xbox|ea app|ubisoft|microsoft/ },
];

const OUTPUT_ORDER: readonly CanonicalPlatform[] = ['Windows', 'Mac', 'Linux'];

/**
 * Map a storefront platform list onto Windows, Mac and Linux.
 * Tokens that match no keyword are dropped.
 */
export function canonicalizePlatforms(value: RawValue): string | null {
  const text = cleanText(value);
  if (text === null) {
    return null;
  }

  const found = new Set<CanonicalPlatform>();
  for (const token of text.toLowerCase().split(/[,;|/]/)) {
    const rule = PLATFORM_KEYWORDS.find(({ pattern }) => pattern.test(token));
    if (rule) {
      found.add(rule.platform);
    }
  }

  const platforms = OUTPUT_ORDER.filter((platform) => found.has(platform));
  return platforms.length > 0 ? platforms.join(', ') : null;
}

/**
 * Normalize a platform value under the run's policy
 */
export function normalizePlatform(value: RawValue, policy: PlatformPolicy): string | null {
  return policy === 'canonical' ? canonicalizePlatforms(value) : cleanText(value);
}
