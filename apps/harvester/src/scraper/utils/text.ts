/**
 * Text helpers shared by adapters.
 */

/** Collapse runs of whitespace and trim. */
export function cleanText(text: string | null | undefined): string {
  if (!text) return ''
  return text.split(/\s+/).filter(Boolean).join(' ')
}

/**
 * Brands whose names contain a space. Titles starting with one of these keep
 * the whole phrase as the brand instead of just the first word.
 */
export const MULTI_WORD_BRANDS: readonly string[] = [
  'Bettinardi Golf',
  'Lazrus Golf',
  'Scotty Cameron',
  'Sub 70',
  'Tour Edge',
  'Wilson Staff',
]

/**
 * Split a product title into brand and model text.
 * "Titleist TSR3 Driver" → { brand: "Titleist", model: "TSR3 Driver" }
 * Returns null when the title is empty.
 */
export function splitBrandModel(
  title: string,
  multiWordBrands: readonly string[] = MULTI_WORD_BRANDS
): { brand: string; model: string } | null {
  const cleaned = cleanText(title)
  if (!cleaned) return null

  const lower = cleaned.toLowerCase()
  for (const brand of multiWordBrands) {
    const prefix = brand.toLowerCase()
    if (lower.startsWith(`${prefix} `)) {
      return { brand: cleaned.slice(0, brand.length), model: cleaned.slice(brand.length + 1) }
    }
  }

  const spaceIndex = cleaned.indexOf(' ')
  if (spaceIndex === -1) {
    return { brand: cleaned, model: cleaned }
  }
  return { brand: cleaned.slice(0, spaceIndex), model: cleaned.slice(spaceIndex + 1) }
}

const YEAR_PATTERN = /\b(19[89]\d|20\d\d)\b/

/**
 * Find a plausible release year (1980-2099) in free text.
 */
export function extractYear(text: string | null | undefined): number | undefined {
  if (!text) return undefined
  const match = YEAR_PATTERN.exec(text)
  return match?.[1] ? Number.parseInt(match[1], 10) : undefined
}
