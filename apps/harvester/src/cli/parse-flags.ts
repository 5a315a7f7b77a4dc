export type Flags = Record<string, string | boolean>

/**
 * `--key value words --switch` → { key: 'value words', switch: true }.
 * Tokens before the first flag are ignored.
 */
export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === undefined || !token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length) {
      const next = argv[j]
      if (next === undefined || next.startsWith('--')) break
      valueTokens.push(next)
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

export function asOptionalString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined
}

/**
 * undefined when the flag is absent, NaN when it is present but not an integer.
 */
export function asInteger(value: string | boolean | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string' || !/^-?\d+$/.test(value.trim())) {
    return Number.NaN
  }
  return Number.parseInt(value, 10)
}
