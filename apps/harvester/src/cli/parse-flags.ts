export type FlagValue = string | boolean | string[]

/**
 * Parse `--flag value words --switch` style arguments.
 * Tokens up to the next flag form one value; a repeated flag collects its
 * values into an array.
 */
export function parseFlags(argv: string[]): Record<string, FlagValue> {
  const flags: Record<string, FlagValue> = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }
    i = j - 1

    if (valueTokens.length === 0) {
      flags[key] = true
      continue
    }

    const value = valueTokens.join(' ')
    const existing = flags[key]
    if (Array.isArray(existing)) {
      existing.push(value)
    } else if (typeof existing === 'string') {
      flags[key] = [existing, value]
    } else {
      flags[key] = value
    }
  }

  return flags
}

export function asString(value: FlagValue | undefined): string {
  if (Array.isArray(value)) return value[value.length - 1] ?? ''
  return typeof value === 'string' ? value : ''
}

export function asStringList(value: FlagValue | undefined): string[] {
  if (Array.isArray(value)) return value
  return typeof value === 'string' ? [value] : []
}

export function asNumber(value: FlagValue | undefined): number | undefined {
  const raw = asString(value)
  if (!raw) return undefined
  const parsed = Number.parseFloat(raw)
  return Number.isFinite(parsed) ? parsed : undefined
}
