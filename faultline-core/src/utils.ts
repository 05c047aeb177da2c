export function currentISOTime(): string {
  return new Date().toISOString()
}

export function safeSetTimeout(fn: () => void, timeout: number): ReturnType<typeof setTimeout> {
  const t = setTimeout(fn, timeout)
  // We unref if available to prevent Node.js hanging on exit
  if (typeof t === 'object' && typeof t.unref === 'function') {
    t.unref()
  }
  return t
}

export const isError = (x: unknown): x is Error => {
  return x instanceof Error
}

export const isPlainObject = (x: unknown): x is Record<string, unknown> => {
  return Object.prototype.toString.call(x) === '[object Object]'
}

/**
 * Merges metadata tab by tab, later sources win for keys present in both.
 */
export function mergeMetadata(
  ...sources: (Record<string, Record<string, unknown>> | undefined)[]
): Record<string, Record<string, unknown>> {
  const merged: Record<string, Record<string, unknown>> = {}
  for (const source of sources) {
    if (!source) {
      continue
    }
    for (const [tab, values] of Object.entries(source)) {
      merged[tab] = { ...(merged[tab] ?? {}), ...values }
    }
  }
  return merged
}
