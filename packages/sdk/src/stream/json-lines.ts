import { StreamParseError } from '@podlink/shared/errors'

export type JsonRecord = Record<string, unknown>

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse a newline-delimited JSON body, as streamed by pull and build
 */
export function parseJsonLines(text: string): JsonRecord[] {
  const records: JsonRecord[] = []
  const lines = text.split('\n')

  lines.forEach((raw, index) => {
    const line = raw.trim()
    if (line.length === 0) {
      return
    }

    let value: unknown
    try {
      value = JSON.parse(line)
    } catch {
      throw new StreamParseError(`Malformed JSON at line ${index + 1}: ${line}`)
    }

    if (!isRecord(value)) {
      throw new StreamParseError(`Malformed JSON at line ${index + 1}: ${line}`)
    }
    records.push(value)
  })

  return records
}
