import type { IgnoredLines } from '../../types/ignored-lines'

/**
 * Collects lines suppressed by inline comment directives.
 *
 * Supported directives (lowercase, exact match):
 *
 * - `antiseptic-ignore-file`
 * - `antiseptic-ignore-start` … `antiseptic-ignore-end`
 * - `antiseptic-ignore-next-line`
 * - `antiseptic-ignore` (inline on the same line).
 *
 * Notes:
 *
 * - "next-line" applies strictly to the immediate next physical line.
 * - Block directives behave as a simple toggle; nested blocks are not supported.
 * - A line carrying any directive is itself ignored, so the directive never
 *   gets reported.
 *
 * @param content - File content.
 * @returns Whether the whole file is ignored, and the one-based ignored lines.
 */
export function getIgnoredLines(content: string): IgnoredLines {
  let result: IgnoredLines = { lines: new Set(), file: false }
  if (!content.includes('antiseptic-ignore')) {
    return result
  }

  let inBlock = false

  for (let [index, text] of content.split('\n').entries()) {
    let current = index + 1

    if (text.includes('antiseptic-ignore-file')) {
      result.file = true
      return result
    }

    if (text.includes('antiseptic-ignore-start')) {
      inBlock = true
    }

    if (inBlock || text.includes('antiseptic-ignore')) {
      result.lines.add(current)
    }

    if (text.includes('antiseptic-ignore-end')) {
      inBlock = false
    }

    if (text.includes('antiseptic-ignore-next-line')) {
      result.lines.add(current + 1)
    }
  }

  return result
}
