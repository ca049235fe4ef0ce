import type { SourcePosition } from './nodes'

function buildLineOffsets(source: string): number[] {
  const offsets = [0]
  for (let i = 0; i < source.length; i++) {
    if (source.charCodeAt(i) === 10) {
      // '\n'
      offsets.push(i + 1)
    }
  }
  return offsets
}

function clampOffset(offset: number, sourceLength: number): number {
  if (!Number.isFinite(offset)) return 0
  if (offset <= 0) return 0
  if (offset >= sourceLength) return sourceLength
  return Math.trunc(offset)
}

/**
 * Maps character offsets to 1-based lines and 0-based columns.
 * Built once per source; lookups are a binary search over line starts.
 */
export class LineIndex {
  private lineOffsets: number[]
  private sourceLength: number

  constructor(source: string) {
    this.lineOffsets = buildLineOffsets(source)
    this.sourceLength = source.length
  }

  positionFor(offset: number): SourcePosition {
    const clamped = clampOffset(offset, this.sourceLength)

    // Binary search for the line containing this offset.
    let lo = 0
    let hi = this.lineOffsets.length - 1
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1
      if (this.lineOffsets[mid] <= clamped) {
        lo = mid
      } else {
        hi = mid - 1
      }
    }

    return { line: lo + 1, column: clamped - this.lineOffsets[lo] }
  }
}
