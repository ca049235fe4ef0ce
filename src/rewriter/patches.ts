// Token-range patches and the engine that applies them.
//
// A patch replaces tokens `[start, end)` with text; `start === end` inserts
// text before token `start` (or at the very end when `start` is the token
// count). Patches are collected in any order and applied in one pass.

import type { TokenList } from '../lexer/token-list'
import { attempt, invalidArgument, patchConflict } from '../errors'
import type { Result } from '../errors'

export interface Patch {
  readonly start: number
  readonly end: number
  readonly text: string
}

export function isInsertion(patch: Patch): boolean {
  return patch.start === patch.end
}

export class PatchList {
  private items: Patch[] = []

  get length(): number {
    return this.items.length
  }

  /** Patches in insertion order. */
  get patches(): readonly Patch[] {
    return this.items
  }

  add(start: number, end: number, text: string): void {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start) {
      throw invalidArgument(`invalid patch range [${start}, ${end})`, { tokenIndex: start })
    }
    this.items.push({ start, end, text })
  }

  insert(at: number, text: string): void {
    this.add(at, at, text)
  }

  /**
   * True when `[start, end)` can be replaced without conflicting with what
   * is already listed: no replacement overlaps it and no insertion falls
   * strictly inside it.
   */
  canReplace(start: number, end: number): boolean {
    return !this.items.some((p) =>
      isInsertion(p) ? start < p.start && p.start < end : p.start < end && start < p.end,
    )
  }

  /** True when inserting before token `at` lands outside every replacement. */
  canInsert(at: number): boolean {
    return !this.items.some((p) => p.start < at && at < p.end)
  }

  clear(): void {
    this.items = []
  }
}

// Insertions sort before a replacement starting at the same token; ties keep
// insertion order (Array.prototype.sort is stable).
function comparePatches(a: Patch, b: Patch): number {
  if (a.start !== b.start) return a.start - b.start
  const aIns = isInsertion(a) ? 0 : 1
  const bIns = isInsertion(b) ? 0 : 1
  return aIns - bIns
}

function validate(sorted: readonly Patch[], tokenCount: number): void {
  let cover: Patch | null = null
  for (const p of sorted) {
    if (p.end > tokenCount) {
      throw invalidArgument(`patch [${p.start}, ${p.end}) extends past ${tokenCount} tokens`, {
        tokenIndex: p.start,
      })
    }
    if (cover !== null && p.start < cover.end) {
      if (isInsertion(p)) {
        // An insertion at cover.start was ordered ahead of it; anything later is inside
        throw patchConflict(
          `insertion at ${p.start} falls inside replacement [${cover.start}, ${cover.end})`,
          { tokenIndex: p.start },
        )
      }
      if (p.start !== cover.start || p.end !== cover.end) {
        throw patchConflict(
          `replacement [${p.start}, ${p.end}) overlaps [${cover.start}, ${cover.end})`,
          { tokenIndex: p.start },
        )
      }
    }
    if (!isInsertion(p) && (cover === null || p.end > cover.end)) {
      cover = p
    }
  }
}

/**
 * Render `tokens` with `patches` applied.
 *
 * Patches are ordered by start token, insertions ahead of a replacement at
 * the same token, and otherwise by their order in the list. Replacements
 * over an identical range are all emitted, in list order, in place of that
 * range. Any other overlap between replacements, or an insertion strictly
 * inside a replacement, fails with PATCH_CONFLICT. The list is not modified,
 * so applying it again gives the same text.
 */
export function applyPatches(
  tokens: TokenList,
  patches: PatchList | readonly Patch[],
): Result<string> {
  return attempt(() => {
    if (!tokens || !patches) {
      throw invalidArgument('applyPatches: tokens and patches are required')
    }
    const list = patches instanceof PatchList ? patches.patches : patches
    const sorted = [...list].sort(comparePatches)
    validate(sorted, tokens.length)

    const parts: string[] = []
    let cursor = 0
    for (const p of sorted) {
      if (p.start > cursor) {
        parts.push(tokens.join(cursor, p.start))
        cursor = p.start
      }
      parts.push(p.text)
      if (p.end > cursor) {
        cursor = p.end
      }
    }
    parts.push(tokens.join(cursor, tokens.length))
    return parts.join('')
  })
}
