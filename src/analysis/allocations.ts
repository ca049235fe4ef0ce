// Allocation-site analysis: finds calls to functions whose result must be
// checked for failure and decides whether the surrounding code already
// checks it.

import { TokenKind } from '../lexer/token'
import type { TokenList } from '../lexer/token-list'
import { attempt, invalidArgument } from '../errors'
import type { Result } from '../errors'
import type { Logger } from '../utils/logger'
import {
  assignmentBefore,
  isCallArgument,
  isDeclaredName,
  isInsideCondition,
  lvalueBefore,
  matchTextAt,
} from './boundaries'

// ---- Allocator descriptors ----

/**
 * How a failed call reports itself:
 * - PtrNull: returns a null pointer (`if (!v)`)
 * - IntNegative: returns a negative int (`if (v < 0)`)
 * - IntNonzero: returns a nonzero int (`if (v != 0)`)
 */
export type CheckStyle = 'PtrNull' | 'IntNegative' | 'IntNonzero'

export interface AllocatorSpec {
  readonly name: string
  readonly checkStyle: CheckStyle
}

export const DEFAULT_ALLOCATORS: readonly AllocatorSpec[] = [
  { name: 'malloc', checkStyle: 'PtrNull' },
  { name: 'calloc', checkStyle: 'PtrNull' },
  { name: 'realloc', checkStyle: 'PtrNull' },
  { name: 'strdup', checkStyle: 'PtrNull' },
  { name: '_strdup', checkStyle: 'PtrNull' },
  { name: 'strndup', checkStyle: 'PtrNull' },
  { name: 'asprintf', checkStyle: 'IntNegative' },
  { name: 'vasprintf', checkStyle: 'IntNegative' },
  { name: '_mkdir', checkStyle: 'IntNonzero' },
]

export function isCheckStyle(value: unknown): value is CheckStyle {
  return value === 'PtrNull' || value === 'IntNegative' || value === 'IntNonzero'
}

// ---- Sites ----

export interface AllocationSite {
  // Index of the allocator's name token
  tokenIndex: number
  spec: AllocatorSpec
  // Assignment target (`p`, `ctx->buf`, `*out`), or null when there is none
  varName: string | null
  // Index of the `=` assigning the result, or -1
  assignIndex: number
  // An existing guard was found
  isChecked: boolean
  // The pointer is dereferenced before any guard
  usedBeforeCheck: boolean
  // The call is the operand of `return`
  isReturnStmt: boolean
}

export interface FindAllocationsOptions {
  // Extra allocators; an entry overrides the default of the same name
  allocators?: readonly AllocatorSpec[]
  logger?: Logger
}

function buildTable(extra: readonly AllocatorSpec[] | undefined): Map<string, AllocatorSpec> {
  const table = new Map<string, AllocatorSpec>()
  for (const spec of DEFAULT_ALLOCATORS) table.set(spec.name, spec)
  if (extra !== undefined) {
    for (const spec of extra) table.set(spec.name, spec)
  }
  return table
}

function isDereferenceAt(tokens: TokenList, first: number, last: number): boolean {
  const prev = tokens.prevSignificant(first - 1)
  if (tokens.kind(prev) === TokenKind.Star) return true
  const next = tokens.kind(tokens.nextSignificant(last + 1))
  return next === TokenKind.Arrow || next === TokenKind.LBracket
}

/**
 * Look for an existing guard on `varName` after the statement holding the
 * call at `callIndex`. Scans forward from that statement's `;` until the
 * enclosing block closes or a `struct` keyword appears. A mention inside an
 * `if`/`while` condition counts as a guard; for pointer results, a
 * dereference seen first means the value is used unchecked.
 */
function findGuard(
  tokens: TokenList,
  callIndex: number,
  varName: string,
  spec: AllocatorSpec,
): { checked: boolean; usedBeforeCheck: boolean } {
  if (isInsideCondition(tokens, callIndex)) {
    return { checked: true, usedBeforeCheck: false }
  }

  const semi = tokens.findNext(TokenKind.Semicolon, callIndex)
  if (semi < 0) {
    return { checked: false, usedBeforeCheck: false }
  }

  let depth = 0
  for (let i = semi + 1; i < tokens.length; i++) {
    const kind = tokens.kind(i)
    if (kind === TokenKind.LBrace) {
      depth++
      continue
    }
    if (kind === TokenKind.RBrace) {
      if (depth === 0) break
      depth--
      continue
    }
    if (kind === TokenKind.Struct) break

    if (kind !== TokenKind.Identifier && kind !== TokenKind.Star) continue
    const last = matchTextAt(tokens, i, varName)
    if (last < 0) continue

    if (isInsideCondition(tokens, i)) {
      return { checked: true, usedBeforeCheck: false }
    }
    if (spec.checkStyle === 'PtrNull' && isDereferenceAt(tokens, i, last)) {
      return { checked: false, usedBeforeCheck: true }
    }
    i = last
  }
  return { checked: false, usedBeforeCheck: false }
}

/**
 * Scan `tokens` left to right for calls to known allocators.
 * Sites are returned in token order.
 */
export function findAllocations(
  tokens: TokenList,
  options: FindAllocationsOptions = {},
): Result<AllocationSite[]> {
  return attempt(() => {
    if (!tokens) {
      throw invalidArgument('findAllocations: tokens are required')
    }
    const table = buildTable(options.allocators)
    const sites: AllocationSite[] = []

    for (let i = 0; i < tokens.length; i++) {
      if (tokens.kind(i) !== TokenKind.Identifier) continue
      const spec = table.get(tokens.text(i))
      if (spec === undefined) continue
      if (tokens.kind(tokens.nextSignificant(i + 1)) !== TokenKind.LParen) continue
      if (isDeclaredName(tokens, i)) continue

      const prev = tokens.prevSignificant(i - 1)
      const prevKind = tokens.kind(prev)
      if (prevKind === TokenKind.Dot || prevKind === TokenKind.Arrow) continue

      if (prevKind === TokenKind.Return) {
        sites.push({
          tokenIndex: i,
          spec,
          varName: null,
          assignIndex: -1,
          isChecked: false,
          usedBeforeCheck: false,
          isReturnStmt: true,
        })
        continue
      }

      // `p = wrap(malloc(n))` hands the result to `wrap`, not to `p`
      const assign = assignmentBefore(tokens, i)
      const lvalue =
        assign < 0 || isCallArgument(tokens, assign, i) ? null : lvalueBefore(tokens, assign)

      if (lvalue === null) {
        sites.push({
          tokenIndex: i,
          spec,
          varName: null,
          assignIndex: assign,
          isChecked: isInsideCondition(tokens, i),
          usedBeforeCheck: false,
          isReturnStmt: false,
        })
        continue
      }

      const guard = findGuard(tokens, i, lvalue.text, spec)
      sites.push({
        tokenIndex: i,
        spec,
        varName: lvalue.text,
        assignIndex: assign,
        isChecked: guard.checked,
        usedBeforeCheck: guard.usedBeforeCheck,
        isReturnStmt: false,
      })
    }

    const unchecked = sites.filter((site) => !site.isChecked).length
    options.logger?.debug(`found ${sites.length} allocation site(s), ${unchecked} unchecked`)
    return sites
  })
}
