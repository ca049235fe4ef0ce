// Safety strategies: turn unchecked allocation sites into patches.
//
// Strategies run in a fixed order per site. The realloc rewrite claims its
// whole statement, so the generic guard is only inserted when it declined.

import { TokenKind } from '../lexer/token'
import type { TokenList } from '../lexer/token-list'
import type { AllocationSite, CheckStyle } from '../analysis/allocations'
import {
  compactText,
  isNestedStatement,
  lvalueBefore,
  statementEnd,
  statementStart,
} from '../analysis/boundaries'
import { attempt, invalidArgument } from '../errors'
import type { Result } from '../errors'
import type { Logger } from '../utils/logger'
import type { PatchList } from './patches'

export interface SafetyConfig {
  // Expression returned when an allocation fails
  errorCode: string
}

export const DEFAULT_SAFETY_CONFIG: SafetyConfig = { errorCode: 'ENOMEM' }

export function guardText(style: CheckStyle, varName: string, errorCode: string): string {
  switch (style) {
    case 'PtrNull':
      return ` if (!${varName}) { return ${errorCode}; }`
    case 'IntNegative':
      return ` if (${varName} < 0) { return ${errorCode}; }`
    case 'IntNonzero':
      return ` if (${varName} != 0) { return ${errorCode}; }`
  }
}

// Index of the first top-level `,` inside the call parens `(open, close)`, or -1
function firstArgEnd(tokens: TokenList, open: number, close: number): number {
  let depth = 0
  for (let j = open + 1; j < close; j++) {
    switch (tokens.kind(j)) {
      case TokenKind.LParen:
      case TokenKind.LBracket:
      case TokenKind.LBrace:
        depth++
        break
      case TokenKind.RParen:
      case TokenKind.RBracket:
      case TokenKind.RBrace:
        depth--
        break
      case TokenKind.Comma:
        if (depth === 0) return j
        break
      default:
        break
    }
  }
  return -1
}

/**
 * `v = realloc(v, n);` loses the old block when realloc fails. Rewrite the
 * statement to go through a temporary:
 *
 *     { void *_safe_tmp = realloc(v, n); if (!_safe_tmp) return ENOMEM; v = _safe_tmp; }
 *
 * Applies only when `v` is the entire left side, the statement starts with
 * it (possibly as the unbraced body of `if (c)` or after a label), and the
 * first argument is exactly `v`. Returns whether a patch was added.
 */
export function strategyRewriteRealloc(
  tokens: TokenList,
  site: AllocationSite,
  patches: PatchList,
  config: SafetyConfig = DEFAULT_SAFETY_CONFIG,
): boolean {
  if (site.spec.name !== 'realloc' || site.varName === null || site.assignIndex < 0) {
    return false
  }

  const lvalue = lvalueBefore(tokens, site.assignIndex)
  if (lvalue === null || lvalue.text !== site.varName) return false
  if (
    statementStart(tokens, site.tokenIndex) !== lvalue.start &&
    !isNestedStatement(tokens, lvalue.start)
  ) {
    return false
  }

  const open = tokens.nextSignificant(site.tokenIndex + 1)
  if (tokens.kind(open) !== TokenKind.LParen) return false
  const close = tokens.matching(open)
  if (close < 0) return false
  const comma = firstArgEnd(tokens, open, close)
  if (comma < 0 || compactText(tokens, open + 1, comma) !== site.varName) return false

  const semi = statementEnd(tokens, site.tokenIndex)
  if (semi < 0 || tokens.nextSignificant(close + 1) !== semi) return false
  if (!patches.canReplace(lvalue.start, semi + 1)) return false

  const call = tokens.join(site.assignIndex + 1, semi).trim()
  patches.add(
    lvalue.start,
    semi + 1,
    `{ void *_safe_tmp = ${call}; if (!_safe_tmp) return ${config.errorCode}; ` +
      `${site.varName} = _safe_tmp; }`,
  )
  return true
}

/**
 * Insert a failure check after the statement of one unchecked site.
 * Skipped, returning false, for sites without an assigned variable and for
 * statements whose `;` is not at paren depth zero (a `for` header). When the
 * statement is an unbraced `if`/loop body the statement and its guard are
 * wrapped in braces, so the guard runs only with it.
 */
export function injectGuard(
  tokens: TokenList,
  site: AllocationSite,
  patches: PatchList,
  config: SafetyConfig = DEFAULT_SAFETY_CONFIG,
): boolean {
  if (site.varName === null) return false
  const semi = statementEnd(tokens, site.tokenIndex)
  if (semi < 0) return false
  const guard = guardText(site.spec.checkStyle, site.varName, config.errorCode)

  const lvalue = site.assignIndex < 0 ? null : lvalueBefore(tokens, site.assignIndex)
  if (lvalue !== null && isNestedStatement(tokens, lvalue.start)) {
    if (!patches.canReplace(lvalue.start, semi + 1)) return false
    patches.add(lvalue.start, semi + 1, `{ ${tokens.join(lvalue.start, semi + 1)}${guard} }`)
    return true
  }

  if (!patches.canInsert(semi + 1)) return false
  patches.insert(semi + 1, guard)
  return true
}

export interface SafetyOptions {
  config?: SafetyConfig
  logger?: Logger
}

/**
 * Add patches for every unchecked site: the realloc rewrite where it
 * applies, a generic guard otherwise. Returns the number of sites patched.
 */
export function strategyInjectSafetyChecks(
  tokens: TokenList,
  allocations: readonly AllocationSite[],
  patches: PatchList,
  options: SafetyOptions = {},
): Result<number> {
  return attempt(() => {
    if (!tokens || !allocations) {
      throw invalidArgument('strategyInjectSafetyChecks: tokens and allocations are required')
    }
    const config = options.config ?? DEFAULT_SAFETY_CONFIG
    let patched = 0
    for (const site of allocations) {
      if (site.isChecked) continue
      if (strategyRewriteRealloc(tokens, site, patches, config)) {
        options.logger?.debug(`rewrote self-assigning realloc of '${site.varName ?? ''}'`)
        patched++
      } else if (injectGuard(tokens, site, patches, config)) {
        patched++
      }
    }
    return patched
  })
}
