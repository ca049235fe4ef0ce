// Function body rewriting: safety checks, call-site propagation for
// refactored functions, and return-statement transforms, all collected in
// one patch list and applied together.

import { TokenKind } from '../lexer/token'
import type { TokenList } from '../lexer/token-list'
import type { AllocationSite } from '../analysis/allocations'
import {
  isDeclarationLead,
  isDeclaredName,
  lvalueBefore,
  statementEnd,
  statementStart,
} from '../analysis/boundaries'
import { attempt, invalidArgument, unwrap } from '../errors'
import type { Result } from '../errors'
import type { Logger } from '../utils/logger'
import type { FunctionLookup, RefactoredFunction } from '../refactor/context'
import { PatchList, applyPatches } from './patches'
import { strategyInjectSafetyChecks } from './strategies'
import type { SafetyConfig } from './strategies'

// ============================================================================
// Transforms
// ============================================================================

/**
 * What happens to the function's own return statements.
 * - None: left alone
 * - VoidToInt: `return;` becomes `return <success>;`
 * - RetPtrToArg: `return e;` stores `e` through the out parameter
 */
export type TransformKind = 'None' | 'VoidToInt' | 'RetPtrToArg'

export interface SignatureTransform {
  kind: TransformKind
  // Out parameter written by RetPtrToArg
  argName: string
  successCode: string
  errorCode: string
  // Original return type, used to declare `_safe_ret`
  returnType: string | null
}

export const NO_TRANSFORM: SignatureTransform = {
  kind: 'None',
  argName: 'out',
  successCode: '0',
  errorCode: 'ENOMEM',
  returnType: null,
}

export interface RewriteBodyOptions {
  // Defaults to the transform's error code
  safety?: SafetyConfig
  // Name of the status variable receiving refactored results
  statusVar?: string
  logger?: Logger
}

/** `T name`, spelled `T *name` when the type already ends in a star. */
export function declOf(type: string | null, name: string): string {
  const t = (type ?? 'void *').trim()
  return t.endsWith('*') ? `${t}${name}` : `${t} ${name}`
}

// ============================================================================
// Call sites
// ============================================================================

interface CallState {
  readonly tokens: TokenList
  readonly patches: PatchList
  readonly rc: string
  readonly logger: Logger | undefined
  tmpCount: number
  usedStatus: boolean
}

// Index of the `(` matching the `)` at `close`, or -1
function openingParen(tokens: TokenList, close: number): number {
  let depth = 0
  for (let j = close; j >= 0; j--) {
    const kind = tokens.kind(j)
    if (kind === TokenKind.RParen) {
      depth++
    } else if (kind === TokenKind.LParen) {
      depth--
      if (depth === 0) return j
    }
  }
  return -1
}

function closesControlHeader(tokens: TokenList, close: number): boolean {
  const open = openingParen(tokens, close)
  if (open < 0) return false
  switch (tokens.kind(tokens.prevSignificant(open - 1))) {
    case TokenKind.If:
    case TokenKind.While:
    case TokenKind.For:
    case TokenKind.Switch:
      return true
    default:
      return false
  }
}

// A call standing where a statement may begin
function startsStatement(tokens: TokenList, prev: number): boolean {
  if (prev < 0) return true
  switch (tokens.kind(prev)) {
    case TokenKind.Semicolon:
    case TokenKind.LBrace:
    case TokenKind.RBrace:
    case TokenKind.Directive:
    case TokenKind.Else:
    case TokenKind.Do:
    case TokenKind.Colon:
      return true
    case TokenKind.RParen:
      return closesControlHeader(tokens, prev)
    default:
      return false
  }
}

// Every significant token in `[start, end)` could belong to a declaration's specifiers
function isDeclarationPrefix(tokens: TokenList, start: number, end: number): boolean {
  let seen = false
  for (let j = start; j < end; j++) {
    if (tokens.isTrivia(j)) continue
    const kind = tokens.kind(j)
    if (!isDeclarationLead(kind) && kind !== TokenKind.Comma) return false
    seen = true
  }
  return seen
}

function outArgument(tokens: TokenList, open: number, close: number, target: string): string {
  return tokens.nextSignificant(open + 1, close) < 0 ? `&${target}` : `, &${target}`
}

function statusCheck(rc: string): string {
  return ` if (${rc} != 0) return ${rc};`
}

// `x = f(a);` and `T *x = f(a);`
function rewriteAssignment(
  state: CallState,
  fn: RefactoredFunction,
  name: number,
  open: number,
  close: number,
  assign: number,
): boolean {
  const { tokens, patches, rc } = state
  const lvalue = lvalueBefore(tokens, assign)
  if (lvalue === null) return false
  const semi = tokens.nextSignificant(close + 1)
  if (tokens.kind(semi) !== TokenKind.Semicolon || statementEnd(tokens, name) !== semi) {
    return false
  }

  const start = statementStart(tokens, name)
  const declaring = start < lvalue.start && isDeclarationPrefix(tokens, start, lvalue.start)
  const replaceFrom = declaring ? assign : lvalue.start
  if (!patches.canReplace(replaceFrom, assign + 1)) return false
  if (!patches.canInsert(close) || !patches.canInsert(semi + 1)) return false

  patches.add(replaceFrom, assign + 1, declaring ? `; ${rc} =` : `${rc} =`)
  patches.insert(close, outArgument(tokens, open, close, lvalue.text))
  patches.insert(semi + 1, statusCheck(rc))
  state.logger?.debug(`rewrote assignment from '${fn.name}' into '${lvalue.text}'`)
  return true
}

// `f(a);`
function rewriteStatement(
  state: CallState,
  fn: RefactoredFunction,
  name: number,
  open: number,
  close: number,
): boolean {
  const { tokens, patches, rc } = state
  const semi = tokens.nextSignificant(close + 1)
  if (tokens.kind(semi) !== TokenKind.Semicolon || statementEnd(tokens, name) !== semi) {
    return false
  }
  const start = statementStart(tokens, name)
  if (!patches.canInsert(name) || !patches.canInsert(start)) return false
  if (!patches.canInsert(close) || !patches.canInsert(semi + 1)) return false

  if (fn.type === 'PtrToIntOut') {
    const tmp = `_tmp_cdd_${state.tmpCount++}`
    patches.insert(start, `${declOf(fn.returnType, tmp)}; `)
    patches.insert(close, outArgument(tokens, open, close, tmp))
  }
  patches.insert(name, `${rc} = `)
  patches.insert(semi + 1, statusCheck(rc))
  state.logger?.debug(`rewrote call statement '${fn.name}'`)
  return true
}

// Any other position: hoist the call in front of its statement
function hoistCall(
  state: CallState,
  fn: RefactoredFunction,
  name: number,
  open: number,
  close: number,
): boolean {
  const { tokens, patches, rc } = state
  const start = statementStart(tokens, name)
  if (!patches.canInsert(start) || !patches.canReplace(name, close + 1)) return false

  const tmp = `_tmp_cdd_${state.tmpCount++}`
  const args = tokens.join(open + 1, close).trim()
  const sep = args === '' ? '' : ', '
  patches.insert(
    start,
    `${declOf(fn.returnType, tmp)}; ${rc} = ${fn.name}(${args}${sep}&${tmp});` +
      `${statusCheck(rc)} `,
  )
  patches.add(name, close + 1, tmp)
  state.logger?.debug(`hoisted nested call to '${fn.name}' into '${tmp}'`)
  return true
}

function rewriteCalls(state: CallState, funcs: FunctionLookup): void {
  const { tokens, patches } = state
  for (let i = 0; i < tokens.length; i++) {
    if (tokens.kind(i) !== TokenKind.Identifier) continue
    const fn = funcs.find(tokens.text(i))
    if (fn === null) continue
    const open = tokens.nextSignificant(i + 1)
    if (tokens.kind(open) !== TokenKind.LParen) continue
    if (isDeclaredName(tokens, i)) continue
    const prev = tokens.prevSignificant(i - 1)
    const prevKind = tokens.kind(prev)
    if (prevKind === TokenKind.Dot || prevKind === TokenKind.Arrow) continue
    const close = tokens.matching(open)
    if (close < 0) continue

    // Arguments are never rewritten, so nested refactored calls stay as they are
    const claimed = i
    i = close
    if (!patches.canReplace(claimed, close + 1)) continue

    let done = false
    if (prevKind === TokenKind.Assign) {
      if (fn.type !== 'PtrToIntOut') continue
      done =
        rewriteAssignment(state, fn, claimed, open, close, prev) ||
        hoistCall(state, fn, claimed, open, close)
    } else if (startsStatement(tokens, prev)) {
      done = rewriteStatement(state, fn, claimed, open, close)
    } else if (fn.type === 'PtrToIntOut') {
      done = hoistCall(state, fn, claimed, open, close)
    }
    if (done) state.usedStatus = true
  }
}

function declaresStatus(tokens: TokenList, rc: string): boolean {
  for (let i = 0; i < tokens.length; i++) {
    if (tokens.kind(i) !== TokenKind.Identifier || !tokens.textEquals(i, rc)) continue
    if (tokens.kind(tokens.prevSignificant(i - 1)) === TokenKind.Int) return true
  }
  return false
}

// ============================================================================
// Return statements
// ============================================================================

function lastIndexOf(tokens: TokenList, kind: TokenKind): number {
  for (let i = tokens.length - 1; i >= 0; i--) {
    if (tokens.kind(i) === kind) return i
  }
  return -1
}

function transformVoidReturns(
  tokens: TokenList,
  patches: PatchList,
  transform: SignatureTransform,
): void {
  for (let i = 0; i < tokens.length; i++) {
    if (tokens.kind(i) !== TokenKind.Return) continue
    const semi = tokens.nextSignificant(i + 1)
    if (tokens.kind(semi) !== TokenKind.Semicolon) continue
    if (patches.canReplace(i, semi)) {
      patches.add(i, semi, `return ${transform.successCode}`)
    }
  }

  const closeBrace = lastIndexOf(tokens, TokenKind.RBrace)
  if (closeBrace < 0) return
  const last = tokens.prevSignificant(closeBrace - 1)
  if (tokens.kind(last) === TokenKind.Semicolon) {
    const first = statementStart(tokens, last)
    if (tokens.kind(first) === TokenKind.Return) return
  }
  const at = last < 0 ? closeBrace : last + 1
  if (patches.canInsert(at)) {
    patches.insert(at, ` return ${transform.successCode};`)
  }
}

function transformPointerReturns(
  tokens: TokenList,
  allocations: readonly AllocationSite[],
  patches: PatchList,
  transform: SignatureTransform,
): void {
  const { argName, successCode, errorCode } = transform
  for (let i = 0; i < tokens.length; i++) {
    if (tokens.kind(i) !== TokenKind.Return) continue
    const semi = statementEnd(tokens, i)
    if (semi < 0 || tokens.nextSignificant(i + 1, semi) < 0) continue

    const allocates = allocations.some((site) => site.tokenIndex > i && site.tokenIndex < semi)
    if (allocates && patches.canReplace(i, semi + 1)) {
      const expr = tokens.join(i + 1, semi).trim()
      patches.add(
        i,
        semi + 1,
        `{ ${declOf(transform.returnType, '_safe_ret')} = ${expr}; ` +
          `if (!_safe_ret) return ${errorCode}; *${argName} = _safe_ret; ` +
          `return ${successCode}; }`,
      )
    } else if (patches.canReplace(i, i + 1) && patches.canInsert(semi + 1)) {
      patches.add(i, i + 1, `*${argName} =`)
      patches.insert(semi + 1, ` return ${successCode};`)
    }
    i = semi
  }
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Rewrite the function body in `tokens`.
 *
 * Runs, in order: safety checks for unchecked `allocations`, call-site
 * rewriting for every function in `funcs`, and the return transform. The
 * status variable is declared after the first `{` when a call was rewritten
 * and the body does not already declare it.
 */
export function rewriteBody(
  tokens: TokenList,
  allocations: readonly AllocationSite[],
  funcs: FunctionLookup | null,
  transform: SignatureTransform = NO_TRANSFORM,
  options: RewriteBodyOptions = {},
): Result<string> {
  return attempt(() => {
    if (!tokens || !allocations || !transform) {
      throw invalidArgument('rewriteBody: tokens, allocations and transform are required')
    }
    const patches = new PatchList()
    const safety = options.safety ?? { errorCode: transform.errorCode }
    unwrap(
      strategyInjectSafetyChecks(tokens, allocations, patches, {
        config: safety,
        logger: options.logger,
      }),
    )

    const state: CallState = {
      tokens,
      patches,
      rc: options.statusVar ?? 'rc',
      logger: options.logger,
      tmpCount: 0,
      usedStatus: false,
    }
    if (funcs !== null) {
      rewriteCalls(state, funcs)
    }

    if (state.usedStatus && !declaresStatus(tokens, state.rc)) {
      const brace = tokens.findNext(TokenKind.LBrace, 0)
      if (brace >= 0 && patches.canInsert(brace + 1)) {
        patches.insert(brace + 1, ` int ${state.rc} = 0;`)
      }
    }

    if (transform.kind === 'VoidToInt') {
      transformVoidReturns(tokens, patches, transform)
    } else if (transform.kind === 'RetPtrToArg') {
      transformPointerReturns(tokens, allocations, patches, transform)
    }

    return unwrap(applyPatches(tokens, patches))
  })
}
