// Statement-boundary heuristics over a token stream.
//
// There is no statement grammar here: boundaries are found positionally by
// looking for `;`, `{` and `}` and by tracking bracket depth. Every helper
// answers -1 (or null) when the shape it looks for is not there.

import { TokenKind, isKeywordKind } from '../lexer/token'
import type { TokenList } from '../lexer/token-list'

export function isStatementBoundary(kind: TokenKind): boolean {
  return (
    kind === TokenKind.Semicolon ||
    kind === TokenKind.LBrace ||
    kind === TokenKind.RBrace ||
    kind === TokenKind.Directive
  )
}

/**
 * Index of the first significant token of the statement containing `i`:
 * the token after the nearest preceding `;`, `{`, `}` or directive.
 */
export function statementStart(tokens: TokenList, i: number, floor: number = 0): number {
  let j = i - 1
  while (j >= floor && !isStatementBoundary(tokens.kind(j))) {
    j--
  }
  const first = tokens.nextSignificant(j + 1, i + 1)
  return first < 0 ? i : first
}

/**
 * True when `i` sits inside the parenthesized header of a `for`, where `;`
 * separates clauses rather than statements.
 */
export function isInsideForHeader(tokens: TokenList, i: number, floor: number = 0): boolean {
  let depth = 0
  for (let j = i - 1; j >= floor; j--) {
    const kind = tokens.kind(j)
    if (kind === TokenKind.RParen) {
      depth++
    } else if (kind === TokenKind.LParen) {
      if (depth > 0) {
        depth--
        continue
      }
      if (tokens.kind(tokens.prevSignificant(j - 1, floor)) === TokenKind.For) return true
    } else if (kind !== TokenKind.Semicolon && isStatementBoundary(kind)) {
      return false
    }
  }
  return false
}

/**
 * Index of the `;` terminating the statement that contains `i`, counting
 * parentheses and brackets from `i` onward. Answers -1 inside a `for`
 * header, when the statement closes a parenthesis it did not open (a call
 * argument) or when it reaches a brace before its `;`.
 */
export function statementEnd(tokens: TokenList, i: number, limit: number = tokens.length): number {
  let depth = 0
  const hi = Math.min(limit, tokens.length)
  for (let j = i; j < hi; j++) {
    switch (tokens.kind(j)) {
      case TokenKind.LParen:
      case TokenKind.LBracket:
        depth++
        break
      case TokenKind.RParen:
      case TokenKind.RBracket:
        if (depth === 0) return -1
        depth--
        break
      case TokenKind.Semicolon:
        if (depth === 0) return isInsideForHeader(tokens, i) ? -1 : j
        break
      case TokenKind.LBrace:
      case TokenKind.RBrace:
        if (depth === 0) return -1
        break
      default:
        break
    }
  }
  return -1
}

// Index of the `(` matching the `)` at `close`, or -1
function openingParen(tokens: TokenList, close: number, floor: number): number {
  let depth = 0
  for (let j = close; j >= floor; j--) {
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

/**
 * True when the statement beginning at `start` is the unbraced body of an
 * `if`, `else`, `while`, `for` or `do`, or follows a label, so that it is
 * only one part of a larger statement.
 */
export function isNestedStatement(tokens: TokenList, start: number, floor: number = 0): boolean {
  const prev = tokens.prevSignificant(start - 1, floor)
  switch (tokens.kind(prev)) {
    case TokenKind.Else:
    case TokenKind.Do:
      return true
    case TokenKind.RParen: {
      const open = openingParen(tokens, prev, floor)
      if (open < 0) return false
      const head = tokens.kind(tokens.prevSignificant(open - 1, floor))
      return head === TokenKind.If || head === TokenKind.While || head === TokenKind.For
    }
    case TokenKind.Colon: {
      // `label:`, `case X:` and `default:`; a `?:` operand has no boundary before it
      const first = statementStart(tokens, prev, floor)
      const firstKind = tokens.kind(first)
      if (firstKind === TokenKind.Case || firstKind === TokenKind.Default) return true
      return firstKind === TokenKind.Identifier && tokens.nextSignificant(first + 1) === prev
    }
    default:
      return false
  }
}

/**
 * True when `i` sits inside the parenthesized condition of an `if` or
 * `while`. Walks back through every unmatched `(`, so
 * `if ((p = malloc(n)) == NULL)` is found through the inner group.
 */
export function isInsideCondition(tokens: TokenList, i: number, floor: number = 0): boolean {
  let depth = 0
  for (let j = i - 1; j >= floor; j--) {
    const kind = tokens.kind(j)
    if (kind === TokenKind.RParen) {
      depth++
    } else if (kind === TokenKind.LParen) {
      if (depth > 0) {
        depth--
        continue
      }
      const prev = tokens.prevSignificant(j - 1, floor)
      const prevKind = tokens.kind(prev)
      if (prevKind === TokenKind.If || prevKind === TokenKind.While) {
        return true
      }
    } else if (isStatementBoundary(kind)) {
      return false
    }
  }
  return false
}

/**
 * True when `i` sits inside the argument list of a call that opens after
 * `from`: an unmatched `(` preceded by a name or a `)`. Casts and plain
 * grouping parentheses do not count.
 */
export function isCallArgument(tokens: TokenList, from: number, i: number): boolean {
  let depth = 0
  for (let j = i - 1; j > from; j--) {
    const kind = tokens.kind(j)
    if (kind === TokenKind.RParen) {
      depth++
    } else if (kind === TokenKind.LParen) {
      if (depth > 0) {
        depth--
        continue
      }
      const before = tokens.kind(tokens.prevSignificant(j - 1, from + 1))
      if (before === TokenKind.Identifier || before === TokenKind.RParen) return true
    }
  }
  return false
}

/** Index of the `=` in the current statement before `i`, or -1. */
export function assignmentBefore(tokens: TokenList, i: number, floor: number = 0): number {
  for (let j = i - 1; j >= floor; j--) {
    const kind = tokens.kind(j)
    if (kind === TokenKind.Assign) return j
    if (isStatementBoundary(kind)) return -1
  }
  return -1
}

/** Significant token texts in `[start, end)` with the trivia dropped. */
export function compactText(tokens: TokenList, start: number, end: number): string {
  let out = ''
  for (let j = start; j < end; j++) {
    if (!tokens.isTrivia(j)) out += tokens.text(j)
  }
  return out
}

export interface Lvalue {
  // First token of the lvalue (the unary `*` when there is one)
  start: number
  // Index of its last token, directly before the `=`
  last: number
  // Compact spelling: `p`, `ctx->buf`, `s.data`, `*out`
  text: string
}

// A `*` is a dereference rather than part of a declarator when nothing that
// could be a type or operand precedes it.
function isUnaryStarAt(tokens: TokenList, star: number, floor: number): boolean {
  const before = tokens.prevSignificant(star - 1, floor)
  if (before < 0) return true
  switch (tokens.kind(before)) {
    case TokenKind.Semicolon:
    case TokenKind.LBrace:
    case TokenKind.RBrace:
    case TokenKind.LParen:
    case TokenKind.Comma:
    case TokenKind.Directive:
      return true
    default:
      return false
  }
}

/**
 * The assignment target ending right before the `=` at `assign`: a plain
 * identifier, a member chain (`a.b->c`) or a dereferenced identifier
 * (`*out`). Subscripts, casts and calls yield null.
 */
export function lvalueBefore(tokens: TokenList, assign: number, floor: number = 0): Lvalue | null {
  const last = tokens.prevSignificant(assign - 1, floor)
  if (last < 0 || tokens.kind(last) !== TokenKind.Identifier) return null

  let start = last
  for (;;) {
    const op = tokens.prevSignificant(start - 1, floor)
    const opKind = tokens.kind(op)
    if (opKind !== TokenKind.Dot && opKind !== TokenKind.Arrow) break
    const owner = tokens.prevSignificant(op - 1, floor)
    if (tokens.kind(owner) !== TokenKind.Identifier) return null
    start = owner
  }

  const star = tokens.prevSignificant(start - 1, floor)
  if (tokens.kind(star) === TokenKind.Star && isUnaryStarAt(tokens, star, floor)) {
    start = star
  }

  return { start, last, text: compactText(tokens, start, last + 1) }
}

/**
 * When the significant tokens starting at `i` spell `text` exactly, the
 * index of the last of them; otherwise -1. A match that continues a member
 * chain (`q->p` when looking for `p`) does not count.
 */
export function matchTextAt(
  tokens: TokenList,
  i: number,
  text: string,
  limit: number = tokens.length,
): number {
  const before = tokens.kind(tokens.prevSignificant(i - 1))
  if (before === TokenKind.Dot || before === TokenKind.Arrow) return -1

  let acc = ''
  let j = i
  while (j >= 0 && j < limit) {
    const piece = tokens.text(j)
    if (!text.startsWith(piece, acc.length)) return -1
    acc += piece
    if (acc.length === text.length) return j
    j = tokens.nextSignificant(j + 1, limit)
  }
  return -1
}

// Keywords that start or continue a statement rather than a declaration
function isStatementKeyword(kind: TokenKind): boolean {
  switch (kind) {
    case TokenKind.Return:
    case TokenKind.Sizeof:
    case TokenKind.Else:
    case TokenKind.Do:
    case TokenKind.Case:
    case TokenKind.Default:
    case TokenKind.Goto:
    case TokenKind.If:
    case TokenKind.While:
    case TokenKind.For:
    case TokenKind.Switch:
      return true
    default:
      return false
  }
}

// Specifiers and declarator punctuation that may precede a declared name
export function isDeclarationLead(kind: TokenKind): boolean {
  return (
    kind === TokenKind.Identifier ||
    kind === TokenKind.Star ||
    (isKeywordKind(kind) && !isStatementKeyword(kind))
  )
}

/**
 * True when the name at `i` is being declared (`void *malloc(size_t);`)
 * rather than called: everything from the statement start up to it is
 * specifiers and stars.
 */
export function isDeclaredName(tokens: TokenList, i: number): boolean {
  let sawLead = false
  for (let j = i - 1; j >= 0; j--) {
    const kind = tokens.kind(j)
    if (isStatementBoundary(kind)) break
    if (tokens.isTrivia(j)) continue
    if (!isDeclarationLead(kind)) return false
    sawLead = true
  }
  return sawLead
}
