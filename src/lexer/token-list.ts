import { TokenKind, isTriviaKind } from './token'
import type { Token } from './token'

function closerFor(kind: TokenKind): TokenKind | null {
  switch (kind) {
    case TokenKind.LParen:
      return TokenKind.RParen
    case TokenKind.LBracket:
      return TokenKind.RBracket
    case TokenKind.LBrace:
      return TokenKind.RBrace
    default:
      return null
  }
}

/**
 * The source text together with its ordered tokens.
 *
 * Token indices are stable for the lifetime of the list. Every range argument
 * is half-open, `[start, end)`, over token indices. Out-of-range reads never
 * throw: `kind()` answers `Eof` and `text()` answers the empty string.
 */
export class TokenList {
  readonly source: string
  readonly tokens: readonly Token[]

  constructor(source: string, tokens: readonly Token[]) {
    this.source = source
    this.tokens = tokens
  }

  get length(): number {
    return this.tokens.length
  }

  at(i: number): Token | undefined {
    return i >= 0 && i < this.tokens.length ? this.tokens[i] : undefined
  }

  kind(i: number): TokenKind {
    const tok = this.at(i)
    return tok === undefined ? TokenKind.Eof : tok.kind
  }

  text(i: number): string {
    const tok = this.at(i)
    return tok === undefined ? '' : this.source.slice(tok.start, tok.end)
  }

  textEquals(i: number, s: string): boolean {
    const tok = this.at(i)
    if (tok === undefined || tok.end - tok.start !== s.length) return false
    return this.source.startsWith(s, tok.start)
  }

  /** Source text spanned by tokens `[start, end)`, including any trivia between them. */
  join(start: number, end: number): string {
    const lo = Math.max(0, start)
    const hi = Math.min(this.tokens.length, end)
    if (lo >= hi) return ''
    return this.source.slice(this.tokens[lo].start, this.tokens[hi - 1].end)
  }

  toString(): string {
    return this.join(0, this.tokens.length)
  }

  isTrivia(i: number): boolean {
    return isTriviaKind(this.kind(i))
  }

  /** First non-trivia index in `[i, limit)`, or -1. */
  nextSignificant(i: number, limit: number = this.tokens.length): number {
    const hi = Math.min(limit, this.tokens.length)
    for (let j = Math.max(0, i); j < hi; j++) {
      if (!isTriviaKind(this.tokens[j].kind)) return j
    }
    return -1
  }

  /** Last non-trivia index in `[floor, i]`, or -1. */
  prevSignificant(i: number, floor: number = 0): number {
    const lo = Math.max(0, floor)
    for (let j = Math.min(i, this.tokens.length - 1); j >= lo; j--) {
      if (!isTriviaKind(this.tokens[j].kind)) return j
    }
    return -1
  }

  /** First index in `[from, limit)` whose kind is `kind`, or -1. */
  findNext(kind: TokenKind, from: number, limit: number = this.tokens.length): number {
    const hi = Math.min(limit, this.tokens.length)
    for (let j = Math.max(0, from); j < hi; j++) {
      if (this.tokens[j].kind === kind) return j
    }
    return -1
  }

  /**
   * Index of the bracket closing the one at `open`, or -1 when `open` is not
   * an opening bracket or the group is unbalanced before `limit`. Only
   * brackets of the same kind are counted.
   */
  matching(open: number, limit: number = this.tokens.length): number {
    const openKind = this.kind(open)
    const closeKind = closerFor(openKind)
    if (closeKind === null) return -1
    const hi = Math.min(limit, this.tokens.length)
    let depth = 0
    for (let j = open; j < hi; j++) {
      const k = this.tokens[j].kind
      if (k === openKind) {
        depth++
      } else if (k === closeKind) {
        depth--
        if (depth === 0) return j
      }
    }
    return -1
  }

  /**
   * A view over tokens `[start, end)`. The view shares the source string and
   * keeps absolute character offsets, so text read through it is identical.
   */
  slice(start: number, end: number): TokenList {
    return new TokenList(this.source, this.tokens.slice(start, end))
  }
}
