// Core Parser class with token helpers and state management.
// Methods are added to the prototype by other modules (types.ts, declarators.ts)

import { TokenKind } from '../lexer/token'
import type { TokenList } from '../lexer/token-list'
import { syntaxError } from '../errors'

/**
 * Cursor over the token range `[start, end)` of a TokenList.
 *
 * Trivia (whitespace, comments, directives) is invisible to the parser: the
 * cursor always rests on a significant token or on `end`.
 */
export class Parser {
  tokens: TokenList
  pos: number
  end: number
  // Name found by the declarator parse; null for abstract declarators
  declaredName: string | null

  constructor(tokens: TokenList, start: number, end: number) {
    this.tokens = tokens
    this.end = end
    this.declaredName = null
    this.pos = start
    this.skipTrivia()
  }

  // --- Token access helpers ---
  atEnd(): boolean {
    return this.pos >= this.end
  }

  peek(): TokenKind {
    return this.atEnd() ? TokenKind.Eof : this.tokens.kind(this.pos)
  }

  /** Kind of the significant token after the current one. */
  peekNext(): TokenKind {
    if (this.atEnd()) return TokenKind.Eof
    const j = this.tokens.nextSignificant(this.pos + 1, this.end)
    return j < 0 ? TokenKind.Eof : this.tokens.kind(j)
  }

  peekText(): string {
    return this.atEnd() ? '' : this.tokens.text(this.pos)
  }

  /** Consume the current token and return its index. */
  advance(): number {
    const idx = this.pos
    if (!this.atEnd()) {
      this.pos++
      this.skipTrivia()
    }
    return idx
  }

  expect(expected: TokenKind, what: string): number {
    if (this.peek() === expected) {
      return this.advance()
    }
    throw syntaxError(`expected '${what}' before '${this.describeCurrent()}'`, {
      tokenIndex: this.pos,
    })
  }

  /**
   * Consume a balanced `(...)`, `[...]` or `{...}` group starting at the
   * current token and return the index of its closing token.
   */
  skipGroup(): number {
    const open = this.pos
    const close = this.tokens.matching(open, this.end)
    if (close < 0) {
      throw syntaxError(`unbalanced '${this.peekText()}'`, { tokenIndex: open })
    }
    this.pos = close
    this.advance()
    return close
  }

  describeCurrent(): string {
    return this.atEnd() ? 'end of declaration' : this.peekText()
  }

  private skipTrivia(): void {
    while (this.pos < this.end && this.tokens.isTrivia(this.pos)) {
      this.pos++
    }
  }
}
