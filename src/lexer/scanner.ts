import { TokenKind, keywordFromString } from './token'
import type { Token } from './token'
import { TokenList } from './token-list'
import { attempt, invalidArgument } from '../errors'
import type { Result } from '../errors'

// Character code constants
const CH_0 = 0x30 // '0'
const CH_8 = 0x38 // '8'
const CH_9 = 0x39 // '9'
const CH_A = 0x41 // 'A'
const CH_E = 0x45
const CH_F = 0x46
const CH_L = 0x4c
const CH_P = 0x50
const CH_U = 0x55
const CH_a = 0x61 // 'a'
const CH_e = 0x65
const CH_f = 0x66
const CH_p = 0x70
const CH_u = 0x75
const CH_DQUOTE = 0x22 // '"'
const CH_SQUOTE = 0x27 // "'"
const CH_BSLASH = 0x5c // '\'
const CH_UNDERSCORE = 0x5f // '_'
const CH_DOLLAR = 0x24 // '$'
const CH_DOT = 0x2e // '.'
const CH_HASH = 0x23 // '#'
const CH_SLASH = 0x2f // '/'
const CH_STAR = 0x2a // '*'
const CH_NEWLINE = 0x0a // '\n'
const CH_CR = 0x0d // '\r'
const CH_SPACE = 0x20 // ' '
const CH_TAB = 0x09
const CH_PLUS = 0x2b
const CH_MINUS = 0x2d
const CH_LPAREN = 0x28
const CH_RPAREN = 0x29
const CH_LBRACE = 0x7b
const CH_RBRACE = 0x7d
const CH_LBRACKET = 0x5b
const CH_RBRACKET = 0x5d
const CH_SEMICOLON = 0x3b
const CH_COMMA = 0x2c
const CH_TILDE = 0x7e
const CH_QUESTION = 0x3f
const CH_COLON = 0x3a
const CH_PERCENT = 0x25
const CH_AMP = 0x26
const CH_PIPE = 0x7c
const CH_CARET = 0x5e
const CH_BANG = 0x21
const CH_EQUAL = 0x3d
const CH_LESS = 0x3c
const CH_GREATER = 0x3e

function isDigit(c: number): boolean {
  return c >= CH_0 && c <= CH_9
}

function isHexDigit(c: number): boolean {
  return (c >= CH_0 && c <= CH_9) || (c >= CH_a && c <= CH_f) || (c >= CH_A && c <= CH_F)
}

function isAlpha(c: number): boolean {
  return (c >= CH_a && c <= 0x7a) || (c >= CH_A && c <= 0x5a)
}

function isAlphanumeric(c: number): boolean {
  return isAlpha(c) || isDigit(c)
}

function isIdentStart(c: number): boolean {
  return c === CH_UNDERSCORE || c === CH_DOLLAR || isAlpha(c)
}

function isIdentContinue(c: number): boolean {
  return c === CH_UNDERSCORE || c === CH_DOLLAR || isAlphanumeric(c)
}

function isWhitespace(c: number): boolean {
  return c === CH_SPACE || c === CH_TAB || c === CH_NEWLINE || c === CH_CR || c === 0x0c || c === 0x0b
}

export interface ScanOptions {
  /** Treat bare `typeof` and `asm` as keywords (default true). */
  gnuExtensions?: boolean
}

/**
 * Lossless C lexer.
 * Every character of the input belongs to exactly one token, so joining the
 * token spans in order reproduces the source. Operates on the source string
 * via charCodeAt() for performance.
 */
export class Scanner {
  private src: string
  private len: number
  private pos: number
  private gnuExtensions: boolean
  // True while only spaces, tabs and comments have been seen on the current line
  private atLineStart: boolean

  constructor(source: string, gnuExtensions: boolean = true) {
    this.src = source
    this.len = source.length
    this.pos = 0
    this.gnuExtensions = gnuExtensions
    this.atLineStart = true
  }

  /**
   * Eagerly scan the entire source and return all tokens. No Eof token is
   * appended: the list ends with the token covering the last character.
   */
  scan(): Token[] {
    const tokens: Token[] = []
    while (this.pos < this.len) {
      tokens.push(this.nextToken())
    }
    return tokens
  }

  private ch(): number {
    return this.src.charCodeAt(this.pos)
  }

  private chAt(i: number): number {
    return this.src.charCodeAt(i)
  }

  private nextToken(): Token {
    const start = this.pos
    const c = this.ch()

    if (isWhitespace(c)) {
      return this.lexWhitespace(start)
    }

    if (c === CH_SLASH && this.pos + 1 < this.len) {
      const next = this.chAt(this.pos + 1)
      if (next === CH_SLASH) return this.lexLineComment(start)
      if (next === CH_STAR) return this.lexBlockComment(start)
    }

    if (c === CH_HASH && this.atLineStart) {
      return this.lexDirective(start)
    }

    this.atLineStart = false

    // Number literals
    if (
      isDigit(c) ||
      (c === CH_DOT && this.pos + 1 < this.len && isDigit(this.chAt(this.pos + 1)))
    ) {
      return this.lexNumber(start)
    }

    // String literals
    if (c === CH_DQUOTE) {
      return this.lexQuoted(start, CH_DQUOTE, TokenKind.StringLiteral)
    }

    // Character literals
    if (c === CH_SQUOTE) {
      return this.lexQuoted(start, CH_SQUOTE, TokenKind.CharLiteral)
    }

    // Identifiers and keywords
    if (isIdentStart(c)) {
      return this.lexIdentifier(start)
    }

    // Punctuation and operators
    return this.lexPunctuation(start)
  }

  // --- Trivia ---
  private lexWhitespace(start: number): Token {
    while (this.pos < this.len && isWhitespace(this.ch())) {
      if (this.ch() === CH_NEWLINE) {
        this.atLineStart = true
      }
      this.pos++
    }
    return { kind: TokenKind.Whitespace, start, end: this.pos }
  }

  // The terminating newline is left for the following whitespace token.
  private lexLineComment(start: number): Token {
    this.pos += 2
    while (this.pos < this.len && this.ch() !== CH_NEWLINE) {
      this.pos++
    }
    return { kind: TokenKind.Comment, start, end: this.pos }
  }

  // An unterminated block comment runs to the end of the input.
  private lexBlockComment(start: number): Token {
    this.pos += 2
    while (this.pos < this.len) {
      if (this.ch() === CH_STAR && this.pos + 1 < this.len && this.chAt(this.pos + 1) === CH_SLASH) {
        this.pos += 2
        return { kind: TokenKind.Comment, start, end: this.pos }
      }
      if (this.ch() === CH_NEWLINE) {
        this.atLineStart = true
      }
      this.pos++
    }
    return { kind: TokenKind.Comment, start, end: this.pos }
  }

  /**
   * A preprocessor line: from `#` to the end of the line, following
   * backslash-newline continuations. The final newline is not included.
   */
  private lexDirective(start: number): Token {
    this.pos++
    while (this.pos < this.len) {
      const c = this.ch()
      if (c === CH_NEWLINE) break
      if (c === CH_BSLASH) {
        if (this.pos + 1 < this.len && this.chAt(this.pos + 1) === CH_NEWLINE) {
          this.pos += 2
          continue
        }
        if (
          this.pos + 2 < this.len &&
          this.chAt(this.pos + 1) === CH_CR &&
          this.chAt(this.pos + 2) === CH_NEWLINE
        ) {
          this.pos += 3
          continue
        }
      }
      this.pos++
    }
    // A trailing CR belongs to the line ending, not the directive
    const end = this.pos > start + 1 && this.chAt(this.pos - 1) === CH_CR ? this.pos - 1 : this.pos
    this.pos = end
    this.atLineStart = false
    return { kind: TokenKind.Directive, start, end }
  }

  // --- Number lexing ---

  /**
   * Numbers are lexed as preprocessing numbers: a digit (or `.digit`)
   * followed by identifier characters, dots, signed exponents and C23
   * digit separators. This covers decimal, octal, hex and binary integers,
   * decimal and hex floats and every suffix without validating them.
   */
  private lexNumber(start: number): Token {
    this.pos++
    while (this.pos < this.len) {
      const c = this.ch()
      if (c === CH_PLUS || c === CH_MINUS) {
        const prev = this.chAt(this.pos - 1)
        if (prev === CH_e || prev === CH_E || prev === CH_p || prev === CH_P) {
          this.pos++
          continue
        }
        break
      }
      if (c === CH_SQUOTE) {
        const next = this.pos + 1 < this.len ? this.chAt(this.pos + 1) : 0
        if (isAlphanumeric(this.chAt(this.pos - 1)) && isHexDigit(next)) {
          this.pos++
          continue
        }
        break
      }
      if (c === CH_DOT) {
        // `1...` is `1` followed by an ellipsis
        if (
          this.pos + 2 < this.len &&
          this.chAt(this.pos + 1) === CH_DOT &&
          this.chAt(this.pos + 2) === CH_DOT
        ) {
          break
        }
        this.pos++
        continue
      }
      if (isIdentContinue(c)) {
        this.pos++
        continue
      }
      break
    }
    return { kind: TokenKind.NumberLiteral, start, end: this.pos }
  }

  // --- String and character lexing ---

  /**
   * Scan a quoted literal starting at the opening quote. Escapes are skipped
   * as pairs so `\"` never terminates. An unterminated literal stops before
   * the end of the line.
   */
  private lexQuoted(start: number, quote: number, kind: TokenKind): Token {
    this.pos++ // skip opening quote
    while (this.pos < this.len) {
      const c = this.ch()
      if (c === quote) {
        this.pos++
        break
      }
      if (c === CH_NEWLINE) {
        break
      }
      if (c === CH_BSLASH && this.pos + 1 < this.len) {
        this.pos += 2
        continue
      }
      this.pos++
    }
    return { kind, start, end: this.pos }
  }

  // --- Identifier lexing ---
  private lexIdentifier(start: number): Token {
    while (this.pos < this.len && isIdentContinue(this.ch())) {
      this.pos++
    }

    // Check for wide/unicode char/string prefixes: L'x', L"...", u'x', u"...", U'x', U"...", u8"..."
    if (this.pos < this.len) {
      const textLen = this.pos - start
      const next = this.ch()
      if (next === CH_SQUOTE || next === CH_DQUOTE) {
        let isWidePrefix = false
        if (textLen === 1) {
          const prefix = this.chAt(start)
          isWidePrefix = prefix === CH_L || prefix === CH_u || prefix === CH_U
        } else if (textLen === 2) {
          isWidePrefix = this.chAt(start) === CH_u && this.chAt(start + 1) === CH_8
        }
        if (isWidePrefix) {
          return next === CH_SQUOTE
            ? this.lexQuoted(start, CH_SQUOTE, TokenKind.CharLiteral)
            : this.lexQuoted(start, CH_DQUOTE, TokenKind.StringLiteral)
        }
      }
    }

    const text = this.src.substring(start, this.pos)
    const kw = keywordFromString(text, this.gnuExtensions)
    if (kw !== undefined) {
      return { kind: kw, start, end: this.pos }
    }
    return { kind: TokenKind.Identifier, start, end: this.pos }
  }

  // --- Punctuation and operators ---
  private lexPunctuation(start: number): Token {
    const c = this.ch()
    this.pos++

    switch (c) {
      case CH_LPAREN:
        return { kind: TokenKind.LParen, start, end: this.pos }
      case CH_RPAREN:
        return { kind: TokenKind.RParen, start, end: this.pos }
      case CH_LBRACE:
        return { kind: TokenKind.LBrace, start, end: this.pos }
      case CH_RBRACE:
        return { kind: TokenKind.RBrace, start, end: this.pos }
      case CH_LBRACKET:
        return { kind: TokenKind.LBracket, start, end: this.pos }
      case CH_RBRACKET:
        return { kind: TokenKind.RBracket, start, end: this.pos }
      case CH_SEMICOLON:
        return { kind: TokenKind.Semicolon, start, end: this.pos }
      case CH_COMMA:
        return { kind: TokenKind.Comma, start, end: this.pos }
      case CH_TILDE:
        return { kind: TokenKind.Tilde, start, end: this.pos }
      case CH_QUESTION:
        return { kind: TokenKind.Question, start, end: this.pos }
      case CH_COLON:
        return { kind: TokenKind.Colon, start, end: this.pos }
      case CH_HASH:
        if (this.pos < this.len && this.ch() === CH_HASH) {
          this.pos++
          return { kind: TokenKind.HashHash, start, end: this.pos }
        }
        return { kind: TokenKind.Hash, start, end: this.pos }
      case CH_DOT:
        if (this.pos + 1 < this.len && this.ch() === CH_DOT && this.chAt(this.pos + 1) === CH_DOT) {
          this.pos += 2
          return { kind: TokenKind.Ellipsis, start, end: this.pos }
        }
        return { kind: TokenKind.Dot, start, end: this.pos }
      case CH_PLUS:
        if (this.pos < this.len) {
          if (this.ch() === CH_PLUS) {
            this.pos++
            return { kind: TokenKind.PlusPlus, start, end: this.pos }
          }
          if (this.ch() === CH_EQUAL) {
            this.pos++
            return { kind: TokenKind.PlusAssign, start, end: this.pos }
          }
        }
        return { kind: TokenKind.Plus, start, end: this.pos }
      case CH_MINUS:
        if (this.pos < this.len) {
          if (this.ch() === CH_MINUS) {
            this.pos++
            return { kind: TokenKind.MinusMinus, start, end: this.pos }
          }
          if (this.ch() === CH_EQUAL) {
            this.pos++
            return { kind: TokenKind.MinusAssign, start, end: this.pos }
          }
          if (this.ch() === CH_GREATER) {
            this.pos++
            return { kind: TokenKind.Arrow, start, end: this.pos }
          }
        }
        return { kind: TokenKind.Minus, start, end: this.pos }
      case CH_STAR:
        if (this.pos < this.len && this.ch() === CH_EQUAL) {
          this.pos++
          return { kind: TokenKind.StarAssign, start, end: this.pos }
        }
        return { kind: TokenKind.Star, start, end: this.pos }
      case CH_SLASH:
        if (this.pos < this.len && this.ch() === CH_EQUAL) {
          this.pos++
          return { kind: TokenKind.SlashAssign, start, end: this.pos }
        }
        return { kind: TokenKind.Slash, start, end: this.pos }
      case CH_PERCENT:
        if (this.pos < this.len && this.ch() === CH_EQUAL) {
          this.pos++
          return { kind: TokenKind.PercentAssign, start, end: this.pos }
        }
        return { kind: TokenKind.Percent, start, end: this.pos }
      case CH_AMP:
        if (this.pos < this.len) {
          if (this.ch() === CH_AMP) {
            this.pos++
            return { kind: TokenKind.AmpAmp, start, end: this.pos }
          }
          if (this.ch() === CH_EQUAL) {
            this.pos++
            return { kind: TokenKind.AmpAssign, start, end: this.pos }
          }
        }
        return { kind: TokenKind.Amp, start, end: this.pos }
      case CH_PIPE:
        if (this.pos < this.len) {
          if (this.ch() === CH_PIPE) {
            this.pos++
            return { kind: TokenKind.PipePipe, start, end: this.pos }
          }
          if (this.ch() === CH_EQUAL) {
            this.pos++
            return { kind: TokenKind.PipeAssign, start, end: this.pos }
          }
        }
        return { kind: TokenKind.Pipe, start, end: this.pos }
      case CH_CARET:
        if (this.pos < this.len && this.ch() === CH_EQUAL) {
          this.pos++
          return { kind: TokenKind.CaretAssign, start, end: this.pos }
        }
        return { kind: TokenKind.Caret, start, end: this.pos }
      case CH_BANG:
        if (this.pos < this.len && this.ch() === CH_EQUAL) {
          this.pos++
          return { kind: TokenKind.BangEqual, start, end: this.pos }
        }
        return { kind: TokenKind.Bang, start, end: this.pos }
      case CH_EQUAL:
        if (this.pos < this.len && this.ch() === CH_EQUAL) {
          this.pos++
          return { kind: TokenKind.EqualEqual, start, end: this.pos }
        }
        return { kind: TokenKind.Assign, start, end: this.pos }
      case CH_LESS:
        if (this.pos < this.len) {
          if (this.ch() === CH_LESS) {
            this.pos++
            if (this.pos < this.len && this.ch() === CH_EQUAL) {
              this.pos++
              return { kind: TokenKind.LessLessAssign, start, end: this.pos }
            }
            return { kind: TokenKind.LessLess, start, end: this.pos }
          }
          if (this.ch() === CH_EQUAL) {
            this.pos++
            return { kind: TokenKind.LessEqual, start, end: this.pos }
          }
        }
        return { kind: TokenKind.Less, start, end: this.pos }
      case CH_GREATER:
        if (this.pos < this.len) {
          if (this.ch() === CH_GREATER) {
            this.pos++
            if (this.pos < this.len && this.ch() === CH_EQUAL) {
              this.pos++
              return { kind: TokenKind.GreaterGreaterAssign, start, end: this.pos }
            }
            return { kind: TokenKind.GreaterGreater, start, end: this.pos }
          }
          if (this.ch() === CH_EQUAL) {
            this.pos++
            return { kind: TokenKind.GreaterEqual, start, end: this.pos }
          }
        }
        return { kind: TokenKind.Greater, start, end: this.pos }
      default: {
        // Unknown character: keep surrogate pairs together
        const cp = this.src.codePointAt(start)
        if (cp !== undefined && cp > 0xffff) {
          this.pos++
        }
        return { kind: TokenKind.Other, start, end: this.pos }
      }
    }
  }
}

/**
 * Tokenize C source into a lossless TokenList.
 * Fails with INVALID_ARGUMENT when `source` is not a string, and with
 * ALLOCATION_FAILURE when the token array cannot grow.
 */
export function tokenize(source: string, options: ScanOptions = {}): Result<TokenList> {
  return attempt(() => {
    if (typeof source !== 'string') {
      throw invalidArgument('tokenize: source must be a string')
    }
    const tokens = new Scanner(source, options.gnuExtensions ?? true).scan()
    return new TokenList(source, tokens)
  })
}
