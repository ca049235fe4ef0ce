// Declaration specifier parsing: storage classes, qualifiers, type keywords,
// struct/union/enum specifiers, typedef names and GNU extensions like typeof
// and __attribute__.
//
// C allows specifier tokens in any order ("long unsigned int" ==
// "unsigned long int"). Nothing is resolved here: the base of a type chain is
// the exact source text of the specifier tokens.

import { Parser } from './parser'
import { TokenKind } from '../lexer/token'
import { syntaxError } from '../errors'

// Extend Parser prototype
declare module './parser' {
  interface Parser {
    parseBaseSpecifiers(): string
    parseStructOrUnionOrEnum(): number
    isTypedefNamePosition(): boolean
  }
}

// Keywords that name (part of) a type
function isTypeKeyword(kind: TokenKind): boolean {
  switch (kind) {
    case TokenKind.Void:
    case TokenKind.Char:
    case TokenKind.Short:
    case TokenKind.Int:
    case TokenKind.Long:
    case TokenKind.Float:
    case TokenKind.Double:
    case TokenKind.Signed:
    case TokenKind.Unsigned:
    case TokenKind.Bool:
    case TokenKind.Complex:
    case TokenKind.Imaginary:
    case TokenKind.Int128:
    case TokenKind.AutoType:
      return true
    default:
      return false
  }
}

// Storage classes, function specifiers and qualifiers: allowed anywhere in
// the specifier list, never a type on their own
function isSpecifierModifier(kind: TokenKind): boolean {
  switch (kind) {
    case TokenKind.Auto:
    case TokenKind.Register:
    case TokenKind.Static:
    case TokenKind.Extern:
    case TokenKind.Typedef:
    case TokenKind.Inline:
    case TokenKind.Noreturn:
    case TokenKind.ThreadLocal:
    case TokenKind.Constexpr:
    case TokenKind.Const:
    case TokenKind.Volatile:
    case TokenKind.Restrict:
    case TokenKind.Extension:
      return true
    default:
      return false
  }
}

// Specifiers that take a mandatory parenthesized operand
function takesParenOperand(kind: TokenKind): boolean {
  return kind === TokenKind.Typeof || kind === TokenKind.Attribute || kind === TokenKind.Alignas
}

// ============================================================
// parseBaseSpecifiers
// ============================================================
Parser.prototype.parseBaseSpecifiers = function (this: Parser): string {
  const first = this.pos
  let last = -1
  let sawType = false

  for (;;) {
    const kind = this.peek()

    if (isTypeKeyword(kind)) {
      sawType = true
      last = this.advance()
      continue
    }

    if (isSpecifierModifier(kind)) {
      last = this.advance()
      continue
    }

    if (kind === TokenKind.Atomic) {
      last = this.advance()
      // _Atomic(T) is a type specifier; bare _Atomic is a qualifier
      if (this.peek() === TokenKind.LParen) {
        last = this.skipGroup()
        sawType = true
      }
      continue
    }

    if (takesParenOperand(kind)) {
      last = this.advance()
      if (this.peek() !== TokenKind.LParen) {
        throw syntaxError(`expected '(' after '${this.tokens.text(last)}'`, {
          tokenIndex: this.pos,
        })
      }
      last = this.skipGroup()
      if (kind === TokenKind.Typeof) sawType = true
      continue
    }

    if (kind === TokenKind.Struct || kind === TokenKind.Union || kind === TokenKind.Enum) {
      last = this.parseStructOrUnionOrEnum()
      sawType = true
      continue
    }

    // C23 attribute specifier sequence: [[ ... ]]
    if (kind === TokenKind.LBracket && this.peekNext() === TokenKind.LBracket) {
      last = this.skipGroup()
      continue
    }

    if (kind === TokenKind.Identifier && !sawType && this.isTypedefNamePosition()) {
      sawType = true
      last = this.advance()
      continue
    }

    break
  }

  if (last < 0) {
    throw syntaxError(`expected declaration specifiers before '${this.describeCurrent()}'`, {
      tokenIndex: this.pos,
    })
  }
  return this.tokens.join(first, last + 1)
}

// ============================================================
// parseStructOrUnionOrEnum
// ============================================================
// struct [attrs] [tag] [{ ... }]; returns the index of the last token consumed
Parser.prototype.parseStructOrUnionOrEnum = function (this: Parser): number {
  const keyword = this.advance()
  let last = keyword
  while (this.peek() === TokenKind.Attribute) {
    last = this.advance()
    if (this.peek() === TokenKind.LParen) {
      last = this.skipGroup()
    }
  }
  const hasTag = this.peek() === TokenKind.Identifier
  if (hasTag) {
    last = this.advance()
  }
  if (this.peek() === TokenKind.LBrace) {
    last = this.skipGroup()
  } else if (!hasTag) {
    throw syntaxError(`expected tag or '{' after '${this.tokens.text(keyword)}'`, {
      tokenIndex: this.pos,
    })
  }
  return last
}

// ============================================================
// isTypedefNamePosition
// ============================================================
// With no symbol table, an identifier is taken as a typedef name when what
// follows can only continue a declaration: another identifier (the declared
// name), a pointer, a grouped declarator, a qualifier, or nothing at all
// (an abstract declarator such as the operand of sizeof).
Parser.prototype.isTypedefNamePosition = function (this: Parser): boolean {
  switch (this.peekNext()) {
    case TokenKind.Identifier:
    case TokenKind.Star:
    case TokenKind.Caret:
    case TokenKind.LParen:
    case TokenKind.Const:
    case TokenKind.Volatile:
    case TokenKind.Restrict:
    case TokenKind.Atomic:
    case TokenKind.Attribute:
    case TokenKind.Eof:
      return true
    default:
      return false
  }
}
