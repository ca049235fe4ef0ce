// Declarator parsing: handles the C declarator syntax (the part after the
// specifiers that names the declared entity and applies pointer, array and
// function operators to the base type).
//
// The "spiral rule": a declarator is a prefix of `*`s around a direct
// declarator, which is a name or a parenthesized declarator followed by any
// number of `[...]` and `(...)` suffixes. The two passes are mutually
// recursive; a group's suffixes wrap the group's entire result, which is what
// makes `*x[3]` and `(*x)[3]` come out differently.

import { Parser } from './parser'
import { TokenKind } from '../lexer/token'
import type { DeclType } from '../ast/nodes'
import { arrayType, functionType, pointerType } from '../ast/builders'

// --- Module augmentation ---
declare module './parser' {
  interface Parser {
    parseDeclarator(base: DeclType): DeclType
    parseDirectDeclarator(base: DeclType): DeclType
    parsePointerQualifiers(): string | null
    isGroupedDeclarator(): boolean
    skipDeclaratorAttributes(): void
  }
}

function isPointerQualifier(kind: TokenKind): boolean {
  return (
    kind === TokenKind.Const ||
    kind === TokenKind.Volatile ||
    kind === TokenKind.Restrict ||
    kind === TokenKind.Atomic
  )
}

// ============================================================
// parseDeclarator (prefix pass)
// ============================================================
Parser.prototype.parseDeclarator = function (this: Parser, base: DeclType): DeclType {
  // `^` is the block-pointer spelling; it chains like `*`
  if (this.peek() === TokenKind.Star || this.peek() === TokenKind.Caret) {
    this.advance()
    const qualifiers = this.parsePointerQualifiers()
    return pointerType(qualifiers, this.parseDeclarator(base))
  }
  return this.parseDirectDeclarator(base)
}

// ============================================================
// parsePointerQualifiers
// ============================================================
// Qualifiers after a `*`, joined by single spaces in source spelling
// (`__restrict` stays `__restrict`). Attributes are skipped.
Parser.prototype.parsePointerQualifiers = function (this: Parser): string | null {
  const words: string[] = []
  for (;;) {
    const kind = this.peek()
    if (isPointerQualifier(kind)) {
      words.push(this.peekText())
      this.advance()
    } else if (kind === TokenKind.Attribute) {
      this.skipDeclaratorAttributes()
    } else {
      break
    }
  }
  return words.length > 0 ? words.join(' ') : null
}

// ============================================================
// parseDirectDeclarator (postfix pass)
// ============================================================
Parser.prototype.parseDirectDeclarator = function (this: Parser, base: DeclType): DeclType {
  let node: DeclType

  if (this.peek() === TokenKind.Identifier) {
    this.declaredName = this.peekText()
    this.advance()
    node = base
  } else if (this.peek() === TokenKind.LParen && this.isGroupedDeclarator()) {
    this.advance() // consume '('
    node = this.parseDeclarator(base)
    this.expect(TokenKind.RParen, ')')
  } else {
    // Abstract declarator: no name at this level
    node = base
  }

  for (;;) {
    const kind = this.peek()
    if (kind === TokenKind.LBracket) {
      const open = this.pos
      const close = this.skipGroup()
      const size = this.tokens.join(open + 1, close).trim()
      node = arrayType(size.length > 0 ? size : null, node)
    } else if (kind === TokenKind.LParen) {
      const open = this.pos
      const close = this.skipGroup()
      node = functionType(this.tokens.join(open + 1, close), node)
    } else if (kind === TokenKind.Attribute) {
      this.skipDeclaratorAttributes()
    } else {
      return node
    }
  }
}

// ============================================================
// isGroupedDeclarator
// ============================================================
// `(` opens a nested declarator when followed by a pointer, a name or
// another `(`; anything else (a type, `)`, `...`) is a parameter list.
Parser.prototype.isGroupedDeclarator = function (this: Parser): boolean {
  switch (this.peekNext()) {
    case TokenKind.Star:
    case TokenKind.Caret:
    case TokenKind.Identifier:
    case TokenKind.LParen:
      return true
    default:
      return false
  }
}

Parser.prototype.skipDeclaratorAttributes = function (this: Parser): void {
  while (this.peek() === TokenKind.Attribute) {
    this.advance()
    if (this.peek() === TokenKind.LParen) {
      this.skipGroup()
    }
  }
}
