// Declaration entry point: specifiers, one declarator, and an optional
// terminator. Importing this module registers the prototype extensions.

import { Parser } from './parser'
import { TokenKind } from '../lexer/token'
import type { TokenList } from '../lexer/token-list'
import type { DeclInfo } from '../ast/nodes'
import { baseType, declInfo } from '../ast/builders'
import { attempt, invalidArgument, syntaxError } from '../errors'
import type { Result } from '../errors'

import './types'
import './declarators'

// Tokens that may follow a complete declarator: an initializer, a bit-field
// width, or the end of the declaration
function endsDeclarator(kind: TokenKind): boolean {
  return (
    kind === TokenKind.Eof ||
    kind === TokenKind.Assign ||
    kind === TokenKind.Colon ||
    kind === TokenKind.Semicolon
  )
}

/**
 * Parse the single declaration in tokens `[start, end)`.
 *
 * Everything from a trailing `=`, `:` or `;` onward is ignored, so a full
 * `int *p = malloc(4);` statement may be passed as is.
 */
export function parseDeclaration(
  tokens: TokenList,
  start: number = 0,
  end?: number,
): Result<DeclInfo> {
  return attempt(() => {
    if (!tokens) {
      throw invalidArgument('parseDeclaration: tokens are required')
    }
    const stop = end ?? tokens.length
    if (!Number.isInteger(start) || !Number.isInteger(stop)) {
      throw invalidArgument('parseDeclaration: range bounds must be integers')
    }
    if (start < 0 || stop > tokens.length || start > stop) {
      throw invalidArgument(`parseDeclaration: invalid range [${start}, ${stop})`, {
        tokenIndex: start,
      })
    }

    const parser = new Parser(tokens, start, stop)
    if (parser.atEnd()) {
      throw syntaxError('empty declaration', { tokenIndex: start })
    }

    const base = baseType(parser.parseBaseSpecifiers())
    const type = parser.parseDeclarator(base)

    if (!endsDeclarator(parser.peek())) {
      throw syntaxError(`unexpected '${parser.peekText()}' after declarator`, {
        tokenIndex: parser.pos,
      })
    }
    return declInfo(parser.declaredName, type)
  })
}
