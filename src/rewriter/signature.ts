// Function header rewriting: `void f(a)` returns a status instead, and
// `T f(a)` returns a status and hands its value back through an out
// parameter.

import { TokenKind } from '../lexer/token'
import type { TokenList } from '../lexer/token-list'
import { attempt, invalidArgument, syntaxError } from '../errors'
import type { Result } from '../errors'

export interface ParsedSignature {
  // Leading `[[...]]` attribute group, verbatim
  attributes: string
  // Storage specifiers with the whitespace after them
  storage: string
  // Return type, trimmed; `int` when the header omits it
  returnType: string
  name: string
  // Parameter text between the parens, verbatim
  params: string
  // Old-style parameter declarations after `)`, or null
  krDecls: string | null
  // Returns plain `void`
  isVoid: boolean
}

export interface SignatureOptions {
  // Name of the added out parameter
  argName?: string
}

function isStorageSpecifier(kind: TokenKind): boolean {
  switch (kind) {
    case TokenKind.Static:
    case TokenKind.Extern:
    case TokenKind.Inline:
    case TokenKind.Noreturn:
    case TokenKind.ThreadLocal:
      return true
    default:
      return false
  }
}

function returnsVoid(tokens: TokenList, start: number, end: number): boolean {
  let sawVoid = false
  for (let i = start; i < end; i++) {
    if (tokens.isTrivia(i)) continue
    if (tokens.kind(i) !== TokenKind.Void) return false
    sawVoid = true
  }
  return sawVoid
}

/** True when a parameter list declares no parameters: empty or `void`. */
export function isEmptyParamList(params: string): boolean {
  const trimmed = params.trim()
  return trimmed === '' || trimmed === 'void'
}

/** `T *name`, or `T **name` when `T` is itself a pointer type. */
export function outParam(returnType: string, name: string): string {
  const t = returnType.trim()
  return t.endsWith('*') ? `${t}*${name}` : `${t} *${name}`
}

/**
 * Split a function header into its parts. The anchor is the first
 * identifier directly followed by `(` after the storage specifiers.
 */
export function parseSignature(tokens: TokenList): ParsedSignature {
  let i = tokens.nextSignificant(0)
  if (i < 0) {
    throw syntaxError('empty function header')
  }

  let attributes = ''
  if (tokens.kind(i) === TokenKind.LBracket && tokens.kind(i + 1) === TokenKind.LBracket) {
    const close = tokens.matching(i)
    if (close < 0) {
      throw syntaxError('unterminated attribute', { tokenIndex: i })
    }
    attributes = tokens.join(i, close + 1)
    i = close + 1
  }

  const storageStart = i
  for (let j = tokens.nextSignificant(i); j >= 0; j = tokens.nextSignificant(j + 1)) {
    if (!isStorageSpecifier(tokens.kind(j))) {
      i = j
      break
    }
    i = j + 1
  }
  const storageEnd = i
  const storage = tokens.join(storageStart, storageEnd)

  let name = -1
  let open = -1
  for (let k = storageEnd; k < tokens.length; k++) {
    if (tokens.kind(k) !== TokenKind.LParen) continue
    const prev = tokens.prevSignificant(k - 1, storageEnd)
    if (tokens.kind(prev) === TokenKind.Identifier) {
      name = prev
      open = k
      break
    }
  }
  if (name < 0) {
    throw syntaxError("no 'name (' in function header")
  }

  const close = tokens.matching(open)
  if (close < 0) {
    throw syntaxError('unbalanced parameter list', { tokenIndex: open })
  }

  const returnType = tokens.join(storageEnd, name).trim()
  const hasDecls = tokens.nextSignificant(close + 1) >= 0
  return {
    attributes,
    storage,
    returnType: returnType === '' ? 'int' : returnType,
    name: tokens.text(name),
    params: tokens.join(open + 1, close),
    krDecls: hasDecls ? tokens.join(close + 1, tokens.length) : null,
    isVoid: returnsVoid(tokens, storageEnd, name),
  }
}

/**
 * Rewrite the function header in `tokens` to return an `int` status.
 *
 *     void f(int a)         ->  int f(int a)
 *     char *f(int a)        ->  int f(int a, char **out)
 *     char *f(a) int a;     ->  int f(a, out) int a; char **out;
 */
export function rewriteSignature(
  tokens: TokenList,
  options: SignatureOptions = {},
): Result<string> {
  return attempt(() => {
    if (!tokens) {
      throw invalidArgument('rewriteSignature: tokens are required')
    }
    const sig = parseSignature(tokens)
    const head = `${sig.attributes}${sig.storage}int ${sig.name}`
    if (sig.isVoid) {
      return `${head}(${sig.params})${sig.krDecls ?? ''}`
    }

    const arg = options.argName ?? 'out'
    const empty = isEmptyParamList(sig.params)
    if (sig.krDecls !== null) {
      const params = empty ? arg : `${sig.params}, ${arg}`
      return `${head}(${params})${sig.krDecls} ${outParam(sig.returnType, arg)};`
    }
    const out = outParam(sig.returnType, arg)
    return `${head}(${empty ? out : `${sig.params}, ${out}`})`
  })
}
