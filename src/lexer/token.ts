/**
 * Token kinds recognized by the C lexer.
 * Uses a numeric const enum for fast comparison (inlined at compile time).
 *
 * The lexer is lossless, so whitespace, comments and preprocessor lines are
 * tokens too (the trivia kinds). Unrecognized characters become `Other`.
 */
export const enum TokenKind {
  // Trivia
  Whitespace = 0,
  Comment = 1,
  Directive = 2,

  // Literals
  NumberLiteral = 3,
  StringLiteral = 4,
  CharLiteral = 5,

  // Identifiers
  Identifier = 6,

  // Keywords
  Auto = 7,
  Break = 8,
  Case = 9,
  Char = 10,
  Const = 11,
  Continue = 12,
  Default = 13,
  Do = 14,
  Double = 15,
  Else = 16,
  Enum = 17,
  Extern = 18,
  Float = 19,
  For = 20,
  Goto = 21,
  If = 22,
  Inline = 23,
  Int = 24,
  Long = 25,
  Register = 26,
  Restrict = 27,
  Return = 28,
  Short = 29,
  Signed = 30,
  Sizeof = 31,
  Static = 32,
  Struct = 33,
  Switch = 34,
  Typedef = 35,
  Union = 36,
  Unsigned = 37,
  Void = 38,
  Volatile = 39,
  While = 40,

  // C11 keywords
  Alignas = 41,
  Alignof = 42,
  Atomic = 43,
  Bool = 44,
  Complex = 45,
  Generic = 46,
  Imaginary = 47,
  Noreturn = 48,
  StaticAssert = 49,
  ThreadLocal = 50,

  // C23 keywords
  True = 51,
  False = 52,
  Nullptr = 53,
  Constexpr = 54,

  // GCC extensions
  Typeof = 55,
  Asm = 56,
  Attribute = 57,
  Extension = 58,
  Int128 = 59,
  AutoType = 60,

  // Punctuation
  LParen = 61,
  RParen = 62,
  LBrace = 63,
  RBrace = 64,
  LBracket = 65,
  RBracket = 66,
  Semicolon = 67,
  Comma = 68,
  Dot = 69,
  Arrow = 70,
  Ellipsis = 71,

  // Operators
  Plus = 72,
  Minus = 73,
  Star = 74,
  Slash = 75,
  Percent = 76,
  Amp = 77,
  Pipe = 78,
  Caret = 79,
  Tilde = 80,
  Bang = 81,
  Assign = 82,
  Less = 83,
  Greater = 84,
  Question = 85,
  Colon = 86,

  // Compound operators
  PlusPlus = 87,
  MinusMinus = 88,
  PlusAssign = 89,
  MinusAssign = 90,
  StarAssign = 91,
  SlashAssign = 92,
  PercentAssign = 93,
  AmpAssign = 94,
  PipeAssign = 95,
  CaretAssign = 96,
  LessLess = 97,
  GreaterGreater = 98,
  LessLessAssign = 99,
  GreaterGreaterAssign = 100,
  EqualEqual = 101,
  BangEqual = 102,
  LessEqual = 103,
  GreaterEqual = 104,
  AmpAmp = 105,
  PipePipe = 106,
  Hash = 107,
  HashHash = 108,

  // Anything the lexer does not recognize (stray `@`, `` ` ``, non-ASCII bytes)
  Other = 109,

  // Returned by TokenList.kind() past either end; never stored in a list
  Eof = 110,
}

/**
 * A token with its kind and source location.
 * Tokens carry no text of their own; read it back through the owning TokenList.
 */
export interface Token {
  kind: TokenKind
  start: number
  end: number
}

export function isTriviaKind(kind: TokenKind): boolean {
  return kind === TokenKind.Whitespace || kind === TokenKind.Comment || kind === TokenKind.Directive
}

export function isKeywordKind(kind: TokenKind): boolean {
  return kind >= TokenKind.Auto && kind <= TokenKind.AutoType
}

/**
 * Convert a keyword string to its token kind.
 * When `gnuExtensions` is false (strict C standard mode, e.g. -std=c99),
 * bare GNU keywords like `typeof` and `asm` are treated as identifiers.
 * The double-underscore forms (`__typeof__`, `__asm__`) are always keywords.
 *
 * Uses a two-stage filter to quickly reject non-keywords:
 * Stage 1: reject by length (keywords are 2-14 chars).
 * Stage 2: reject by first character.
 */
export function keywordFromString(s: string, gnuExtensions: boolean): TokenKind | undefined {
  const len = s.length
  if (len < 2 || len > 14) {
    return undefined
  }

  const first = s.charCodeAt(0)
  // Fast reject: keywords only start with _ a b c d e f g i l n r s t u v w
  if (
    first !== 0x5f /* _ */ &&
    first !== 0x61 /* a */ &&
    first !== 0x62 /* b */ &&
    first !== 0x63 /* c */ &&
    first !== 0x64 /* d */ &&
    first !== 0x65 /* e */ &&
    first !== 0x66 /* f */ &&
    first !== 0x67 /* g */ &&
    first !== 0x69 /* i */ &&
    first !== 0x6c /* l */ &&
    first !== 0x6e /* n */ &&
    first !== 0x72 /* r */ &&
    first !== 0x73 /* s */ &&
    first !== 0x74 /* t */ &&
    first !== 0x75 /* u */ &&
    first !== 0x76 /* v */ &&
    first !== 0x77 /* w */
  ) {
    return undefined
  }

  switch (s) {
    case 'auto':
      return TokenKind.Auto
    case 'break':
      return TokenKind.Break
    case 'case':
      return TokenKind.Case
    case 'char':
      return TokenKind.Char
    case 'const':
      return TokenKind.Const
    case 'continue':
      return TokenKind.Continue
    case 'default':
      return TokenKind.Default
    case 'do':
      return TokenKind.Do
    case 'double':
      return TokenKind.Double
    case 'else':
      return TokenKind.Else
    case 'enum':
      return TokenKind.Enum
    case 'extern':
      return TokenKind.Extern
    case 'float':
      return TokenKind.Float
    case 'for':
      return TokenKind.For
    case 'goto':
      return TokenKind.Goto
    case 'if':
      return TokenKind.If
    case 'inline':
      return TokenKind.Inline
    case 'int':
      return TokenKind.Int
    case 'long':
      return TokenKind.Long
    case 'register':
      return TokenKind.Register
    case 'restrict':
      return TokenKind.Restrict
    case 'return':
      return TokenKind.Return
    case 'short':
      return TokenKind.Short
    case 'signed':
      return TokenKind.Signed
    case 'sizeof':
      return TokenKind.Sizeof
    case 'static':
      return TokenKind.Static
    case 'struct':
      return TokenKind.Struct
    case 'switch':
      return TokenKind.Switch
    case 'typedef':
      return TokenKind.Typedef
    case 'union':
      return TokenKind.Union
    case 'unsigned':
      return TokenKind.Unsigned
    case 'void':
      return TokenKind.Void
    case 'volatile':
    case '__volatile__':
    case '__volatile':
      return TokenKind.Volatile
    case '__const':
    case '__const__':
      return TokenKind.Const
    case '__inline':
    case '__inline__':
      return TokenKind.Inline
    case '__restrict':
    case '__restrict__':
      return TokenKind.Restrict
    case '__signed__':
      return TokenKind.Signed
    case 'while':
      return TokenKind.While
    case '_Alignas':
    case 'alignas':
      return TokenKind.Alignas
    case '_Alignof':
    case 'alignof':
    case '__alignof':
    case '__alignof__':
      return TokenKind.Alignof
    case '_Atomic':
      return TokenKind.Atomic
    case '_Bool':
    case 'bool':
      return TokenKind.Bool
    case '_Complex':
    case '__complex__':
    case '__complex':
      return TokenKind.Complex
    case '_Generic':
      return TokenKind.Generic
    case '_Imaginary':
      return TokenKind.Imaginary
    case '_Noreturn':
    case '__noreturn__':
      return TokenKind.Noreturn
    case '_Static_assert':
    case 'static_assert':
      return TokenKind.StaticAssert
    case '_Thread_local':
    case 'thread_local':
    case '__thread':
      return TokenKind.ThreadLocal
    case 'true':
      return TokenKind.True
    case 'false':
      return TokenKind.False
    case 'nullptr':
      return TokenKind.Nullptr
    case 'constexpr':
      return TokenKind.Constexpr
    case 'typeof':
      return gnuExtensions ? TokenKind.Typeof : undefined
    case '__typeof__':
    case '__typeof':
    case 'typeof_unqual':
      return TokenKind.Typeof
    case 'asm':
      return gnuExtensions ? TokenKind.Asm : undefined
    case '__asm__':
    case '__asm':
      return TokenKind.Asm
    case '__attribute__':
    case '__attribute':
      return TokenKind.Attribute
    case '__extension__':
      return TokenKind.Extension
    case '__int128':
    case '__int128_t':
    case '__uint128_t':
      return TokenKind.Int128
    case '__auto_type':
      return TokenKind.AutoType
    default:
      return undefined
  }
}
