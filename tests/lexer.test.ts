import { Scanner, tokenize } from '../src/lexer/scanner'
import { TokenKind } from '../src/lexer/token'
import type { TokenList } from '../src/lexer/token-list'
import { ErrorCode } from '../src/errors'

function lex(source: string, gnuExtensions = true): TokenList {
  const result = tokenize(source, { gnuExtensions })
  if (!result.ok) throw result.error
  return result.value
}

function significantKinds(source: string, gnuExtensions = true): TokenKind[] {
  const list = lex(source, gnuExtensions)
  return list.tokens.filter((_, i) => !list.isTrivia(i)).map((t) => t.kind)
}

function texts(source: string): string[] {
  const list = lex(source)
  return list.tokens.map((_, i) => list.text(i))
}

describe('tokenize', () => {
  describe('losslessness', () => {
    const samples = [
      '',
      'int main(void) { return 0; }\n',
      '#include <stdio.h>\n/* block */ // line\nchar *s = "a\\"b";\r\n',
      'x = a ... b; y = 0x1p-3 + .5e+2;',
      '#define M(a) \\\n  do { } while (0)\nint z;',
      'unterminated /* comment',
      "c = 'x' + L'y' + u8\"z\";",
      '@ $ ` \u{1F600}',
    ]

    it.each(samples)('reproduces %j exactly', (source) => {
      const list = lex(source)
      expect(list.toString()).toBe(source)
    })

    it('produces contiguous tokens', () => {
      const source = 'int *p = malloc(4 * sizeof *p); // grab\n'
      const list = lex(source)
      for (let i = 1; i < list.length; i++) {
        expect(list.tokens[i].start).toBe(list.tokens[i - 1].end)
      }
      expect(list.tokens[0].start).toBe(0)
      expect(list.tokens[list.length - 1].end).toBe(source.length)
    })

    it('returns an empty list for empty input', () => {
      expect(lex('').length).toBe(0)
    })
  })

  describe('kinds', () => {
    it('classifies a declaration with a call', () => {
      expect(significantKinds('int *p = malloc(10);')).toEqual([
        TokenKind.Int,
        TokenKind.Star,
        TokenKind.Identifier,
        TokenKind.Assign,
        TokenKind.Identifier,
        TokenKind.LParen,
        TokenKind.NumberLiteral,
        TokenKind.RParen,
        TokenKind.Semicolon,
      ])
    })

    it('recognizes C11, C23 and GNU keywords', () => {
      expect(significantKinds('_Bool bool nullptr __int128 typeof thread_local')).toEqual([
        TokenKind.Bool,
        TokenKind.Bool,
        TokenKind.Nullptr,
        TokenKind.Int128,
        TokenKind.Typeof,
        TokenKind.ThreadLocal,
      ])
    })

    it('treats bare typeof as an identifier without GNU extensions', () => {
      expect(significantKinds('typeof __typeof__', false)).toEqual([
        TokenKind.Identifier,
        TokenKind.Typeof,
      ])
    })

    it('lexes multi-character operators greedily', () => {
      expect(significantKinds('a->b <<= c != d ... e')).toEqual([
        TokenKind.Identifier,
        TokenKind.Arrow,
        TokenKind.Identifier,
        TokenKind.LessLessAssign,
        TokenKind.Identifier,
        TokenKind.BangEqual,
        TokenKind.Identifier,
        TokenKind.Ellipsis,
        TokenKind.Identifier,
      ])
    })

    it('marks unknown characters as Other and keeps surrogate pairs whole', () => {
      const list = lex('@\u{1F600}')
      expect(list.length).toBe(2)
      expect(list.kind(0)).toBe(TokenKind.Other)
      expect(list.kind(1)).toBe(TokenKind.Other)
      expect(list.text(1)).toBe('\u{1F600}')
    })
  })

  describe('numbers', () => {
    it('keeps signed exponents inside the literal', () => {
      expect(texts('0x1p-3 1e+10')).toEqual(['0x1p-3', ' ', '1e+10'])
    })

    it('accepts digit separators', () => {
      expect(texts("1'000'000")).toEqual(["1'000'000"])
    })

    it('stops before an ellipsis', () => {
      expect(texts('1...')).toEqual(['1', '...'])
    })

    it('does not absorb a binary minus', () => {
      expect(texts('10-2')).toEqual(['10', '-', '2'])
    })
  })

  describe('literals', () => {
    it('skips escaped quotes', () => {
      const list = lex('"a\\"b" x')
      expect(list.kind(0)).toBe(TokenKind.StringLiteral)
      expect(list.text(0)).toBe('"a\\"b"')
    })

    it('stops an unterminated string at the newline', () => {
      expect(texts('"abc\nx')).toEqual(['"abc', '\n', 'x'])
    })

    it('attaches encoding prefixes', () => {
      const list = lex('L"w" u8"x" u\'c\' U\'d\'')
      expect(significantKinds('L"w" u8"x" u\'c\' U\'d\'')).toEqual([
        TokenKind.StringLiteral,
        TokenKind.StringLiteral,
        TokenKind.CharLiteral,
        TokenKind.CharLiteral,
      ])
      expect(list.text(2)).toBe('u8"x"')
    })
  })

  describe('trivia', () => {
    it('lexes a directive to the end of its line', () => {
      const list = lex('#include <stdio.h>\nint x;')
      expect(list.kind(0)).toBe(TokenKind.Directive)
      expect(list.text(0)).toBe('#include <stdio.h>')
      expect(list.text(1)).toBe('\n')
    })

    it('follows line continuations', () => {
      const list = lex('#define X \\\n  1\nint y;')
      expect(list.text(0)).toBe('#define X \\\n  1')
      expect(list.kind(2)).toBe(TokenKind.Int)
    })

    it('leaves a trailing carriage return out of the directive', () => {
      expect(texts('#pragma once\r\nint')).toEqual(['#pragma once', '\r\n', 'int'])
    })

    it('only starts a directive at the beginning of a line', () => {
      expect(significantKinds('a # b')).toEqual([
        TokenKind.Identifier,
        TokenKind.Hash,
        TokenKind.Identifier,
      ])
    })

    it('allows a comment before the directive on the same line', () => {
      const list = lex('/* c */ #define A 1')
      expect(list.kind(0)).toBe(TokenKind.Comment)
      expect(list.kind(2)).toBe(TokenKind.Directive)
      expect(list.text(2)).toBe('#define A 1')
    })

    it('ends a line comment before the newline', () => {
      expect(texts('// note\nx')).toEqual(['// note', '\n', 'x'])
    })

    it('runs an unterminated block comment to the end of input', () => {
      const list = lex('int /* open')
      expect(list.kind(2)).toBe(TokenKind.Comment)
      expect(list.text(2)).toBe('/* open')
    })
  })

  it('rejects a source that is not a string', () => {
    const result: unknown = Reflect.apply(tokenize, undefined, [42])
    expect(result).toMatchObject({ ok: false, error: { code: ErrorCode.INVALID_ARGUMENT } })
  })

  it('scans without an Eof token', () => {
    const tokens = new Scanner('x').scan()
    expect(tokens).toEqual([{ kind: TokenKind.Identifier, start: 0, end: 1 }])
  })
})

describe('TokenList', () => {
  const list = lex('f ( a , /* c */ b ) ;')
  // 0 f, 1 ws, 2 (, 3 ws, 4 a, 5 ws, 6 ',', 7 ws, 8 comment, 9 ws, 10 b, 11 ws, 12 ), 13 ws, 14 ;

  it('finds significant neighbours', () => {
    expect(list.nextSignificant(7)).toBe(10)
    expect(list.prevSignificant(9)).toBe(6)
    expect(list.nextSignificant(15)).toBe(-1)
    expect(list.prevSignificant(-1)).toBe(-1)
  })

  it('matches brackets', () => {
    expect(list.matching(2)).toBe(12)
    expect(list.matching(4)).toBe(-1)
    expect(list.matching(2, 12)).toBe(-1)
  })

  it('answers Eof and empty text out of range', () => {
    expect(list.kind(99)).toBe(TokenKind.Eof)
    expect(list.text(-1)).toBe('')
    expect(list.at(99)).toBeUndefined()
  })

  it('joins source text including trivia', () => {
    expect(list.join(4, 11)).toBe('a , /* c */ b')
    expect(list.join(5, 5)).toBe('')
  })

  it('slices without changing text', () => {
    const view = list.slice(2, 13)
    expect(view.length).toBe(11)
    expect(view.text(0)).toBe('(')
    expect(view.toString()).toBe('( a , /* c */ b )')
    expect(view.matching(0)).toBe(10)
  })

  it('finds the next token of a kind', () => {
    expect(list.findNext(TokenKind.Comma, 0)).toBe(6)
    expect(list.findNext(TokenKind.Comma, 7)).toBe(-1)
  })
})
