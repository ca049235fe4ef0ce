import { tokenize } from '../src/lexer/scanner'
import { parseDeclaration } from '../src/parser/declarations'
import { baseOf, chainKinds, formatDeclType } from '../src/ast/builders'
import type { DeclInfo } from '../src/ast/nodes'
import { ErrorCode } from '../src/errors'
import type { TokenList } from '../src/lexer/token-list'

function lex(source: string): TokenList {
  const result = tokenize(source)
  if (!result.ok) throw result.error
  return result.value
}

/** Helper: parse a declaration and fail loudly on error */
function decl(source: string): DeclInfo {
  const result = parseDeclaration(lex(source))
  if (!result.ok) throw new Error(`${result.error.code}: ${result.error.message}`)
  return result.value
}

function chain(source: string): string {
  return formatDeclType(decl(source).type)
}

function errorCode(source: string): ErrorCode | null {
  const result = parseDeclaration(lex(source))
  return result.ok ? null : result.error.code
}

describe('parseDeclaration', () => {
  describe('declarator shapes', () => {
    it('parses a plain name', () => {
      expect(decl('int x')).toEqual({ identifier: 'x', type: { kind: 'Base', name: 'int' } })
    })

    it('parses int *x', () => {
      expect(decl('int *x')).toEqual({
        identifier: 'x',
        type: { kind: 'Pointer', qualifiers: null, inner: { kind: 'Base', name: 'int' } },
      })
    })

    it('parses int x[3]', () => {
      expect(decl('int x[3]')).toEqual({
        identifier: 'x',
        type: { kind: 'Array', size: '3', inner: { kind: 'Base', name: 'int' } },
      })
    })

    it('nests a grouped pointer inside the array: int (*x)[3]', () => {
      const info = decl('int (*x)[3]')
      expect(info.identifier).toBe('x')
      expect(chainKinds(info.type)).toEqual(['Array', 'Pointer', 'Base'])
    })

    it('puts the pointer outside the array: int *x[3]', () => {
      const info = decl('int *x[3]')
      expect(info.identifier).toBe('x')
      expect(chainKinds(info.type)).toEqual(['Pointer', 'Array', 'Base'])
    })

    it('reads pointer qualifiers', () => {
      expect(chain('int * const x')).toBe('Pointer(const) -> Base(int)')
      expect(chain('char *const volatile *p')).toBe(
        'Pointer(const volatile) -> Pointer -> Base(char)',
      )
    })

    it('parses a function pointer', () => {
      expect(chain('void (*handler)(int sig)')).toBe('Function(int sig) -> Pointer -> Base(void)')
    })

    it('parses a pointer to a function returning a pointer to an array', () => {
      expect(chain('char (*(*f)(void))[8]')).toBe(
        'Array[8] -> Pointer -> Function(void) -> Pointer -> Base(char)',
      )
    })

    it('keeps an empty array size as null', () => {
      expect(decl('int x[]').type).toEqual({
        kind: 'Array',
        size: null,
        inner: { kind: 'Base', name: 'int' },
      })
    })

    it('trims the array size expression', () => {
      expect(chain('char buf[ N + 1 ]')).toBe('Array[N + 1] -> Base(char)')
    })
  })

  describe('specifiers', () => {
    it('keeps the source spelling of the specifier list', () => {
      expect(baseOf(decl('unsigned long long n').type).name).toBe('unsigned long long')
      expect(baseOf(decl('static inline const int *volatile p').type).name).toBe(
        'static inline const int',
      )
    })

    it('accepts struct, union and enum types', () => {
      expect(chain('struct node *next')).toBe('Pointer -> Base(struct node)')
      expect(chain('union { int a; float b; } u')).toBe('Base(union { int a; float b; })')
      expect(chain('enum color c')).toBe('Base(enum color)')
    })

    it('takes a leading identifier as a typedef name', () => {
      expect(decl('size_t len')).toEqual({
        identifier: 'len',
        type: { kind: 'Base', name: 'size_t' },
      })
    })

    it('includes C23 attributes in the specifiers', () => {
      expect(baseOf(decl('[[maybe_unused]] int x').type).name).toBe('[[maybe_unused]] int')
    })

    it('parses typeof specifiers', () => {
      expect(chain('typeof(int) *p')).toBe('Pointer -> Base(typeof(int))')
    })

    it('treats _Atomic(T) as part of the base type', () => {
      expect(chain('_Atomic(int) *x')).toBe('Pointer -> Base(_Atomic(int))')
    })

    it('keeps _Complex in the base type', () => {
      expect(decl('double _Complex z')).toEqual({
        identifier: 'z',
        type: { kind: 'Base', name: 'double _Complex' },
      })
    })

    it('reads a bare _Atomic after a star as a pointer qualifier', () => {
      expect(chain('int * _Atomic p')).toBe('Pointer(_Atomic) -> Base(int)')
    })
  })

  describe('abstract declarators and terminators', () => {
    it('returns a null identifier for an abstract declarator', () => {
      const info = decl('const char *')
      expect(info.identifier).toBeNull()
      expect(formatDeclType(info.type)).toBe('Pointer -> Base(const char)')
    })

    it('stops at an initializer', () => {
      expect(decl('int *p = malloc(4);').identifier).toBe('p')
    })

    it('stops at a bit-field width', () => {
      expect(decl('unsigned flags : 3').identifier).toBe('flags')
    })

    it('parses a sub-range of the token list', () => {
      const tokens = lex('int a; char *b;')
      // 0 int, 1 ws, 2 a, 3 ;, 4 ws, 5 char, 6 ws, 7 *, 8 b, 9 ;
      const result = parseDeclaration(tokens, 5, 10)
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value.identifier).toBe('b')
        expect(formatDeclType(result.value.type)).toBe('Pointer -> Base(char)')
      }
    })
  })

  describe('errors', () => {
    it('rejects trailing tokens after the declarator', () => {
      expect(errorCode('int x y')).toBe(ErrorCode.SYNTAX_ERROR)
    })

    it('rejects an unclosed group', () => {
      expect(errorCode('int (*x')).toBe(ErrorCode.SYNTAX_ERROR)
      expect(errorCode('int x[3')).toBe(ErrorCode.SYNTAX_ERROR)
    })

    it('rejects a declaration without specifiers', () => {
      expect(errorCode('*x')).toBe(ErrorCode.SYNTAX_ERROR)
    })

    it('rejects an empty range', () => {
      expect(errorCode('   ')).toBe(ErrorCode.SYNTAX_ERROR)
      const result = parseDeclaration(lex('int x'), 2, 2)
      expect(result.ok ? null : result.error.message).toBe('empty declaration')
    })

    it('rejects out-of-range bounds', () => {
      const tokens = lex('int x')
      const inverted = parseDeclaration(tokens, 2, 1)
      const past = parseDeclaration(tokens, 0, 99)
      expect(inverted.ok ? null : inverted.error.code).toBe(ErrorCode.INVALID_ARGUMENT)
      expect(past.ok ? null : past.error.code).toBe(ErrorCode.INVALID_ARGUMENT)
    })
  })
})

describe('formatDeclType', () => {
  it('renders every link kind', () => {
    expect(chain('int (*fns[2])(void)')).toBe('Function(void) -> Pointer -> Array[2] -> Base(int)')
  })
})
