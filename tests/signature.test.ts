import { tokenize } from '../src/lexer/scanner'
import type { TokenList } from '../src/lexer/token-list'
import {
  isEmptyParamList,
  outParam,
  parseSignature,
  rewriteSignature,
} from '../src/rewriter/signature'
import type { SignatureOptions } from '../src/rewriter/signature'
import { ErrorCode } from '../src/errors'

function lex(source: string): TokenList {
  const result = tokenize(source)
  if (!result.ok) throw result.error
  return result.value
}

function rewrite(header: string, options?: SignatureOptions): string {
  const result = rewriteSignature(lex(header), options)
  if (!result.ok) throw result.error
  return result.value
}

function errorOf(header: string): string | null {
  const result = rewriteSignature(lex(header))
  return result.ok ? null : result.error.message
}

describe('parseSignature', () => {
  it('splits a header into its parts', () => {
    expect(parseSignature(lex('static char *dup(const char *s, size_t n)'))).toEqual({
      attributes: '',
      storage: 'static ',
      returnType: 'char *',
      name: 'dup',
      params: 'const char *s, size_t n',
      krDecls: null,
      isVoid: false,
    })
  })

  it('defaults an omitted return type to int', () => {
    const sig = parseSignature(lex('f(a)'))
    expect(sig.returnType).toBe('int')
    expect(sig.isVoid).toBe(false)
  })

  it('keeps old-style parameter declarations', () => {
    expect(parseSignature(lex('void f(a) int a;')).krDecls).toBe(' int a;')
  })

  it('does not take a void pointer for void', () => {
    expect(parseSignature(lex('void *f(void)')).isVoid).toBe(false)
    expect(parseSignature(lex('void f(void)')).isVoid).toBe(true)
  })
})

describe('rewriteSignature', () => {
  it('turns void into int', () => {
    expect(rewrite('void f(int a)')).toBe('int f(int a)')
    expect(rewrite('static void g(void)')).toBe('static int g(void)')
  })

  it('moves a pointer result into an out parameter', () => {
    expect(rewrite('char *f(int a)')).toBe('int f(int a, char **out)')
    expect(rewrite('struct node *make(void)')).toBe('int make(struct node **out)')
    expect(rewrite('void *f()')).toBe('int f(void **out)')
  })

  it('keeps attributes and storage specifiers', () => {
    expect(rewrite('[[nodiscard]] static inline char *f(void)')).toBe(
      '[[nodiscard]] static inline int f(char **out)',
    )
  })

  it('names the out parameter as asked', () => {
    expect(rewrite('int *mk(void)', { argName: 'result' })).toBe('int mk(int **result)')
  })

  it('rewrites old-style definitions', () => {
    expect(rewrite('char *f(a) int a;')).toBe('int f(a, out) int a; char **out;')
    expect(rewrite('char *f() int x;')).toBe('int f(out) int x; char **out;')
    expect(rewrite('void f(a) int a;')).toBe('int f(a) int a;')
  })

  it('reports headers it cannot read', () => {
    expect(errorOf('')).toBe('empty function header')
    expect(errorOf('int x;')).toBe("no 'name (' in function header")
    expect(errorOf('int f(a')).toBe('unbalanced parameter list')
  })

  it('reports syntax errors with their code', () => {
    const result = rewriteSignature(lex('int x;'))
    expect(result.ok ? null : result.error.code).toBe(ErrorCode.SYNTAX_ERROR)
  })
})

describe('parameter helpers', () => {
  it('recognizes empty lists', () => {
    expect(isEmptyParamList('')).toBe(true)
    expect(isEmptyParamList(' void ')).toBe(true)
    expect(isEmptyParamList('void *p')).toBe(false)
  })

  it('adds a level of indirection', () => {
    expect(outParam('int', 'o')).toBe('int *o')
    expect(outParam('char * ', 'o')).toBe('char **o')
  })
})
