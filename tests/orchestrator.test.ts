import { tokenize } from '../src/lexer/scanner'
import type { TokenList } from '../src/lexer/token-list'
import { orchestrateFix, scanTopLevel } from '../src/refactor/orchestrator'
import type { OrchestrateOptions } from '../src/refactor/orchestrator'
import { ErrorCode } from '../src/errors'

function lex(source: string): TokenList {
  const result = tokenize(source)
  if (!result.ok) throw result.error
  return result.value
}

function fix(source: string, options?: OrchestrateOptions): string {
  const result = orchestrateFix(source, options)
  if (!result.ok) throw result.error
  return result.value
}

describe('scanTopLevel', () => {
  const tokens = lex(
    [
      '#include <stdlib.h>',
      'struct s { int a; };',
      'int f(void);',
      'int g(int x) { return x; }',
      'int arr[2] = { 1, 2 };',
      'static void h(void) { g(1); }',
    ].join('\n'),
  )
  const { functions, prototypes } = scanTopLevel(tokens)

  it('finds definitions and their bodies', () => {
    expect(functions.map((fn) => fn.name)).toEqual(['g', 'h'])
    const [g] = functions
    expect(tokens.text(g.start)).toBe('int')
    expect(tokens.text(g.headerEnd)).toBe(')')
    expect(tokens.join(g.bodyStart, g.bodyEnd + 1)).toBe('{ return x; }')
    expect(functions[1].signature.storage).toBe('static ')
  })

  it('finds prototypes', () => {
    expect(prototypes).toHaveLength(1)
    expect(prototypes[0].name).toBe('f')
    expect(tokens.join(prototypes[0].start, prototypes[0].end + 1)).toBe('int f(void)')
  })
})

describe('orchestrateFix', () => {
  it('propagates a failure status up the call graph', () => {
    const source = [
      '#include <stdlib.h>',
      'char *dup_name(const char *name);',
      '',
      'char *dup_name(const char *name) {',
      '  return strdup(name);',
      '}',
      '',
      'void setup(void) {',
      '  char *n = dup_name("x");',
      '  use(n);',
      '}',
      '',
      'int main(void) {',
      '  setup();',
      '  return 0;',
      '}',
      '',
    ].join('\n')

    expect(fix(source)).toBe(
      [
        '#include <stdlib.h>',
        'int dup_name(const char *name, char **out);',
        '',
        'int dup_name(const char *name, char **out) {',
        '  { char *_safe_ret = strdup(name); if (!_safe_ret) return ENOMEM; ' +
          '*out = _safe_ret; return 0; }',
        '}',
        '',
        'int setup(void) { int rc = 0;',
        '  char *n ; rc = dup_name("x", &n); if (rc != 0) return rc;',
        '  use(n); return 0;',
        '}',
        '',
        'int main(void) { int rc = 0;',
        '  rc = setup(); if (rc != 0) return rc;',
        '  return 0;',
        '}',
        '',
      ].join('\n'),
    )
  })

  it('guards main without changing its signature', () => {
    expect(fix('int main(void) { char *p = malloc(4); free(p); return 0; }')).toBe(
      'int main(void) { char *p = malloc(4); if (!p) { return ENOMEM; } free(p); return 0; }',
    )
  })

  it('uses the configured error code and out parameter', () => {
    const options: OrchestrateOptions = { errorCode: '-1', outArgName: 'res' }
    expect(fix('char *mk(void) { return malloc(8); }', options)).toBe(
      'int mk(char **res) { { char *_safe_ret = malloc(8); if (!_safe_ret) return -1; ' +
        '*res = _safe_ret; return 0; } }',
    )
  })

  it('leaves files without unchecked allocations alone', () => {
    const checked = 'void f(void) { char *p = malloc(1); if (!p) return; free(p); }'
    expect(fix(checked)).toBe(checked)
    const plain = 'int add(int a, int b) { return a + b; }'
    expect(fix(plain)).toBe(plain)
  })

  it('leaves a function returning a struct by value unchanged', () => {
    const source = 'struct S mk(void) { struct S s; s.p = malloc(4); return s; }'
    expect(fix(source)).toBe(source)
  })

  it('rejects a source that is not a string', () => {
    const result: unknown = Reflect.apply(orchestrateFix, undefined, [undefined])
    expect(result).toMatchObject({ ok: false, error: { code: ErrorCode.INVALID_ARGUMENT } })
  })
})
