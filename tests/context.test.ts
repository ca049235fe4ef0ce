import { RefactorContext, applyRefactoringToString } from '../src/refactor/context'
import type { ApplyRefactoringOptions } from '../src/refactor/context'
import { ErrorCode, RewriteError } from '../src/errors'

function refactor(
  context: RefactorContext | null,
  source: string,
  options?: ApplyRefactoringOptions,
): string {
  const result = applyRefactoringToString(context, source, options)
  if (!result.ok) throw result.error
  return result.value
}

describe('RefactorContext', () => {
  it('records and finds functions', () => {
    const ctx = new RefactorContext()
    ctx.add('load', 'PtrToIntOut', 'struct cfg *')
    ctx.add('init', 'VoidToInt')
    expect(ctx.size).toBe(2)
    expect(ctx.find('load')).toEqual({
      name: 'load',
      type: 'PtrToIntOut',
      returnType: 'struct cfg *',
    })
    expect(ctx.find('init')).toEqual({ name: 'init', type: 'VoidToInt', returnType: null })
    expect(ctx.find('missing')).toBeNull()
    expect(ctx.functions.map((fn) => fn.name)).toEqual(['load', 'init'])
  })

  it('returns the first record for a repeated name', () => {
    const ctx = new RefactorContext()
    ctx.add('f', 'VoidToInt')
    ctx.add('f', 'PtrToIntOut', 'int *')
    expect(ctx.find('f')?.type).toBe('VoidToInt')
  })

  it('rejects an empty name', () => {
    const ctx = new RefactorContext()
    expect(() => ctx.add('', 'VoidToInt')).toThrowError(RewriteError)
    expect(ctx.size).toBe(0)
  })

  it('clears idempotently', () => {
    const ctx = new RefactorContext()
    ctx.add('f', 'VoidToInt')
    ctx.clear()
    ctx.clear()
    expect(ctx.size).toBe(0)
    expect(ctx.find('f')).toBeNull()
  })
})

describe('applyRefactoringToString', () => {
  it('only adds guards without a context', () => {
    expect(refactor(null, 'void f() { char *p = malloc(4); }')).toBe(
      'void f() { char *p = malloc(4); if (!p) { return ENOMEM; } }',
    )
  })

  it('rewrites calls to functions in the context', () => {
    const ctx = new RefactorContext()
    ctx.add('do_work', 'VoidToInt')
    expect(refactor(ctx, 'void f() { do_work(); }')).toBe(
      'void f() { int rc = 0; rc = do_work(); if (rc != 0) return rc; }',
    )
  })

  it('passes the error code and allocators through', () => {
    const options: ApplyRefactoringOptions = {
      errorCode: '-1',
      allocators: [{ name: 'xalloc', checkStyle: 'PtrNull' }],
    }
    expect(refactor(null, 'void f() { char *p = xalloc(4); }', options)).toBe(
      'void f() { char *p = xalloc(4); if (!p) { return -1; } }',
    )
  })

  it('keeps the realloc rewrite inside an unbraced if', () => {
    expect(refactor(null, 'void f(char *p, int c) { if (c) p = realloc(p, 8); use(p); }')).toBe(
      'void f(char *p, int c) { if (c) { void *_safe_tmp = realloc(p, 8); ' +
        'if (!_safe_tmp) return ENOMEM; p = _safe_tmp; } use(p); }',
    )
  })

  it('returns unchanged text when nothing applies', () => {
    const source = 'int add(int a, int b) { return a + b; }\n'
    expect(refactor(new RefactorContext(), source)).toBe(source)
  })

  it('rejects a source that is not a string', () => {
    const result: unknown = Reflect.apply(applyRefactoringToString, undefined, [null, 7])
    expect(result).toMatchObject({ ok: false, error: { code: ErrorCode.INVALID_ARGUMENT } })
  })
})
