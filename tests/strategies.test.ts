import { tokenize } from '../src/lexer/scanner'
import type { TokenList } from '../src/lexer/token-list'
import { findAllocations } from '../src/analysis/allocations'
import { PatchList, applyPatches } from '../src/rewriter/patches'
import { guardText, strategyInjectSafetyChecks } from '../src/rewriter/strategies'
import type { SafetyConfig } from '../src/rewriter/strategies'
import { ErrorCode } from '../src/errors'

function lex(source: string): TokenList {
  const result = tokenize(source)
  if (!result.ok) throw result.error
  return result.value
}

/** Helper: inject checks into `source` and return the patched text and count */
function inject(source: string, config?: SafetyConfig): { text: string; patched: number } {
  const tokens = lex(source)
  const sites = findAllocations(tokens)
  if (!sites.ok) throw sites.error
  const patches = new PatchList()
  const count = strategyInjectSafetyChecks(tokens, sites.value, patches, { config })
  if (!count.ok) throw count.error
  const text = applyPatches(tokens, patches)
  if (!text.ok) throw text.error
  return { text: text.value, patched: count.value }
}

describe('guardText', () => {
  it('spells each check style', () => {
    expect(guardText('PtrNull', 'p', 'ENOMEM')).toBe(' if (!p) { return ENOMEM; }')
    expect(guardText('IntNegative', 'n', '-1')).toBe(' if (n < 0) { return -1; }')
    expect(guardText('IntNonzero', 'r', 'E')).toBe(' if (r != 0) { return E; }')
  })
})

describe('strategyInjectSafetyChecks', () => {
  describe('generic guards', () => {
    it('guards a declaration', () => {
      expect(inject('char *s = strdup(t);')).toEqual({
        text: 'char *s = strdup(t); if (!s) { return ENOMEM; }',
        patched: 1,
      })
    })

    it('uses the check style of the allocator', () => {
      expect(inject('n = asprintf(&s, "x");').text).toBe(
        'n = asprintf(&s, "x"); if (n < 0) { return ENOMEM; }',
      )
      expect(inject('r = _mkdir(d);').text).toBe('r = _mkdir(d); if (r != 0) { return ENOMEM; }')
    })

    it('returns the configured error code', () => {
      expect(inject('p = malloc(1);', { errorCode: '-1' }).text).toBe(
        'p = malloc(1); if (!p) { return -1; }',
      )
    })

    it('guards a realloc into a different variable', () => {
      expect(inject('q = realloc(p, 8);').text).toBe(
        'q = realloc(p, 8); if (!q) { return ENOMEM; }',
      )
    })

    it('braces an unbraced if body together with its guard', () => {
      expect(inject('if (c) p = malloc(n); use(p);')).toEqual({
        text: 'if (c) { p = malloc(n); if (!p) { return ENOMEM; } } use(p);',
        patched: 1,
      })
    })

    it('braces else and loop bodies', () => {
      expect(inject('if (a) x(); else p = malloc(1);').text).toBe(
        'if (a) x(); else { p = malloc(1); if (!p) { return ENOMEM; } }',
      )
      expect(inject('while (n--) q = strdup(s);').text).toBe(
        'while (n--) { q = strdup(s); if (!q) { return ENOMEM; } }',
      )
    })
  })

  describe('self-assigning realloc', () => {
    it('goes through a temporary', () => {
      expect(inject('void f() { p = realloc(p, 8); use(p); }')).toEqual({
        text:
          'void f() { { void *_safe_tmp = realloc(p, 8); if (!_safe_tmp) return ENOMEM; ' +
          'p = _safe_tmp; } use(p); }',
        patched: 1,
      })
    })

    it('handles member targets', () => {
      expect(inject('ctx->buf = realloc(ctx->buf, n);').text).toBe(
        '{ void *_safe_tmp = realloc(ctx->buf, n); if (!_safe_tmp) return ENOMEM; ' +
          'ctx->buf = _safe_tmp; }',
      )
    })

    it('rewrites the body of an unbraced if', () => {
      expect(inject('if (c) p = realloc(p, 8); use(p);')).toEqual({
        text:
          'if (c) { void *_safe_tmp = realloc(p, 8); if (!_safe_tmp) return ENOMEM; ' +
          'p = _safe_tmp; } use(p);',
        patched: 1,
      })
    })

    it('rewrites a labelled statement', () => {
      expect(inject('retry: p = realloc(p, 8);').text).toBe(
        'retry: { void *_safe_tmp = realloc(p, 8); if (!_safe_tmp) return ENOMEM; ' +
          'p = _safe_tmp; }',
      )
    })
  })

  describe('sites left alone', () => {
    it('skips checked sites', () => {
      const source = 'p = malloc(1); if (!p) return;'
      expect(inject(source)).toEqual({ text: source, patched: 0 })
    })

    it('skips calls without a target', () => {
      expect(inject('malloc(4);')).toEqual({ text: 'malloc(4);', patched: 0 })
    })

    it('skips allocations in a for header', () => {
      const source = 'for (p = malloc(1); p; ) x;'
      expect(inject(source)).toEqual({ text: source, patched: 0 })
    })
  })

  it('rejects missing allocations', () => {
    const result: unknown = Reflect.apply(strategyInjectSafetyChecks, undefined, [
      lex('x'),
      null,
      new PatchList(),
    ])
    expect(result).toMatchObject({ ok: false, error: { code: ErrorCode.INVALID_ARGUMENT } })
  })
})
