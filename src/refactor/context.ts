// The set of functions whose signatures were changed, and the one-call
// pipeline that rewrites their call sites in a source string.

import { tokenize } from '../lexer/scanner'
import { findAllocations } from '../analysis/allocations'
import type { AllocatorSpec } from '../analysis/allocations'
import { NO_TRANSFORM, rewriteBody } from '../rewriter/body'
import { attempt, invalidArgument, unwrap } from '../errors'
import type { Result } from '../errors'
import type { Logger } from '../utils/logger'

/**
 * How a function's signature was changed.
 * - VoidToInt: `void f(a)` became `int f(a)`
 * - PtrToIntOut: `T f(a)` became `int f(a, T *out)`
 */
export type RefactorType = 'VoidToInt' | 'PtrToIntOut'

export interface RefactoredFunction {
  readonly name: string
  readonly type: RefactorType
  // Original return type (`char *`), needed to declare temporaries
  readonly returnType: string | null
}

export interface FunctionLookup {
  find(name: string): RefactoredFunction | null
}

export class RefactorContext implements FunctionLookup {
  private funcs: RefactoredFunction[] = []

  get size(): number {
    return this.funcs.length
  }

  /** Records are borrowed by every rewrite that consults the context; they are never copied. */
  get functions(): readonly RefactoredFunction[] {
    return this.funcs
  }

  add(name: string, type: RefactorType, returnType: string | null = null): void {
    if (typeof name !== 'string' || name === '') {
      throw invalidArgument('RefactorContext.add: name must be a non-empty string')
    }
    this.funcs.push({ name, type, returnType })
  }

  find(name: string): RefactoredFunction | null {
    return this.funcs.find((fn) => fn.name === name) ?? null
  }

  clear(): void {
    this.funcs = []
  }
}

export interface ApplyRefactoringOptions {
  allocators?: readonly AllocatorSpec[]
  errorCode?: string
  statusVar?: string
  gnuExtensions?: boolean
  logger?: Logger
}

/**
 * Tokenize `source`, find its allocation sites and rewrite it with no
 * signature transform: unchecked allocations get guards and calls to the
 * functions in `context` are rewritten. A null context only adds guards.
 */
export function applyRefactoringToString(
  context: RefactorContext | null,
  source: string,
  options: ApplyRefactoringOptions = {},
): Result<string> {
  return attempt(() => {
    if (typeof source !== 'string') {
      throw invalidArgument('applyRefactoringToString: source must be a string')
    }
    const tokens = unwrap(tokenize(source, { gnuExtensions: options.gnuExtensions }))
    const sites = unwrap(
      findAllocations(tokens, { allocators: options.allocators, logger: options.logger }),
    )
    const transform = { ...NO_TRANSFORM, errorCode: options.errorCode ?? NO_TRANSFORM.errorCode }
    return unwrap(
      rewriteBody(tokens, sites, context, transform, {
        statusVar: options.statusVar,
        logger: options.logger,
      }),
    )
  })
}
