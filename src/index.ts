// Public API.
// Usage: import { orchestrateFix } from 'c-safe-rewrite';

// Registers the parser's prototype extensions
import './parser/declarations'

export type { TokenKind, Token } from './lexer/token'
export { Scanner, tokenize } from './lexer/scanner'
export type { ScanOptions } from './lexer/scanner'
export { TokenList } from './lexer/token-list'

export type * from './ast/nodes'
export { chainKinds, baseOf, formatDeclType } from './ast/builders'
export { LineIndex } from './ast/locations'
export { Parser } from './parser/parser'
export { parseDeclaration } from './parser/declarations'

export { DEFAULT_ALLOCATORS, findAllocations, isCheckStyle } from './analysis/allocations'
export type {
  AllocationSite,
  AllocatorSpec,
  CheckStyle,
  FindAllocationsOptions,
} from './analysis/allocations'

export { PatchList, applyPatches, isInsertion } from './rewriter/patches'
export type { Patch } from './rewriter/patches'
export {
  DEFAULT_SAFETY_CONFIG,
  guardText,
  injectGuard,
  strategyInjectSafetyChecks,
  strategyRewriteRealloc,
} from './rewriter/strategies'
export type { SafetyConfig, SafetyOptions } from './rewriter/strategies'
export { NO_TRANSFORM, rewriteBody } from './rewriter/body'
export type { RewriteBodyOptions, SignatureTransform, TransformKind } from './rewriter/body'
export { parseSignature, rewriteSignature } from './rewriter/signature'
export type { ParsedSignature, SignatureOptions } from './rewriter/signature'

export { RefactorContext, applyRefactoringToString } from './refactor/context'
export type {
  ApplyRefactoringOptions,
  FunctionLookup,
  RefactorType,
  RefactoredFunction,
} from './refactor/context'
export { orchestrateFix, scanTopLevel } from './refactor/orchestrator'
export type { FunctionDef, OrchestrateOptions, Prototype, TopLevel } from './refactor/orchestrator'

export { DEFAULT_CONFIG, loadConfig, mergeConfig } from './config'
export type { CsafeConfig, LoadConfigOptions, LoadedConfig } from './config'
export { ErrorCode, RewriteError, attempt, unwrap } from './errors'
export type { ErrorDetails, Result } from './errors'
export { Logger, silentLogger } from './utils/logger'
