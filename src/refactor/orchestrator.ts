// Whole-file fix: find the functions that allocate without checking,
// propagate the need for a status return up the call graph, and rewrite
// the affected signatures, prototypes and bodies in one pass.

import { TokenKind } from '../lexer/token'
import type { TokenList } from '../lexer/token-list'
import { tokenize } from '../lexer/scanner'
import { findAllocations } from '../analysis/allocations'
import type { AllocationSite, AllocatorSpec } from '../analysis/allocations'
import { NO_TRANSFORM, rewriteBody } from '../rewriter/body'
import type { SignatureTransform } from '../rewriter/body'
import { parseSignature, rewriteSignature } from '../rewriter/signature'
import type { ParsedSignature } from '../rewriter/signature'
import { PatchList, applyPatches } from '../rewriter/patches'
import { RefactorContext } from './context'
import { attempt, invalidArgument, unwrap } from '../errors'
import type { Result } from '../errors'
import type { Logger } from '../utils/logger'

// ============================================================================
// Top-level scan
// ============================================================================

export interface FunctionDef {
  name: string
  signature: ParsedSignature
  // First token of the header
  start: number
  // Last significant token of the header
  headerEnd: number
  // The body's `{` and `}`
  bodyStart: number
  bodyEnd: number
}

export interface Prototype {
  name: string
  start: number
  // Last significant token before the `;`
  end: number
}

export interface TopLevel {
  functions: FunctionDef[]
  prototypes: Prototype[]
}

function signatureOf(tokens: TokenList, start: number, end: number): ParsedSignature | null {
  for (let j = start; j < end; j++) {
    if (tokens.kind(j) === TokenKind.Assign) return null
  }
  const result = attempt(() => parseSignature(tokens.slice(start, end)))
  return result.ok ? result.value : null
}

/**
 * Split the file into top-level function definitions and prototypes.
 * Anything at brace depth zero that ends in `) {` with a `name (` anchor is
 * a definition; `...);` with the same anchor is a prototype.
 */
export function scanTopLevel(tokens: TokenList): TopLevel {
  const functions: FunctionDef[] = []
  const prototypes: Prototype[] = []
  let declStart = -1
  let parens = 0

  for (let i = 0; i < tokens.length; i++) {
    const kind = tokens.kind(i)
    if (tokens.isTrivia(i)) {
      if (kind === TokenKind.Directive) declStart = -1
      continue
    }
    if (declStart < 0) declStart = i

    switch (kind) {
      case TokenKind.LParen:
        parens++
        break
      case TokenKind.RParen:
        parens = Math.max(0, parens - 1)
        break
      case TokenKind.Semicolon: {
        if (parens > 0) break
        const last = tokens.prevSignificant(i - 1, declStart)
        if (tokens.kind(last) === TokenKind.RParen) {
          const sig = signatureOf(tokens, declStart, last + 1)
          if (sig !== null) prototypes.push({ name: sig.name, start: declStart, end: last })
        }
        declStart = -1
        break
      }
      case TokenKind.LBrace: {
        const close = tokens.matching(i)
        if (close < 0) return { functions, prototypes }
        const last = tokens.prevSignificant(i - 1, declStart)
        const sig =
          parens === 0 && tokens.kind(last) === TokenKind.RParen
            ? signatureOf(tokens, declStart, last + 1)
            : null
        if (sig !== null) {
          functions.push({
            name: sig.name,
            signature: sig,
            start: declStart,
            headerEnd: last,
            bodyStart: i,
            bodyEnd: close,
          })
          declStart = -1
        }
        // Braces of a struct or initializer leave the declaration open until its `;`
        i = close
        break
      }
      default:
        break
    }
  }
  return { functions, prototypes }
}

// ============================================================================
// Call graph
// ============================================================================

interface FuncNode {
  def: FunctionDef
  isMain: boolean
  returnsPointer: boolean
  // A struct or union returned by value has no room for a status
  returnsAggregate: boolean
  uncheckedAlloc: boolean
  callers: Set<number>
  marked: boolean
}

function returnsPointer(sig: ParsedSignature): boolean {
  return !sig.isVoid && sig.returnType.includes('*')
}

function returnsAggregate(sig: ParsedSignature): boolean {
  return !sig.isVoid && !returnsPointer(sig) && /\b(struct|union)\b/.test(sig.returnType)
}

function buildGraph(
  tokens: TokenList,
  functions: readonly FunctionDef[],
  sites: readonly AllocationSite[],
): FuncNode[] {
  const nodes = functions.map((def) => ({
    def,
    isMain: def.name === 'main',
    returnsPointer: returnsPointer(def.signature),
    returnsAggregate: returnsAggregate(def.signature),
    uncheckedAlloc: sites.some(
      (s) => !s.isChecked && s.tokenIndex > def.bodyStart && s.tokenIndex < def.bodyEnd,
    ),
    callers: new Set<number>(),
    marked: false,
  }))

  const byName = new Map<string, number>()
  nodes.forEach((node, idx) => byName.set(node.def.name, idx))

  nodes.forEach((caller, callerIdx) => {
    for (let t = caller.def.bodyStart; t < caller.def.bodyEnd; t++) {
      if (tokens.kind(t) !== TokenKind.Identifier) continue
      if (tokens.kind(tokens.nextSignificant(t + 1)) !== TokenKind.LParen) continue
      const callee = byName.get(tokens.text(t))
      if (callee !== undefined && callee !== callerIdx) {
        nodes[callee].callers.add(callerIdx)
      }
    }
  })
  return nodes
}

// A function keeps its signature when it is main or already returns a value
function keepsSignature(node: FuncNode): boolean {
  return node.isMain || (!node.def.signature.isVoid && !node.returnsPointer)
}

function propagate(nodes: FuncNode[], idx: number, logger: Logger | undefined): void {
  const node = nodes[idx]
  if (node.marked) return
  if (node.returnsAggregate) {
    logger?.warn(`'${node.def.name}' returns a struct by value and is left unchanged`)
    return
  }
  node.marked = true
  logger?.debug(`marked function '${node.def.name}' for refactoring`)
  if (keepsSignature(node)) return
  for (const caller of node.callers) {
    propagate(nodes, caller, logger)
  }
}

// ============================================================================
// Entry point
// ============================================================================

export interface OrchestrateOptions {
  errorCode?: string
  successCode?: string
  outArgName?: string
  statusVar?: string
  allocators?: readonly AllocatorSpec[]
  gnuExtensions?: boolean
  logger?: Logger
}

function relativize(site: AllocationSite, offset: number): AllocationSite {
  return {
    ...site,
    tokenIndex: site.tokenIndex - offset,
    assignIndex: site.assignIndex < 0 ? -1 : site.assignIndex - offset,
  }
}

/**
 * Fix every unchecked allocation in `source` and make failures reach the
 * callers: `void` functions start returning a status, pointer-returning
 * ones return a status and pass the pointer through an out parameter, and
 * every call site of a changed function checks the status. Text outside
 * the changed functions and prototypes is kept byte for byte.
 */
export function orchestrateFix(source: string, options: OrchestrateOptions = {}): Result<string> {
  return attempt(() => {
    if (typeof source !== 'string') {
      throw invalidArgument('orchestrateFix: source must be a string')
    }
    const logger = options.logger
    const errorCode = options.errorCode ?? NO_TRANSFORM.errorCode
    const successCode = options.successCode ?? NO_TRANSFORM.successCode
    const argName = options.outArgName ?? NO_TRANSFORM.argName

    const tokens = unwrap(tokenize(source, { gnuExtensions: options.gnuExtensions }))
    const sites = unwrap(findAllocations(tokens, { allocators: options.allocators, logger }))
    const { functions, prototypes } = scanTopLevel(tokens)
    const nodes = buildGraph(tokens, functions, sites)

    nodes.forEach((node, idx) => {
      if (node.uncheckedAlloc) propagate(nodes, idx, logger)
    })

    const context = new RefactorContext()
    for (const node of nodes) {
      if (!node.marked || keepsSignature(node)) continue
      const sig = node.def.signature
      if (node.returnsPointer) {
        context.add(node.def.name, 'PtrToIntOut', sig.returnType)
      } else {
        context.add(node.def.name, 'VoidToInt', null)
      }
    }

    const patches = new PatchList()
    for (const node of nodes) {
      if (!node.marked) continue
      const { def } = node
      const refactored = context.find(def.name)
      let transform: SignatureTransform = { ...NO_TRANSFORM, errorCode, successCode, argName }

      if (refactored !== null) {
        const header = tokens.slice(def.start, def.headerEnd + 1)
        patches.add(def.start, def.headerEnd + 1, unwrap(rewriteSignature(header, { argName })))
        transform = {
          ...transform,
          kind: refactored.type === 'PtrToIntOut' ? 'RetPtrToArg' : 'VoidToInt',
          returnType: refactored.returnType,
        }
      }

      const local = sites
        .filter((s) => s.tokenIndex > def.bodyStart && s.tokenIndex < def.bodyEnd)
        .map((s) => relativize(s, def.bodyStart))
      const body = tokens.slice(def.bodyStart, def.bodyEnd + 1)
      const text = unwrap(
        rewriteBody(body, local, context, transform, {
          statusVar: options.statusVar,
          logger,
        }),
      )
      patches.add(def.bodyStart, def.bodyEnd + 1, text)
    }

    for (const proto of prototypes) {
      if (context.find(proto.name) === null) continue
      const header = tokens.slice(proto.start, proto.end + 1)
      patches.add(proto.start, proto.end + 1, unwrap(rewriteSignature(header, { argName })))
      logger?.debug(`rewrote prototype of '${proto.name}'`)
    }

    return unwrap(applyPatches(tokens, patches))
  })
}
