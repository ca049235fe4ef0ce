import { readFileSync } from 'node:fs'
import { tokenize } from '../lexer/scanner'
import { LineIndex } from '../ast/locations'
import { findAllocations } from '../analysis/allocations'
import type { AllocationSite } from '../analysis/allocations'
import { scanTopLevel } from '../refactor/orchestrator'
import { attempt, describeError, unwrap } from '../errors'
import type { Result } from '../errors'
import type { CsafeConfig } from '../config'
import type { Logger } from '../utils/logger'

export type SiteStatus = 'checked' | 'unchecked' | 'used-before-check' | 'returned'

export interface AuditEntry {
  // Enclosing function, null at file scope
  function: string | null
  allocator: string
  variable: string | null
  line: number
  // 1-based
  column: number
  status: SiteStatus
}

export interface AuditCommandOptions {
  json?: boolean
}

function statusOf(site: AllocationSite): SiteStatus {
  if (site.isReturnStmt) return 'returned'
  if (site.isChecked) return 'checked'
  return site.usedBeforeCheck ? 'used-before-check' : 'unchecked'
}

export function auditSource(source: string, config: CsafeConfig): Result<AuditEntry[]> {
  return attempt(() => {
    const tokens = unwrap(tokenize(source))
    const sites = unwrap(findAllocations(tokens, { allocators: config.allocators }))
    const { functions } = scanTopLevel(tokens)
    const lines = new LineIndex(source)

    return sites.map((site) => {
      const owner = functions.find(
        (fn) => site.tokenIndex > fn.bodyStart && site.tokenIndex < fn.bodyEnd,
      )
      const tok = tokens.at(site.tokenIndex)
      const pos = lines.positionFor(tok === undefined ? 0 : tok.start)
      return {
        function: owner === undefined ? null : owner.name,
        allocator: site.spec.name,
        variable: site.varName,
        line: pos.line,
        column: pos.column + 1,
        status: statusOf(site),
      }
    })
  })
}

/** One line per site: `file:line:col allocator -> variable status (in function)`. */
export function formatAudit(file: string, entries: readonly AuditEntry[]): string[] {
  return entries.map((e) => {
    const target = e.variable === null ? '' : ` -> ${e.variable}`
    const scope = e.function === null ? '' : ` (in ${e.function})`
    return `${file}:${e.line}:${e.column} ${e.allocator}${target} ${e.status}${scope}`
  })
}

/** `csafe audit <file>`. Returns 1 when the file could not be audited. */
export function runAudit(
  file: string,
  options: AuditCommandOptions,
  config: CsafeConfig,
  logger: Logger,
): number {
  let source: string
  try {
    source = readFileSync(file, 'utf8')
  } catch (error) {
    logger.error(`cannot read ${file}: ${describeError(error)}`)
    return 1
  }

  const result = auditSource(source, config)
  if (!result.ok) {
    logger.error(`${file}: ${result.error.message}`, result.error.details)
    return 1
  }
  const entries = result.value
  if (options.json) {
    console.log(JSON.stringify(entries, null, 2))
    return 0
  }
  for (const line of formatAudit(file, entries)) {
    console.log(line)
  }
  const open = entries.filter((e) => e.status === 'unchecked' || e.status === 'used-before-check')
  if (open.length > 0) {
    logger.warn(`${open.length} of ${entries.length} allocation site(s) unchecked`)
  } else {
    logger.success(`${entries.length} allocation site(s), all checked`)
  }
  return 0
}
