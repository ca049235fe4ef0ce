import { tokenize } from '../lexer/scanner'
import { parseDeclaration } from '../parser/declarations'
import { formatDeclType } from '../ast/builders'
import { attempt, unwrap } from '../errors'
import type { Result } from '../errors'
import type { Logger } from '../utils/logger'

/** `name: chain`, with `(abstract)` standing in for a missing name. */
export function describeDeclaration(text: string): Result<string> {
  return attempt(() => {
    const info = unwrap(parseDeclaration(unwrap(tokenize(text))))
    return `${info.identifier ?? '(abstract)'}: ${formatDeclType(info.type)}`
  })
}

/** `csafe decl <text>` */
export function runDecl(text: string, logger: Logger): number {
  const result = describeDeclaration(text)
  if (!result.ok) {
    logger.error(result.error.message, result.error.details)
    return 1
  }
  console.log(result.value)
  return 0
}
