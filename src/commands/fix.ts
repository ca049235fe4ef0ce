import { readFileSync, statSync, writeFileSync } from 'node:fs'
import { globbySync } from 'globby'
import { orchestrateFix } from '../refactor/orchestrator'
import { describeError } from '../errors'
import type { CsafeConfig } from '../config'
import type { Logger } from '../utils/logger'

export interface FixCommandOptions {
  inPlace?: boolean
}

/** `.c` files under `dir`, recursively, in sorted order. */
export function collectSources(dir: string): string[] {
  return globbySync('**/*.c', {
    cwd: dir,
    absolute: true,
    onlyFiles: true,
    followSymbolicLinks: false,
  }).sort()
}

/** Fix one source string; null when the fix failed and was logged. */
export function fixSource(
  source: string,
  label: string,
  config: CsafeConfig,
  logger: Logger,
): string | null {
  const result = orchestrateFix(source, { ...config, logger })
  if (!result.ok) {
    logger.error(`${label}: ${result.error.message}`, result.error.details)
    return null
  }
  return result.value
}

function fixFile(input: string, output: string, config: CsafeConfig, logger: Logger): boolean {
  let source: string
  try {
    source = readFileSync(input, 'utf8')
  } catch (error) {
    logger.error(`cannot read ${input}: ${describeError(error)}`)
    return false
  }

  const fixed = fixSource(source, input, config, logger)
  if (fixed === null) return false
  if (fixed === source) {
    logger.debug(`${input}: nothing to change`)
    if (output === input) return true
  }

  try {
    writeFileSync(output, fixed)
  } catch (error) {
    logger.error(`cannot write ${output}: ${describeError(error)}`)
    return false
  }
  logger.success(output === input ? `fixed ${input}` : `fixed ${input} -> ${output}`)
  return true
}

/**
 * `csafe fix <path> [output]`. A single file goes to `output`, back to
 * itself with `--in-place`, or to stdout. Directories need `--in-place`.
 * Returns the exit code: 1 when any file failed.
 */
export function runFix(
  target: string,
  output: string | undefined,
  options: FixCommandOptions,
  config: CsafeConfig,
  logger: Logger,
): number {
  let isDirectory: boolean
  try {
    isDirectory = statSync(target).isDirectory()
  } catch (error) {
    logger.error(`cannot access ${target}: ${describeError(error)}`)
    return 1
  }

  if (isDirectory) {
    if (!options.inPlace || output !== undefined) {
      logger.error('a directory can only be fixed with --in-place and no output path')
      return 1
    }
    const files = collectSources(target)
    logger.info(`fixing ${files.length} file(s) under ${target}`)
    const failed = files.filter((file) => !fixFile(file, file, config, logger)).length
    if (failed > 0) logger.warn(`${failed} of ${files.length} file(s) could not be fixed`)
    return failed > 0 ? 1 : 0
  }

  if (output !== undefined) {
    return fixFile(target, output, config, logger) ? 0 : 1
  }
  if (options.inPlace) {
    return fixFile(target, target, config, logger) ? 0 : 1
  }

  let source: string
  try {
    source = readFileSync(target, 'utf8')
  } catch (error) {
    logger.error(`cannot read ${target}: ${describeError(error)}`)
    return 1
  }
  const fixed = fixSource(source, target, config, logger)
  if (fixed === null) return 1
  process.stdout.write(fixed)
  return 0
}
