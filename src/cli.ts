import { Command } from 'commander'
import { loadConfig } from './config'
import type { CsafeConfig } from './config'
import { describeError } from './errors'
import { Logger } from './utils/logger'
import { runFix } from './commands/fix'
import type { FixCommandOptions } from './commands/fix'
import { runAudit } from './commands/audit'
import type { AuditCommandOptions } from './commands/audit'
import { runDecl } from './commands/decl'

interface GlobalOptions {
  config?: string
  verbose?: boolean
  quiet?: boolean
  errorCode?: string
}

function setup(command: Command): { config: CsafeConfig; logger: Logger } | null {
  const globals = command.optsWithGlobals<GlobalOptions>()
  const logger = new Logger(globals.verbose === true, globals.quiet === true)
  try {
    const loaded = loadConfig({ configPath: globals.config })
    if (loaded.filepath !== null) logger.debug(`using config ${loaded.filepath}`)
    const config = loaded.config
    if (globals.errorCode !== undefined && globals.errorCode.trim() !== '') {
      config.errorCode = globals.errorCode.trim()
    }
    return { config, logger }
  } catch (error) {
    logger.error(`cannot load config: ${describeError(error)}`)
    return null
  }
}

const program = new Command()

program
  .name('csafe')
  .description('Add missing allocation checks to C sources and propagate failures to callers')
  .version('0.1.0')
  .option('--config <path>', 'config file to use instead of searching for one')
  .option('--verbose', 'print debug output')
  .option('--quiet', 'suppress all output except results')
  .option('--error-code <code>', 'expression returned when an allocation fails')

program
  .command('fix')
  .description('rewrite a C file, or every .c file under a directory')
  .argument('<path>', 'file or directory to fix')
  .argument('[output]', 'where to write the fixed file')
  .option('--in-place', 'overwrite the input files')
  .action((path: string, output: string | undefined, options: FixCommandOptions, cmd: Command) => {
    const env = setup(cmd)
    process.exitCode = env === null ? 1 : runFix(path, output, options, env.config, env.logger)
  })

program
  .command('audit')
  .description('list allocation sites and whether they are checked')
  .argument('<file>', 'C file to audit')
  .option('--json', 'print JSON')
  .action((file: string, options: AuditCommandOptions, cmd: Command) => {
    const env = setup(cmd)
    process.exitCode = env === null ? 1 : runAudit(file, options, env.config, env.logger)
  })

program
  .command('decl')
  .description('parse a declaration and print its type chain')
  .argument('<text>', 'declaration, e.g. "int (*x)[3]"')
  .action((text: string, _options: unknown, cmd: Command) => {
    const env = setup(cmd)
    process.exitCode = env === null ? 1 : runDecl(text, env.logger)
  })

program.parse()
