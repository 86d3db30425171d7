import { loadConfig, type PriceSyncConfig } from '../../config/config.js'
import { loggers } from '../../config/logger.js'
import { classifyError, formatErrorForLog } from '../../lib/errors.js'
import { createOrchestrator } from '../../bootstrap.js'
import type { RunSummary } from '../../types.js'

export interface RunCommandDeps {
  loadConfig: () => PriceSyncConfig
  runJob: (config: PriceSyncConfig) => Promise<RunSummary>
  print: (line: string) => void
}

const defaultDeps: RunCommandDeps = {
  loadConfig: () => loadConfig(),
  runJob: config => createOrchestrator(config).run(),
  print: line => console.log(line),
}

export async function runRunCommand(deps: RunCommandDeps = defaultDeps): Promise<number> {
  try {
    const summary = await deps.runJob(deps.loadConfig())
    deps.print(JSON.stringify(summary, null, 2))
    return 0
  } catch (error) {
    loggers.cli.error('Run failed', formatErrorForLog(classifyError(error)), error)
    return 1
  }
}
