import { loadScrapeConfig, type ScrapeConfig } from '../../config/config.js'
import { ConfigError } from '../../lib/errors.js'
import { createPriceFetcher } from '../../bootstrap.js'
import { NOT_FOUND_COST, type PriceLookup } from '../../types.js'

export interface LookupCommandInput {
  part: string
}

export interface LookupCommandDeps {
  createLookup: (scrape: ScrapeConfig) => PriceLookup
  print: (line: string) => void
  printError: (line: string) => void
  env: NodeJS.ProcessEnv
}

const defaultDeps: LookupCommandDeps = {
  createLookup: scrape => createPriceFetcher(scrape),
  print: line => console.log(line),
  printError: line => console.error(line),
  env: process.env,
}

export async function runLookupCommand(
  input: LookupCommandInput,
  deps: LookupCommandDeps = defaultDeps
): Promise<number> {
  const part = input.part.trim()
  if (!part) {
    deps.printError('lookup requires --part <vendor part number>')
    return 2
  }

  let scrape: ScrapeConfig
  try {
    scrape = loadScrapeConfig(deps.env)
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error
    deps.printError(error.issues.join('\n'))
    return 2
  }

  const lookup = deps.createLookup(scrape)
  const price = await lookup.lookupPrice(part)
  deps.print(`${part},${price ?? NOT_FOUND_COST}`)
  return price === null ? 1 : 0
}
