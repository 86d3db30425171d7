import '../env.js'
import { runLookupCommand } from './commands/lookup.js'
import { runRunCommand } from './commands/run.js'
import { asString, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Price Sync CLI')
  console.log('')
  console.log('Commands:')
  console.log('  run                          reset outputs, price every part number, write CSVs')
  console.log('  lookup --part <vendor part>  print the current price for one vendor part number')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'run':
      exitCode = await runRunCommand()
      break
    case 'lookup':
      exitCode = await runLookupCommand({ part: asString(flags.part) })
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch(error => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
