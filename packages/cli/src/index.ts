import { stderr } from "node:process"
import { loadConfig } from "./config"
import {
  runAbandonScenario,
  runBatchScenario,
  runFailScenario,
  runValueScenario,
} from "./scenarios"

function printUsage() {
  console.error(`
Usage:
  npm run demo -- value <number>       Producer writes the number
  npm run demo -- fail [message]       Producer writes a failure
  npm run demo -- abandon              Producer releases its handle without writing
  npm run demo -- batch                Several handoffs served by a producer pool

Environment Variables:
  HANDOFF_DELAY_MS     Producer work time before writing (default: 2000)
  HANDOFF_CONSUMERS    Handoffs in the batch scenario (default: 4)
  HANDOFF_WORKERS      Producers running at once in the batch scenario (default: 2)
`)
}

async function main() {
  const args = process.argv.slice(2)

  if (args.length < 1) {
    printUsage()
    process.exit(1)
  }

  const config = loadConfig()
  const command = args[0]

  switch (command) {
    case `value`: {
      const value = Number(args[1])
      if (args.length < 2 || !Number.isFinite(value)) {
        stderr.write(`Error: number required\n`)
        printUsage()
        process.exit(1)
      }
      await runValueScenario(value, config)
      break
    }

    case `fail`: {
      const message = args.slice(1).join(` `) || `Producer failed!`
      await runFailScenario(message, config)
      break
    }

    case `abandon`: {
      await runAbandonScenario(config)
      break
    }

    case `batch`: {
      const outcomes = await runBatchScenario(config)
      const delivered = outcomes.filter((outcome) => outcome.ok).length
      console.log(`Delivered ${delivered} of ${outcomes.length} values`)
      break
    }

    default:
      stderr.write(`Error: unknown command '${command}'\n`)
      printUsage()
      process.exit(1)
  }
}

main().catch((error) => {
  stderr.write(
    `Fatal error: ${error instanceof Error ? error.message : String(error)}\n`
  )
  process.exit(1)
})
