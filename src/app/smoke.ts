import { loadConfig, loadDotenv } from '../config/index.js'
import { formatOutcomeMessage } from '../integrations/dooray/format.js'
import { parseCommandKind, resolveTargetDate } from '../integrations/dooray/command.js'
import type { ActionOutcome } from '../types/index.js'
import { closeLogger, configureLogger, logger } from '../utils/logger.js'
import { getZonedDate } from '../utils/time.js'
import { closeAttendanceStack, createAttendanceStack } from './container.js'

const USAGE = 'Usage: smoke <enter|leave> [YYYY-MM-DD]'

function exitCodeFor(outcome: ActionOutcome): number {
  return outcome.status === 'SUCCESS' || outcome.status === 'ALREADY_DONE' ? 0 : 1
}

async function main(argv: string[]): Promise<number> {
  const [action, date] = argv
  const kind = parseCommandKind(action ? `/${action}` : undefined)
  if (!kind) {
    console.error(USAGE)
    return 2
  }

  loadDotenv()
  const config = loadConfig()
  await configureLogger({
    level: config.LOG_LEVEL,
    summaryPath: config.logSummaryPath,
    detailPath: config.logDetailPath,
  })

  const target = resolveTargetDate(date ?? null, getZonedDate(config.timezone))
  if (!target.ok) {
    console.error(`Invalid date: ${target.value}\n${USAGE}`)
    return 2
  }

  const stack = createAttendanceStack(config)
  try {
    const outcome = await stack.engine.perform({ kind, targetDate: target.date })
    console.log(JSON.stringify(outcome, null, 2))
    console.log(formatOutcomeMessage(outcome))
    return exitCodeFor(outcome)
  }
  finally {
    await closeAttendanceStack(stack)
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error) => {
    logger.error('Smoke run failed', { error })
    process.exitCode = 1
  })
  .finally(() => closeLogger())
