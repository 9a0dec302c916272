/**
 * In-process simulation: N peers contend for one resource
 *
 *   npm run simulate -- <peers=3> <rounds=2>
 */

import { config as loadDotenv } from 'dotenv'
import { obs } from '../observability'
import { LocalCluster } from '../simulation/local-cluster'

loadDotenv()

async function main(): Promise<void> {
  const [peersArg = '3', roundsArg = '2'] = process.argv.slice(2)
  const size = Number(peersArg)
  const rounds = Number(roundsArg)
  if (!Number.isInteger(size) || size < 1 || !Number.isInteger(rounds) || rounds < 1) {
    throw new Error('Usage: simulate <peers> <rounds> (positive integers)')
  }

  const logger = obs.configure({ level: process.env.LOG_LEVEL || 'info', pretty: true })
  const cluster = new LocalCluster({
    size,
    network: { latencyMs: () => Math.floor(Math.random() * 5) },
    resource: { durationMs: 20 },
    logger,
  })

  const results = await cluster.runRounds(rounds)
  await cluster.stop()

  const failures = results.filter(result => result.status === 'rejected').length
  logger.info(
    {
      order: cluster.resource.order,
      printed: cluster.resource.history.length,
      failures,
      maxConcurrent: cluster.resource.maxConcurrent,
    },
    cluster.resource.overlaps === 0 ? 'No overlapping critical sections' : 'Mutual exclusion violated'
  )

  // Let the pretty transport flush before exiting
  logger.flush()
  process.exitCode = cluster.resource.overlaps === 0 && failures === 0 ? 0 : 1
}

main().catch(error => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
