/**
 * Print service process
 *
 *   PEERLOCK_CONFIG_PATH=config/peerlock.example.yaml npm run print-server
 */

import { config as loadDotenv } from 'dotenv'
import { applyEnvironmentOverrides, loadConfigAuto, loadEnvironmentOverrides } from '../config'
import { describeError } from '../errors'
import { obs } from '../observability'
import { PrintService } from '../resource/print-service'

loadDotenv()

async function main(): Promise<void> {
  const config = applyEnvironmentOverrides(loadConfigAuto(), loadEnvironmentOverrides())
  const logger = obs.configure(config.logging).child({ component: 'print-service' })

  const service = new PrintService({ ...config.printService, logger })
  await service.start()

  const shutdown = () => {
    service
      .stop()
      .then(() => {
        logger.info(service.stats(), 'Print service summary')
        process.exit(0)
      })
      .catch(error => {
        logger.error({ error: describeError(error) }, 'Print service did not stop cleanly')
        process.exit(1)
      })
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

main().catch(error => {
  console.error(`Failed to start print service: ${describeError(error)}`)
  process.exit(1)
})
