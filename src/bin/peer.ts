/**
 * Peer process
 *
 *   PEER_ID=2 PEERLOCK_CONFIG_PATH=config/peerlock.example.yaml npm run peer
 */

import { config as loadDotenv } from 'dotenv'
import { applyEnvironmentOverrides, loadConfigAuto, loadEnvironmentOverrides } from '../config'
import { describeError } from '../errors'
import { obs } from '../observability'
import { PeerNode } from '../peer/peer-node'

loadDotenv()

async function main(): Promise<void> {
  const config = applyEnvironmentOverrides(loadConfigAuto(), loadEnvironmentOverrides())
  const logger = obs.configure(config.logging).child({ peerId: config.self })

  const node = new PeerNode({ config, logger })
  await node.start()

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Stopping peer')
    node
      .stop()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error({ error: describeError(error) }, 'Peer did not stop cleanly')
        process.exit(1)
      })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch(error => {
  console.error(`Failed to start peer: ${describeError(error)}`)
  process.exit(1)
})
