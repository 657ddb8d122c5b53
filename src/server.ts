/**
 * Lockstake — API Server
 *
 * Deploys the staking host from configuration, serves the REST API
 * (see routes.ts) and streams committed staking notifications over
 * WebSocket on /ws.
 */

import { createServer } from 'node:http';
import { config } from './config.js';
import { closeClient } from './chain/client.js';
import { closeWebSocketServer, initWebSocketServer } from './events/index.js';
import { createApp } from './routes.js';
import { deployStaking } from './staking/setup.js';

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------

function main(): void {
  const deployment = deployStaking(config);
  const app = createApp(deployment, { faucetEnabled: config.faucetEnabled });
  const httpServer = createServer(app);

  initWebSocketServer(httpServer);

  httpServer.listen(config.port, () => {
    console.log(`\n  Lockstake API server running on http://localhost:${config.port}`);
    console.log(`  Periods: ${deployment.host.contract.ledger.pool.availablePeriods.join(', ')} | ` +
      `conversion rate: ${config.staking.rewardConversionRate}\n`);

    console.log('  Endpoints:');
    console.log('    GET  /api/staking/pool            — Pool counters + parameters');
    console.log('    GET  /api/staking/:account        — Full stake info');
    console.log('    POST /api/staking/stake           — Deposit / top up');
    console.log('    POST /api/staking/extend          — Re-lock matured stake');
    console.log('    POST /api/staking/withdraw        — Withdraw at maturity');
    console.log('    POST /api/staking/emergency-withdraw — Withdraw early, no rewards');
    console.log('    POST /api/staking/claim           — Claim rewards');
    console.log('    POST /api/staking/pool/top-up     — Fund reward pool');
    if (config.faucetEnabled) {
      console.log('    POST /api/dev/faucet              — Credit native balance');
    }
    console.log(`    WS   ws://localhost:${config.port}/ws — Real-time staking events\n`);
  });

  // Graceful shutdown on SIGINT / SIGTERM
  const shutdown = () => {
    console.log('\n  Shutting down...');
    closeWebSocketServer()
      .then(() => {
        closeClient();
        httpServer.close(() => process.exit(0));
      })
      .catch((err: unknown) => {
        console.error('  Shutdown failed:', err instanceof Error ? err.message : err);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  console.error('  Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
}
