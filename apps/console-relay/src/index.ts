// Sentry must be imported first
import './instrument.js';
import * as Sentry from '@sentry/node';

import { ConfigError, loadConfig } from './config.js';
import { loadCapture } from './capture/capture-loader.js';
import { SSHServer } from './server/ssh-server.js';
import { StatsServer } from './server/stats-server.js';

const startTime = new Date();

async function main() {
  const config = loadConfig();
  const capture = loadCapture(config.capturePath);
  console.log(
    `Loaded capture ${config.capturePath} (${capture.width}x${capture.height}, ${capture.frames.length} frames)`
  );
  if (config.bypassMode) {
    console.log('Bypass mode: sending raw text only');
  }

  const sshServer = new SSHServer({
    config,
    capture,
    banner: 'gridrelay console relay - press q to quit\r\n',
  });
  sshServer.start();

  let statsServer: StatsServer | null = null;
  if (config.statsPort > 0) {
    statsServer = new StatsServer({
      port: config.statsPort,
      getSessionCount: () => sshServer.getSessionCount(),
      getTransportMetrics: () => sshServer.getTransportMetrics(),
      startTime,
    });
    statsServer.start();
  }

  // Graceful shutdown with connection draining
  let isShuttingDown = false;
  const shutdown = async () => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    console.log('\nGraceful shutdown initiated...');
    sshServer.stopAccepting();

    const drainTimeout = 10 * 1000;
    const drainStart = Date.now();
    while (sshServer.getSessionCount() > 0 && Date.now() - drainStart < drainTimeout) {
      console.log(`Waiting for ${sshServer.getSessionCount()} sessions to close...`);
      await new Promise(resolve => setTimeout(resolve, 1000));
    }

    sshServer.stop();
    statsServer?.stop();
    await Sentry.close(2000);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  console.log(`Connect with: ssh -p ${config.sshPort} localhost`);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Fatal error:', error);
    Sentry.captureException(error);
  }
  process.exit(1);
});
