import 'dotenv/config';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { createLogger, setLogLevel } from './logger.js';

const log = createLogger('main');

const config = loadConfig();
setLogLevel(config.LOG_LEVEL);

if (config.PORT !== null) {
  // Server mode, when the host assigns a port
  const { startServer } = await import('./server.js');
  startServer(config);
} else {
  // One-shot mode: local CLI / dry-run
  const { buildPipelineDeps, runPipeline } = await import('./pipeline.js');
  try {
    const deps = await buildPipelineDeps(config);
    const result = await runPipeline(deps, {
      dryRun: config.DRY_RUN,
      platform: config.PLATFORM,
      triggeredBy: 'cli',
    });
    log.info('Done', { runId: result.runId, matches: result.results.length, saved: result.saved.length });
    process.exit(0);
  } catch (error) {
    log.error('Run failed', { error: describeError(error) });
    process.exit(1);
  }
}
