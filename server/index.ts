import { createApp } from './app';
import { loadEnvFiles, maskKey, readServerConfig } from './config';
import { buildPipeline } from './pipeline';

const { loadedRootEnv, loadedServerEnv } = loadEnvFiles();
const config = readServerConfig();
const { orchestrator, cdnEnabled } = buildPipeline(config);
const { app, abortAll, inFlightCount } = createApp({ orchestrator, cdnEnabled, config });

const server = app
  .listen(config.port)
  .once('listening', () => {
    console.log(
      `[server] PID=${process.pid} listening on http://localhost:${config.port} | loadedRootEnv=${loadedRootEnv} | loadedServerEnv=${loadedServerEnv} | maskedKey=${maskKey(
        config.gemini.apiKey
      )} | textModel=${config.gemini.textModel} | videoModel=${config.gemini.videoModel} | cdn=${cdnEnabled}`
    );
  })
  .on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`[server] Port ${config.port} is already in use. Stop the other process and retry.`);
      process.exit(1);
    }
    throw err;
  });

const shutdown = (signal: NodeJS.Signals) => {
  console.log(`[server] ${signal} received; cancelling ${inFlightCount()} in-flight generation(s)`);
  abortAll(`Server shutting down (${signal})`);
  server.close(() => process.exit(0));
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
