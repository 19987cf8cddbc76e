import express, { Application } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import healthCheckRouter from './routes/healthCheck';
import sessionRouter from './routes/session';
import { getConfig } from './config';
import { applyLogLevel } from './logging';
import { requireSessionApiKey } from './middleware/auth';
import { Kernel, buildEngineCommand } from './kernel';
import { startSession, stopSession } from './session';

dotenv.config();

const config = getConfig();

console.log('=== Simulation Kernel Configuration ===');
console.log(`Backend: ${config.session.backend}`);
console.log(`Engine: ${config.derived.engineBinary} on port ${config.simulation.port} (${config.simulation.numClients} client(s))`);
console.log(`Step: ${config.simulation.stepLength}s (${config.derived.stepsPerSimulatedSecond.toFixed(1)} steps per simulated second)`);
console.log(`Horizon: ${config.session.horizon} steps (${config.derived.horizonSimulatedSeconds.toFixed(1)} simulated seconds)`);
console.log(`Settle delay: ${config.derived.settleDelayMs}ms${config.simulation.testMode ? ' (test mode)' : ''}`);
const engineCommand = buildEngineCommand(config.simulation);
console.log(`Command: ${[engineCommand.command, ...engineCommand.args].join(' ')}`);
console.log(`Log Level: ${config.runtime.logLevel}`);
console.log('=======================================\n');

applyLogLevel(config.runtime.logLevel);

const app: Application = express();
const PORT = process.env.PORT || 3001;

app.use(cors());
app.use(express.json());

app.use('/api/health-check', healthCheckRouter);

app.use(requireSessionApiKey);

// All routes after this point require API key authentication
app.use('/api/session', sessionRouter);

const server = app.listen(PORT, () => {
  console.log(`Server is running on port ${PORT}`);
  console.log(`Health check available at http://localhost:${PORT}/api/health-check`);

  if (config.session.autoStart) {
    const kernel = new Kernel(config.session.backend, config.simulation);
    const session = startSession(kernel, {
      horizon: config.session.horizon,
      stepIntervalSeconds: config.session.stepIntervalSeconds,
    });

    session.registerHandler('progress', (ctx) => {
      if (ctx.stepNumber % 100 === 0) {
        console.log(`[Session] Step ${ctx.stepNumber} | t=${ctx.simTimeSeconds.toFixed(1)}s | vehicles=${ctx.vehicleCount}`);
      }
    });
  }
});

function shutdown(signal: string): void {
  console.log(`[Server] Received ${signal}, shutting down...`);
  stopSession()
    .catch((err: unknown) => {
      console.error('[Server] Error stopping the session:', err);
    })
    .finally(() => {
      server.close();
      process.exit(0);
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
