import {
  startSession,
  stopSession,
  getActiveSession,
  isSessionRunning,
  _resetSessionSingleton,
  type SessionRunnerConfig,
} from '../src/session';
import { Kernel } from '../src/kernel';
import { ConnectError } from '../src/errors';
import { FakeProtocol, SpySupervisor, noSleep, type Outcome } from './helpers/fakes';

const LONG_SESSION: SessionRunnerConfig = { horizon: 1000, stepIntervalSeconds: 0 };

function createKernel(connectOutcome?: Outcome): Kernel {
  return new Kernel(
    'traci',
    { port: 8813, testMode: true, maxStartAttempts: 1 },
    { supervisor: new SpySupervisor(), protocol: new FakeProtocol(connectOutcome), sleep: noSleep },
  );
}

beforeEach(async () => {
  jest.spyOn(console, 'log').mockImplementation(() => { });
  jest.spyOn(console, 'debug').mockImplementation(() => { });
  jest.spyOn(console, 'error').mockImplementation(() => { });
  await _resetSessionSingleton();
});

afterEach(async () => {
  await _resetSessionSingleton();
  jest.restoreAllMocks();
});

describe('startSession', () => {
  it('should start a session and make it active', () => {
    const session = startSession(createKernel(), LONG_SESSION);

    expect(session.getState()).toBe('running');
    expect(getActiveSession()).toBe(session);
    expect(isSessionRunning()).toBe(true);
  });

  it('should throw while a session is already running', () => {
    startSession(createKernel(), LONG_SESSION);

    expect(() => startSession(createKernel(), LONG_SESSION)).toThrow('A session is already running');
  });

  it('should log a failed session instead of rejecting', async () => {
    const refused = new ConnectError('refused');
    const session = startSession(createKernel(() => refused), LONG_SESSION);

    await stopSession();

    expect(session.getState()).toBe('failed');
    expect(console.error).toHaveBeenCalledWith('[Session] Session failed:', refused);
  });
});

describe('stopSession', () => {
  it('should stop the session and wait for the kernel to close', async () => {
    const kernel = createKernel();
    const session = startSession(kernel, LONG_SESSION);

    await stopSession();

    expect(session.getState()).toBe('stopped');
    expect(kernel.getState()).toBe('closed');
    expect(getActiveSession()).toBeNull();
    expect(isSessionRunning()).toBe(false);
  });

  it('should be a no-op without a session', async () => {
    await expect(stopSession()).resolves.toBeUndefined();
    expect(getActiveSession()).toBeNull();
  });

  it('should allow a new session once the previous one stopped', async () => {
    startSession(createKernel(), LONG_SESSION);
    await stopSession();

    const next = startSession(createKernel(), LONG_SESSION);
    expect(getActiveSession()).toBe(next);
  });
});
