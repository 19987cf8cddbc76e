import { Request, Response, Router, RequestHandler } from 'express';

// Mock the session singleton module
const mockGetActiveSession = jest.fn();
const mockIsSessionRunning = jest.fn();
jest.mock('../src/session', () => ({
  getActiveSession: mockGetActiveSession,
  isSessionRunning: mockIsSessionRunning,
}));

// Import routes after mocks are set up
import healthCheckRouter from '../src/routes/healthCheck';
import sessionRouter from '../src/routes/session';

interface RouteLayer {
  route?: {
    path: string;
    stack: Array<{ handle: RequestHandler }>;
  };
}

// Helper to simulate Express route handling
function createMockRes(): { res: Partial<Response>; statusFn: jest.Mock; jsonFn: jest.Mock } {
  const jsonFn = jest.fn();
  const statusFn = jest.fn().mockReturnValue({ json: jsonFn });
  return {
    res: { status: statusFn, json: jsonFn } as Partial<Response>,
    statusFn,
    jsonFn,
  };
}

function getRouteHandler(router: Router): (req: Request, res: Response) => void {
  // Express Router stores routes in router.stack
  const stack: RouteLayer[] = router.stack;
  const handler = stack.find((layer) => layer.route?.path === '/')?.route?.stack[0]?.handle;
  if (!handler) {
    throw new Error('Router has no GET / handler');
  }
  return (req, res) => handler(req, res, jest.fn());
}

function createMockSession() {
  return {
    getState: () => 'running',
    getStepNumber: () => 12,
    getHorizon: () => 3000,
    getCollisionCount: () => 1,
    getKernel: () => ({
      getState: () => 'connected',
      simulation: { getTime: () => 1.3 },
      vehicle: { getIds: () => ['veh0', 'veh1'] },
      trafficLight: {
        getIds: () => ['J1', 'J2'],
        getState: (id: string) => (id === 'J1' ? 'GrGr' : undefined),
      },
    }),
  };
}

beforeEach(() => {
  jest.clearAllMocks();
});

describe('GET /api/health-check', () => {
  const handler = getRouteHandler(healthCheckRouter);

  it('should report ok while no session runs', () => {
    mockIsSessionRunning.mockReturnValue(false);
    const { res, statusFn, jsonFn } = createMockRes();

    handler({} as Request, res as Response);

    expect(statusFn).toHaveBeenCalledWith(200);
    const body = jsonFn.mock.calls[0][0];
    expect(body.status).toBe('ok');
    expect(body.sessionRunning).toBe(false);
    expect(body.environment).toBe(process.env.NODE_ENV || 'development');
    expect(typeof body.uptime).toBe('number');
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it('should report a running session', () => {
    mockIsSessionRunning.mockReturnValue(true);
    const { res, jsonFn } = createMockRes();

    handler({} as Request, res as Response);

    expect(jsonFn.mock.calls[0][0].sessionRunning).toBe(true);
  });
});

describe('GET /api/session', () => {
  const handler = getRouteHandler(sessionRouter);

  it('should return 503 if no session is active', () => {
    mockGetActiveSession.mockReturnValue(null);
    const { res, statusFn, jsonFn } = createMockRes();

    handler({} as Request, res as Response);

    expect(statusFn).toHaveBeenCalledWith(503);
    expect(jsonFn).toHaveBeenCalledWith({ error: 'No simulation session is active' });
  });

  it('should return the session and kernel status', () => {
    mockGetActiveSession.mockReturnValue(createMockSession());
    const { res, statusFn, jsonFn } = createMockRes();

    handler({} as Request, res as Response);

    expect(statusFn).toHaveBeenCalledWith(200);
    expect(jsonFn).toHaveBeenCalledWith({
      state: 'running',
      kernelState: 'connected',
      stepNumber: 12,
      horizon: 3000,
      simTimeSeconds: 1.3,
      collisions: 1,
      vehicles: { count: 2, ids: ['veh0', 'veh1'] },
      trafficLights: { J1: 'GrGr', J2: null },
    });
  });
});
