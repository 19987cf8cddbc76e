import { Router, Request, Response } from 'express';
import { getActiveSession } from '../session';

const router = Router();

router.get('/', (req: Request, res: Response) => {
  const session = getActiveSession();

  if (!session) {
    res.status(503).json({ error: 'No simulation session is active' });
    return;
  }

  const kernel = session.getKernel();
  const trafficLights: Record<string, string | null> = {};
  for (const id of kernel.trafficLight.getIds()) {
    trafficLights[id] = kernel.trafficLight.getState(id) ?? null;
  }

  res.status(200).json({
    state: session.getState(),
    kernelState: kernel.getState(),
    stepNumber: session.getStepNumber(),
    horizon: session.getHorizon(),
    simTimeSeconds: kernel.simulation.getTime(),
    collisions: session.getCollisionCount(),
    vehicles: {
      count: kernel.vehicle.getIds().length,
      ids: kernel.vehicle.getIds(),
    },
    trafficLights,
  });
});

export default router;
