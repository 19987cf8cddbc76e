import { Router, Request, Response } from 'express';
import { isSessionRunning } from '../session';

const router = Router();

router.get('/', (req: Request, res: Response) => {
  res.status(200).json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    sessionRunning: isSessionRunning(),
    environment: process.env.NODE_ENV || 'development'
  });
});

export default router;
