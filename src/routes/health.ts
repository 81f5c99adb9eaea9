import { Router } from 'express';

export type StorageKind = 'postgres' | 'memory';

export function createHealthRouter(storage: StorageKind) {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'tic-tac-toe', storage });
  });

  return router;
}
