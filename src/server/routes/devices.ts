import { Router } from 'express';
import { pickDefaultDevice, type AudioDevice } from '../../audio/devices.js';
import { describeError } from '../../errors.js';

export function devicesRouter(listDevices: () => Promise<AudioDevice[]>): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    try {
      const devices = await listDevices();
      res.json({ ok: true, devices, defaultDevice: pickDefaultDevice(devices)?.index ?? null });
    } catch (err) {
      console.error('[api] Device listing failed:', describeError(err));
      res.status(500).json({ ok: false, error: describeError(err) });
    }
  });

  return router;
}
