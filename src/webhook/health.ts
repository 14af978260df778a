/**
 * Health Check Endpoint Handler
 *
 * Returns server status, kill switch state, portal, version and timestamp.
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    killSwitch: appConfig.killSwitch,
    portal: appConfig.bitrix.domain,
    dailySync: appConfig.sync.dailyEnabled,
    version: process.env.npm_package_version ?? 'dev',
  });
}
