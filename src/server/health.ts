/**
 * Health Check Endpoint Handler
 *
 * Reports process liveness and which parts of the pipeline are switched on.
 * Does not touch Redis; queue depth and unit counts belong to /units.
 */

import type { Request, Response } from 'express';
import { classificationConfig } from '../classification/config.js';
import { appConfig } from '../config.js';
import { intakeConfig } from '../intake/config.js';

export interface HealthReport {
  status: 'ok';
  timestamp: string;
  killSwitch: boolean;
  mailIntake: boolean;
  classification: boolean;
  version: string;
}

export function healthHandler(_req: Request, res: Response<HealthReport>): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    killSwitch: appConfig.killSwitch,
    mailIntake: intakeConfig.enabled,
    classification: classificationConfig.enabled,
    version: process.env.npm_package_version ?? 'dev',
  });
}
