/**
 * Public gateway controller: landing page data, wake, readiness polling and health
 */

import { Request, Response } from 'express';
import { AppError } from '../middleware/errorHandler';
import { validateRequest } from '../middleware/validateRequest';
import type { GatewayOrchestrator } from '../services/gatewayOrchestrator';
import type { ServerEntry } from '../types';
import { pinSubmissionSchema, statusQuerySchema } from '../validators/serverValidator';

function serverNotFound(rawId: string): AppError {
  return new AppError(`Server ${rawId} not found`, 400, 'SERVER_NOT_FOUND');
}

function serverSummary(server: ServerEntry) {
  return { id: server.id, name: server.name };
}

export class GatewayController {
  constructor(private orchestrator: GatewayOrchestrator) {}

  /**
   * @swagger
   * /:
   *   get:
   *     summary: List servers
   *     description: Servers this gateway can wake, with lock state for the current session and boot estimates
   *     tags: [Gateway]
   *     responses:
   *       200:
   *         description: Server list
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 servers:
   *                   type: array
   *                   items:
   *                     type: object
   *                     properties:
   *                       id: { type: integer, example: 0 }
   *                       name: { type: string, example: 'Game server' }
   *                       locked: { type: boolean }
   *                       unlocked: { type: boolean }
   *                       strategy: { type: string, enum: [fixed-delay, active-probe] }
   *                       estimateSeconds: { type: integer, nullable: true, example: 45 }
   *                       wakeUrl: { type: string, example: '/wake/0' }
   */
  landing(req: Request, res: Response): void {
    res.json({ servers: this.orchestrator.landing(req.session) });
  }

  /**
   * @swagger
   * /wake/{id}:
   *   get:
   *     summary: Wake a server
   *     description: |
   *       Sends a magic packet and returns how the client should wait for the server.
   *       Fixed-delay servers also get a `Refresh` header pointing at their URL.
   *       Locked servers answer with a PIN challenge until the session is unlocked.
   *     tags: [Gateway]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *         description: Server position in the registry
   *     responses:
   *       200:
   *         description: Wake sent (readiness plan) or PIN challenge
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   *       500:
   *         $ref: '#/components/responses/InternalError'
   *   post:
   *     summary: Submit a PIN for a locked server
   *     description: A correct PIN unlocks the server for this session for 24 hours and redirects to the landing page
   *     tags: [Gateway]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               pin: { type: string, example: '1234' }
   *         application/x-www-form-urlencoded:
   *           schema:
   *             type: object
   *             properties:
   *               pin: { type: string }
   *     responses:
   *       303:
   *         description: PIN accepted, redirect to /
   *       401:
   *         description: Incorrect PIN
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   */
  async wake(req: Request, res: Response): Promise<void> {
    const rawId = req.params.id;
    const submitting = req.method === 'POST';
    const submittedPin = submitting ? validateRequest(pinSubmissionSchema, req).pin : undefined;

    const outcome = await this.orchestrator.handleWake({
      rawId,
      session: req.session,
      method: submitting ? 'submit' : 'read',
      submittedPin,
    });

    switch (outcome.type) {
      case 'not-found':
        throw serverNotFound(outcome.rawId);

      case 'pin-required':
        res.status(outcome.pinError ? 401 : 200).json({
          server: serverSummary(outcome.server),
          pinRequired: true,
          pinError: outcome.pinError,
          ...(outcome.pinError && { message: 'Incorrect PIN' }),
        });
        return;

      case 'unlocked':
        res.redirect(303, '/');
        return;

      case 'dispatch-failed':
        throw new AppError(outcome.message, 500, outcome.kind);

      case 'dispatched': {
        const { plan } = outcome;
        if (plan.strategy === 'fixed-delay') {
          res.set('Refresh', `${plan.waitSeconds};url=${plan.redirectUrl}`);
        }
        res.json({
          server: serverSummary(outcome.server),
          sent: true,
          ...plan,
        });
        return;
      }
    }
  }

  /**
   * @swagger
   * /ping_status/{id}:
   *   get:
   *     summary: Probe a waking server
   *     description: |
   *       One TCP connection attempt to the server's monitor address. When the server is online and
   *       `elapsed` is positive, the value is kept as a boot time sample.
   *     tags: [Gateway]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *       - in: query
   *         name: elapsed
   *         schema:
   *           type: number
   *         description: Seconds since the wake was sent
   *     responses:
   *       200:
   *         description: Probe result
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 online: { type: boolean }
   *                 redirectUrl: { type: string, example: 'http://panel.lan' }
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   *       403:
   *         $ref: '#/components/responses/Forbidden'
   */
  async pingStatus(req: Request, res: Response): Promise<void> {
    const { elapsed } = validateRequest(statusQuerySchema, req, 'query');
    const outcome = await this.orchestrator.checkStatus({
      rawId: req.params.id,
      session: req.session,
      elapsedSeconds: elapsed,
    });

    switch (outcome.type) {
      case 'not-found':
        throw serverNotFound(outcome.rawId);
      case 'probe-not-configured':
        throw new AppError(
          `Server ${outcome.server.id} has no monitor address configured`,
          400,
          'PROBE_NOT_CONFIGURED'
        );
      case 'locked':
        throw new AppError(`Server ${outcome.server.id} is locked`, 403, 'SERVER_LOCKED');
      case 'status':
        res.json(outcome.result);
        return;
    }
  }

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Health check
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Service is healthy
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 status: { type: string, example: ok }
   *                 servers: { type: integer, example: 2 }
   *                 uptime: { type: number, example: 3600.5 }
   *                 timestamp: { type: string, format: date-time }
   */
  health(_req: Request, res: Response): void {
    res.json({
      status: 'ok',
      servers: this.orchestrator.serverCount(),
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  }
}
