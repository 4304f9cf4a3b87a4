/**
 * Express routes configuration
 */

import { Router } from 'express';
import { GatewayController } from '../controllers/gateway';
import { AdminController } from '../controllers/admin';
import type { GatewayOrchestrator } from '../services/gatewayOrchestrator';
import type { ServerRegistry } from '../services/serverRegistry';
import type { AdminCredentials } from '../services/adminCredentials';
import { requireAdmin, requireAdminEnabled } from '../middleware/adminAuth';
import { authLimiter, healthLimiter, statusLimiter, wakeLimiter } from '../middleware/rateLimiter';

export interface RouteServices {
  orchestrator: GatewayOrchestrator;
  registry: ServerRegistry;
  credentials: AdminCredentials;
  adminEnabled: boolean;
  /** Stops the process so its supervisor starts it again */
  requestRestart: () => void;
}

export function createRoutes(services: RouteServices): Router {
  const router = Router();

  // Controllers
  const gatewayController = new GatewayController(services.orchestrator);
  const adminController = new AdminController(services.registry, services.credentials, services.requestRestart);

  // Gateway routes
  router.get('/', (req, res) => gatewayController.landing(req, res));
  router.get('/wake/:id', wakeLimiter, (req, res) => gatewayController.wake(req, res));
  router.post('/wake/:id', wakeLimiter, (req, res) => gatewayController.wake(req, res));
  router.get('/ping_status/:id', statusLimiter, (req, res) => gatewayController.pingStatus(req, res));
  router.get('/health', healthLimiter, (req, res) => gatewayController.health(req, res));

  // Admin routes
  router.use('/admin', requireAdminEnabled(services.adminEnabled));
  router.post('/admin/login', authLimiter, (req, res) => adminController.login(req, res));
  router.post('/admin/logout', (req, res) => adminController.logout(req, res));

  router.use('/admin', requireAdmin(services.credentials));
  router.get('/admin/servers', (req, res) => adminController.listServers(req, res));
  router.post('/admin/servers', (req, res) => adminController.createServer(req, res));
  router.put('/admin/servers/:id', (req, res) => adminController.updateServer(req, res));
  router.delete('/admin/servers/:id', (req, res) => adminController.deleteServer(req, res));

  router.get('/admin/users', (req, res) => adminController.listUsers(req, res));
  router.post('/admin/users', (req, res) => adminController.createUser(req, res));
  router.put('/admin/users/:username', (req, res) => adminController.updateUser(req, res));
  router.delete('/admin/users/:username', (req, res) => adminController.deleteUser(req, res));

  router.post('/admin/security/password', (req, res) => adminController.changePassword(req, res));
  router.post('/admin/security/totp/setup', (req, res) => adminController.setupTotp(req, res));
  router.post('/admin/security/totp/verify', (req, res) => adminController.verifyTotp(req, res));
  router.post('/admin/security/totp/disable', (req, res) => adminController.disableTotp(req, res));

  router.post('/admin/restart', (req, res) => adminController.restart(req, res));

  return router;
}
