/**
 * Admin panel API controller
 */

import { Request, Response } from 'express';
import { AppError } from '../middleware/errorHandler';
import { currentAdmin, regenerateSession } from '../middleware/adminAuth';
import { validateRequest } from '../middleware/validateRequest';
import type { AdminCredentials } from '../services/adminCredentials';
import { RegistryError, ServerRegistry } from '../services/serverRegistry';
import type { ServerEntry } from '../types';
import { logger } from '../utils/logger';
import {
  changePasswordSchema,
  createUserSchema,
  loginSchema,
  resetPasswordSchema,
  totpDisableSchema,
  totpVerifySchema,
  usernameParamSchema,
} from '../validators/adminValidator';
import { serverIdParamSchema, serverInputSchema } from '../validators/serverValidator';

const LOGIN_FAILURE_MESSAGES = {
  INVALID_CREDENTIALS: 'Invalid username or password',
  TOTP_REQUIRED: 'Two-factor code required',
  INVALID_TOTP: 'Invalid two-factor code',
} as const;

export class AdminController {
  constructor(
    private registry: ServerRegistry,
    private credentials: AdminCredentials,
    private requestRestart: () => void
  ) {}

  /**
   * @swagger
   * /admin/login:
   *   post:
   *     summary: Log in to the admin panel
   *     tags: [Admin]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [username, password]
   *             properties:
   *               username: { type: string, example: admin }
   *               password: { type: string }
   *               totpCode: { type: string, example: '123456' }
   *     responses:
   *       200:
   *         description: Logged in; the session cookie is set
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   *       403:
   *         $ref: '#/components/responses/Forbidden'
   */
  async login(req: Request, res: Response): Promise<void> {
    const { username, password, totpCode } = validateRequest(loginSchema, req);
    const result = await this.credentials.login(username, password, totpCode);

    if (!result.ok) {
      logger.warn('Admin login failed', { username, reason: result.reason, ip: req.ip });
      throw new AppError(LOGIN_FAILURE_MESSAGES[result.reason], 401, result.reason);
    }

    await regenerateSession(req);
    req.session.adminUser = result.user.username;
    logger.info('Admin logged in', { username: result.user.username });
    res.json({ user: result.user });
  }

  /**
   * @swagger
   * /admin/logout:
   *   post:
   *     summary: Log out of the admin panel
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       200:
   *         description: Logged out
   */
  logout(req: Request, res: Response): void {
    const username = req.session.adminUser;
    delete req.session.adminUser;
    if (username) {
      logger.info('Admin logged out', { username });
    }
    res.json({ success: true });
  }

  /**
   * @swagger
   * /admin/servers:
   *   get:
   *     summary: List configured servers
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
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
   *                     $ref: '#/components/schemas/Server'
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   *   post:
   *     summary: Add a server
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/ServerInput'
   *     responses:
   *       201:
   *         description: Server added
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   */
  listServers(_req: Request, res: Response): void {
    res.json({ servers: this.registry.list() });
  }

  async createServer(req: Request, res: Response): Promise<void> {
    const input = validateRequest(serverInputSchema, req);
    const server = await this.registry.addServer(input);
    logger.info('Server added', { serverId: server.id, name: server.name, admin: req.session.adminUser });
    res.status(201).json({ server });
  }

  /**
   * @swagger
   * /admin/servers/{id}:
   *   put:
   *     summary: Replace a server definition
   *     description: The server keeps its boot history
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/ServerInput'
   *     responses:
   *       200:
   *         description: Server updated
   *       404:
   *         $ref: '#/components/responses/NotFound'
   *   delete:
   *     summary: Remove a server
   *     description: Later servers move down one id. The last server cannot be removed.
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Server removed
   *       404:
   *         $ref: '#/components/responses/NotFound'
   *       409:
   *         description: Only one server is configured
   */
  async updateServer(req: Request, res: Response): Promise<void> {
    const { id } = validateRequest(serverIdParamSchema, req, 'params');
    const input = validateRequest(serverInputSchema, req);
    const server = await this.registry.updateServer(id, input);

    if (!server) {
      throw new AppError(`Server ${id} not found`, 404, 'SERVER_NOT_FOUND');
    }

    logger.info('Server updated', { serverId: id, admin: req.session.adminUser });
    res.json({ server });
  }

  async deleteServer(req: Request, res: Response): Promise<void> {
    const { id } = validateRequest(serverIdParamSchema, req, 'params');

    let removed: ServerEntry | undefined;
    try {
      removed = await this.registry.deleteServer(id);
    } catch (error) {
      if (error instanceof RegistryError && error.code === 'LAST_SERVER') {
        throw new AppError(error.message, 409, 'LAST_SERVER');
      }
      throw error;
    }

    if (!removed) {
      throw new AppError(`Server ${id} not found`, 404, 'SERVER_NOT_FOUND');
    }

    logger.info('Server removed', { serverId: id, name: removed.name, admin: req.session.adminUser });
    res.json({ server: removed });
  }

  /**
   * @swagger
   * /admin/users:
   *   get:
   *     summary: List admin users
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       200:
   *         description: Admin users
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 users:
   *                   type: array
   *                   items:
   *                     $ref: '#/components/schemas/AdminUser'
   *   post:
   *     summary: Create an admin user
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       201:
   *         description: User created
   *       409:
   *         description: Username already taken
   */
  listUsers(_req: Request, res: Response): void {
    res.json({ users: this.credentials.listUsers() });
  }

  async createUser(req: Request, res: Response): Promise<void> {
    const { username, password } = validateRequest(createUserSchema, req);
    const created = await this.credentials.createUser(username, password);

    if (!created) {
      throw new AppError(`User ${username} already exists`, 409, 'USER_EXISTS');
    }

    res.status(201).json({ user: this.credentials.getUser(username) });
  }

  /**
   * @swagger
   * /admin/users/{username}:
   *   put:
   *     summary: Reset a user's password
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       200:
   *         description: Password reset
   *       404:
   *         $ref: '#/components/responses/NotFound'
   *   delete:
   *     summary: Delete an admin user
   *     description: The logged-in user cannot delete their own account
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       200:
   *         description: User deleted
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   *       404:
   *         $ref: '#/components/responses/NotFound'
   */
  async updateUser(req: Request, res: Response): Promise<void> {
    const { username } = validateRequest(usernameParamSchema, req, 'params');
    const { password } = validateRequest(resetPasswordSchema, req);

    if (!(await this.credentials.setPassword(username, password))) {
      throw new AppError(`User ${username} not found`, 404, 'USER_NOT_FOUND');
    }

    logger.info('Admin password reset', { username, admin: req.session.adminUser });
    res.json({ user: this.credentials.getUser(username) });
  }

  deleteUser(req: Request, res: Response): void {
    const { username } = validateRequest(usernameParamSchema, req, 'params');

    if (username === currentAdmin(req)) {
      throw new AppError('You cannot delete your own account', 400, 'CANNOT_DELETE_SELF');
    }

    if (!this.credentials.deleteUser(username)) {
      throw new AppError(`User ${username} not found`, 404, 'USER_NOT_FOUND');
    }

    res.json({ success: true });
  }

  /**
   * @swagger
   * /admin/security/password:
   *   post:
   *     summary: Change the logged-in user's password
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       200:
   *         description: Password changed
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   */
  async changePassword(req: Request, res: Response): Promise<void> {
    const username = currentAdmin(req);
    const { currentPassword, newPassword } = validateRequest(changePasswordSchema, req);

    if (!(await this.credentials.verifyPassword(username, currentPassword))) {
      throw new AppError('Current password is incorrect', 401, 'INVALID_CREDENTIALS');
    }

    await this.credentials.setPassword(username, newPassword);
    logger.info('Admin changed password', { username });
    res.json({ success: true });
  }

  /**
   * @swagger
   * /admin/security/totp/setup:
   *   post:
   *     summary: Start two-factor enrolment
   *     description: Returns a new secret and QR code. Two-factor stays off until the code is verified.
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       200:
   *         description: Enrolment data
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 secret: { type: string }
   *                 otpauthUrl: { type: string }
   *                 qrDataUrl: { type: string }
   */
  async setupTotp(req: Request, res: Response): Promise<void> {
    const username = currentAdmin(req);
    const enrollment = await this.credentials.beginTotpSetup(username);

    if (!enrollment) {
      throw new AppError(`User ${username} not found`, 404, 'USER_NOT_FOUND');
    }

    res.json(enrollment);
  }

  /**
   * @swagger
   * /admin/security/totp/verify:
   *   post:
   *     summary: Confirm two-factor enrolment
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       200:
   *         description: Two-factor enabled
   *       400:
   *         $ref: '#/components/responses/BadRequest'
   */
  verifyTotp(req: Request, res: Response): void {
    const username = currentAdmin(req);
    const { code } = validateRequest(totpVerifySchema, req);

    if (!this.credentials.verifyTotp(username, code)) {
      throw new AppError('Invalid two-factor code', 400, 'INVALID_TOTP');
    }

    logger.info('Two-factor authentication enabled', { username });
    res.json({ totpEnabled: true });
  }

  /**
   * @swagger
   * /admin/security/totp/disable:
   *   post:
   *     summary: Turn off two-factor authentication
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       200:
   *         description: Two-factor disabled
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   */
  async disableTotp(req: Request, res: Response): Promise<void> {
    const username = currentAdmin(req);
    const { password } = validateRequest(totpDisableSchema, req);

    if (!(await this.credentials.verifyPassword(username, password))) {
      throw new AppError('Password is incorrect', 401, 'INVALID_CREDENTIALS');
    }

    this.credentials.disableTotp(username);
    logger.info('Two-factor authentication disabled', { username });
    res.json({ totpEnabled: false });
  }

  /**
   * @swagger
   * /admin/restart:
   *   post:
   *     summary: Restart the gateway
   *     description: Flushes pending registry writes and exits once the response is sent, leaving the process supervisor to start the gateway again. A listen port change takes effect this way.
   *     tags: [Admin]
   *     security:
   *       - sessionCookie: []
   *     responses:
   *       202:
   *         description: Restart scheduled
   *       401:
   *         $ref: '#/components/responses/Unauthorized'
   */
  restart(req: Request, res: Response): void {
    logger.warn('Restart requested from the admin panel', { admin: currentAdmin(req) });
    res.once('finish', () => this.requestRestart());
    res.status(202).json({ success: true, message: 'Restarting. Reload in a few seconds.' });
  }
}
