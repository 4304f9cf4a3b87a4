import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import type { Application } from 'express';
import { authenticator } from 'otplib';
import { createApp, SESSION_COOKIE_NAME } from '../app';
import { AccessLockManager } from '../services/accessLockManager';
import { AdminCredentials } from '../services/adminCredentials';
import { AdminUserDatabase } from '../services/adminUserDatabase';
import { RegistryBootTimeEstimator } from '../services/bootTimeEstimator';
import { GatewayOrchestrator } from '../services/gatewayOrchestrator';
import { ReadinessDetector } from '../services/readinessDetector';
import { ServerRegistry } from '../services/serverRegistry';
import { WakeDispatcher } from '../services/wakeDispatcher';

jest.mock('../utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const registryDocument = {
  PORT: 5000,
  SERVERS: [
    {
      NAME: 'Game Panel',
      WOL_MAC_ADDRESS: '00:11:22:33:44:55',
      SITE_URL: 'http://panel.test.lan',
      WAIT_TIME_SECONDS: 30,
    },
    {
      NAME: 'Media',
      WOL_MAC_ADDRESS: '00:11:22:33:44:66',
      SITE_URL: 'http://media.test.lan',
      WAIT_TIME_SECONDS: 90,
      MONITOR_IP: '10.0.0.20',
      MONITOR_PORT: 8096,
      BOOT_HISTORY: [40, 50],
    },
  ],
};

describe('Admin API', () => {
  let dir: string;
  let registryPath: string;
  let registry: ServerRegistry;
  let db: AdminUserDatabase;
  let app: Application;
  let requestRestart: jest.Mock;

  const loggedInAgent = async () => {
    const agent = request.agent(app);
    await agent.post('/admin/login').send({ username: 'admin', password: 'test-secret' }).expect(200);
    return agent;
  };

  const readRegistry = (): { SERVERS: Array<Record<string, unknown>> } =>
    JSON.parse(readFileSync(registryPath, 'utf-8'));

  beforeEach(async () => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'admin-test-'));
    registryPath = path.join(dir, 'servers.json');
    writeFileSync(registryPath, JSON.stringify(registryDocument), 'utf-8');

    registry = new ServerRegistry(registryPath);
    await registry.load();

    db = new AdminUserDatabase(':memory:');
    db.initialize();
    const credentials = new AdminCredentials(db);
    await credentials.seedInitialUser('admin', 'test-secret');

    const estimator = new RegistryBootTimeEstimator(registry);
    const orchestrator = new GatewayOrchestrator({
      registry,
      dispatcher: new WakeDispatcher({ mode: 'library', commandTimeoutMs: 1000 }),
      readiness: new ReadinessDetector({
        probeTimeoutMs: 200,
        pollIntervalSeconds: 2,
        estimator,
        probe: jest.fn().mockResolvedValue(false),
      }),
      estimator,
      locks: new AccessLockManager(),
    });

    requestRestart = jest.fn();
    app = createApp(
      { orchestrator, registry, credentials, adminEnabled: true, requestRestart },
      {
        sessionSecret: 'test-secret',
        cookieSecure: false,
        unlockTtlMs: 24 * 60 * 60 * 1000,
        trustProxy: false,
        corsOrigins: [],
      }
    );
  });

  afterEach(async () => {
    await registry.flush();
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('authentication', () => {
    it('requires a login for admin routes', async () => {
      const response = await request(app).get('/admin/servers').expect(401);

      expect(response.body.error).toMatchObject({ code: 'UNAUTHORIZED', message: 'Admin login required' });
    });

    it('rejects a wrong password', async () => {
      const response = await request(app)
        .post('/admin/login')
        .send({ username: 'admin', password: 'wrong-password' })
        .expect(401);

      expect(response.body.error).toMatchObject({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid username or password',
      });
    });

    it('logs in and out', async () => {
      const agent = request.agent(app);

      const login = await agent
        .post('/admin/login')
        .send({ username: 'admin', password: 'test-secret' })
        .expect(200);
      expect(login.body).toEqual({
        user: { username: 'admin', totpEnabled: false, createdAt: expect.any(String) },
      });
      await agent.get('/admin/servers').expect(200);

      await agent.post('/admin/logout').expect(200, { success: true });
      await agent.get('/admin/servers').expect(401);
    });

    it('issues a new session id on every login', async () => {
      const agent = request.agent(app);
      const sessionCookie = (response: request.Response): string | undefined => {
        const header = response.headers['set-cookie'];
        const cookies: string[] = Array.isArray(header) ? header : [];
        return cookies.find((cookie) => cookie.startsWith(`${SESSION_COOKIE_NAME}=`))?.split(';')[0];
      };

      const first = await agent.post('/admin/login').send({ username: 'admin', password: 'test-secret' }).expect(200);
      const second = await agent.post('/admin/login').send({ username: 'admin', password: 'test-secret' }).expect(200);

      expect(sessionCookie(first)).toBeDefined();
      expect(sessionCookie(second)).toBeDefined();
      expect(sessionCookie(second)).not.toBe(sessionCookie(first));
      await agent.get('/admin/servers').expect(200);
    });
  });

  describe('servers', () => {
    it('lists the registry', async () => {
      const agent = await loggedInAgent();

      const response = await agent.get('/admin/servers').expect(200);

      expect(response.body.servers).toHaveLength(2);
      expect(response.body.servers[1]).toEqual({
        id: 1,
        name: 'Media',
        macAddress: '00:11:22:33:44:66',
        broadcastAddress: '255.255.255.255',
        redirectUrl: 'http://media.test.lan',
        waitSeconds: 90,
        monitorAddress: '10.0.0.20',
        monitorPort: 8096,
        locked: false,
        pin: '',
        bootHistory: [40, 50],
      });
    });

    it('adds a server and persists it', async () => {
      const agent = await loggedInAgent();

      const response = await agent
        .post('/admin/servers')
        .send({
          name: 'NAS',
          macAddress: 'AA-BB-CC-DD-EE-FF',
          redirectUrl: 'nas.test.lan',
          monitorAddress: '10.0.0.40',
          monitorPort: 445,
          locked: true,
          pin: 2468,
        })
        .expect(201);

      expect(response.body.server).toEqual({
        id: 2,
        name: 'NAS',
        macAddress: 'AA-BB-CC-DD-EE-FF',
        broadcastAddress: '255.255.255.255',
        redirectUrl: 'http://nas.test.lan',
        waitSeconds: 60,
        monitorAddress: '10.0.0.40',
        monitorPort: 445,
        locked: true,
        pin: '2468',
        bootHistory: [],
      });
      expect(readRegistry().SERVERS[2]).toMatchObject({ NAME: 'NAS', PIN: '2468', BOOT_HISTORY: [] });

      const health = await request(app).get('/health').expect(200);
      expect(health.body.servers).toBe(3);
    });

    it('rejects an invalid MAC address', async () => {
      const agent = await loggedInAgent();

      const response = await agent
        .post('/admin/servers')
        .send({ name: 'Broken', macAddress: '00:11:22', redirectUrl: 'http://broken.lan' })
        .expect(400);

      expect(response.body.error).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: '"macAddress" MAC address must be in format XX:XX:XX:XX:XX:XX or XX-XX-XX-XX-XX-XX',
      });
    });

    it('updates a server and keeps its boot history', async () => {
      const agent = await loggedInAgent();

      const response = await agent
        .put('/admin/servers/1')
        .send({
          name: 'Media Box',
          macAddress: '00:11:22:33:44:66',
          redirectUrl: 'http://media.test.lan',
          waitSeconds: 120,
        })
        .expect(200);

      expect(response.body.server).toMatchObject({ id: 1, name: 'Media Box', waitSeconds: 120, bootHistory: [40, 50] });
      expect(response.body.server.monitorAddress).toBeUndefined();

      await agent
        .put('/admin/servers/7')
        .send({ name: 'Ghost', macAddress: '00:11:22:33:44:66', redirectUrl: 'http://ghost.lan' })
        .expect(404);
    });

    it('removes servers but keeps the last one', async () => {
      const agent = await loggedInAgent();

      const removed = await agent.delete('/admin/servers/0').expect(200);
      expect(removed.body.server).toMatchObject({ id: 0, name: 'Game Panel' });
      expect(registry.get(0)?.name).toBe('Media');

      const refused = await agent.delete('/admin/servers/0').expect(409);
      expect(refused.body.error).toMatchObject({
        code: 'LAST_SERVER',
        message: 'At least one server must stay configured',
      });

      await agent.delete('/admin/servers/5').expect(404);
    });
  });

  describe('users', () => {
    it('creates, resets and deletes users', async () => {
      const agent = await loggedInAgent();

      const created = await agent
        .post('/admin/users')
        .send({ username: 'operator', password: 'operator-secret' })
        .expect(201);
      expect(created.body.user).toEqual({ username: 'operator', totpEnabled: false, createdAt: expect.any(String) });

      const duplicate = await agent
        .post('/admin/users')
        .send({ username: 'operator', password: 'operator-secret' })
        .expect(409);
      expect(duplicate.body.error.code).toBe('USER_EXISTS');

      await agent.put('/admin/users/operator').send({ password: 'reset-secret' }).expect(200);
      await request(app).post('/admin/login').send({ username: 'operator', password: 'reset-secret' }).expect(200);

      const users = await agent.get('/admin/users').expect(200);
      expect(users.body.users.map((user: { username: string }) => user.username)).toEqual(['admin', 'operator']);

      await agent.delete('/admin/users/operator').expect(200, { success: true });
      await agent.delete('/admin/users/operator').expect(404);
    });

    it('ends the sessions of a deleted user', async () => {
      const agent = await loggedInAgent();
      await agent.post('/admin/users').send({ username: 'operator', password: 'operator-secret' }).expect(201);
      const operator = request.agent(app);
      await operator.post('/admin/login').send({ username: 'operator', password: 'operator-secret' }).expect(200);
      await operator.get('/admin/servers').expect(200);

      await agent.delete('/admin/users/operator').expect(200, { success: true });

      const response = await operator.get('/admin/servers').expect(401);
      expect(response.body.error).toMatchObject({ code: 'UNAUTHORIZED', message: 'Admin login required' });
      await agent.get('/admin/servers').expect(200);
    });

    it('refuses to delete the logged-in account', async () => {
      const agent = await loggedInAgent();

      const response = await agent.delete('/admin/users/admin').expect(400);

      expect(response.body.error.code).toBe('CANNOT_DELETE_SELF');
    });

    it('rejects passwords shorter than six characters', async () => {
      const agent = await loggedInAgent();

      const response = await agent.post('/admin/users').send({ username: 'short', password: '12345' }).expect(400);

      expect(response.body.error).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: '"password" Password must be at least 6 characters',
      });
    });
  });

  describe('restart', () => {
    it('answers before handing over to the restart hook', async () => {
      const agent = await loggedInAgent();

      const response = await agent.post('/admin/restart').expect(202);

      expect(response.body).toEqual({ success: true, message: 'Restarting. Reload in a few seconds.' });
      expect(requestRestart).toHaveBeenCalledTimes(1);
    });

    it('requires a login', async () => {
      await request(app).post('/admin/restart').expect(401);

      expect(requestRestart).not.toHaveBeenCalled();
    });
  });

  describe('security', () => {
    it('changes the password after checking the current one', async () => {
      const agent = await loggedInAgent();

      await agent
        .post('/admin/security/password')
        .send({ currentPassword: 'not-it', newPassword: 'new-test-secret' })
        .expect(401);
      await agent
        .post('/admin/security/password')
        .send({ currentPassword: 'test-secret', newPassword: 'new-test-secret' })
        .expect(200, { success: true });

      await request(app)
        .post('/admin/login')
        .send({ username: 'admin', password: 'new-test-secret' })
        .expect(200);
    });

    it('enrols, enforces and disables two-factor login', async () => {
      const agent = await loggedInAgent();

      const setup = await agent.post('/admin/security/totp/setup').expect(200);
      const secret: string = setup.body.secret;
      expect(setup.body.otpauthUrl).toBe(authenticator.keyuri('admin', 'WoL Gateway', secret));
      expect(setup.body.qrDataUrl).toMatch(/^data:image\/png;base64,/);

      const wrongCode = await agent.post('/admin/security/totp/verify').send({ code: '12345' }).expect(400);
      expect(wrongCode.body.error.code).toBe('VALIDATION_ERROR');

      await agent
        .post('/admin/security/totp/verify')
        .send({ code: authenticator.generate(secret) })
        .expect(200, { totpEnabled: true });

      const missingCode = await request(app)
        .post('/admin/login')
        .send({ username: 'admin', password: 'test-secret' })
        .expect(401);
      expect(missingCode.body.error.code).toBe('TOTP_REQUIRED');

      const second = request.agent(app);
      await second
        .post('/admin/login')
        .send({ username: 'admin', password: 'test-secret', totpCode: authenticator.generate(secret) })
        .expect(200);

      await second.post('/admin/security/totp/disable').send({ password: 'wrong-password' }).expect(401);
      await second
        .post('/admin/security/totp/disable')
        .send({ password: 'test-secret' })
        .expect(200, { totpEnabled: false });

      await request(app).post('/admin/login').send({ username: 'admin', password: 'test-secret' }).expect(200);
    });
  });
});
