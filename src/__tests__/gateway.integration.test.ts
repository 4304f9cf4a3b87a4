import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import type { Application } from 'express';
import * as wakeOnLan from 'wake_on_lan';
import { createApp } from '../app';
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

jest.mock('wake_on_lan', () => ({
  wake: jest.fn(),
}));

const mockedWake = jest.mocked(wakeOnLan.wake);

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
      BROADCAST_ADDRESS: '192.168.1.255',
      SITE_URL: 'media.test.lan:8096',
      WAIT_TIME_SECONDS: 90,
      MONITOR_IP: '10.0.0.20',
      MONITOR_PORT: 8096,
      BOOT_HISTORY: [40, 50],
    },
    {
      NAME: 'Vault',
      WOL_MAC_ADDRESS: '00:11:22:33:44:77',
      SITE_URL: 'http://vault.test.lan',
      WAIT_TIME_SECONDS: 45,
      MONITOR_IP: '10.0.0.30',
      LOCKED: true,
      PIN: '4321',
    },
    {
      NAME: 'Lab',
      WOL_MAC_ADDRESS: '00:11:22:33:44:88',
      SITE_URL: 'http://lab.test.lan/start/中',
      WAIT_TIME_SECONDS: 20,
      LOCKED: true,
      PIN: '',
    },
  ],
};

describe('Gateway API', () => {
  let dir: string;
  let registryPath: string;
  let registry: ServerRegistry;
  let probe: jest.Mock<Promise<boolean>, [string, number, number]>;
  let app: Application;

  beforeEach(async () => {
    jest.clearAllMocks();
    mockedWake.mockImplementation((_mac, _options, callback) => callback?.(null));

    dir = mkdtempSync(path.join(os.tmpdir(), 'gateway-test-'));
    registryPath = path.join(dir, 'servers.json');
    writeFileSync(registryPath, JSON.stringify(registryDocument), 'utf-8');

    registry = new ServerRegistry(registryPath);
    await registry.load();

    probe = jest.fn().mockResolvedValue(false);
    const estimator = new RegistryBootTimeEstimator(registry);
    const orchestrator = new GatewayOrchestrator({
      registry,
      dispatcher: new WakeDispatcher({ mode: 'library', commandTimeoutMs: 1000 }),
      readiness: new ReadinessDetector({ probeTimeoutMs: 200, pollIntervalSeconds: 2, estimator, probe }),
      estimator,
      locks: new AccessLockManager(),
    });

    app = createApp(
      {
        orchestrator,
        registry,
        credentials: new AdminCredentials(new AdminUserDatabase(':memory:')),
        adminEnabled: false,
        requestRestart: jest.fn(),
      },
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
    rmSync(dir, { recursive: true, force: true });
  });

  describe('GET /wake/:id', () => {
    it('wakes a fixed-delay server and schedules the redirect', async () => {
      const response = await request(app).get('/wake/0').expect(200);

      expect(response.headers.refresh).toBe('30;url=http://panel.test.lan');
      expect(response.body).toEqual({
        server: { id: 0, name: 'Game Panel' },
        sent: true,
        strategy: 'fixed-delay',
        waitSeconds: 30,
        redirectUrl: 'http://panel.test.lan',
      });
      expect(mockedWake).toHaveBeenCalledWith(
        '00:11:22:33:44:55',
        { address: '255.255.255.255' },
        expect.any(Function)
      );
    });

    it('returns a polling plan with the boot estimate for a monitored server', async () => {
      const response = await request(app).get('/wake/1').expect(200);

      expect(response.headers.refresh).toBeUndefined();
      expect(response.body).toEqual({
        server: { id: 1, name: 'Media' },
        sent: true,
        strategy: 'active-probe',
        statusUrl: '/ping_status/1',
        pollIntervalSeconds: 2,
        estimateSeconds: 45,
        waitSeconds: 90,
        redirectUrl: 'http://media.test.lan:8096',
      });
      expect(mockedWake).toHaveBeenCalledWith(
        '00:11:22:33:44:66',
        { address: '192.168.1.255' },
        expect.any(Function)
      );
    });

    it('sends the stored URL percent-encoded in the Refresh header', async () => {
      const response = await request(app).get('/wake/3').expect(200);

      expect(response.headers.refresh).toBe('20;url=http://lab.test.lan/start/%E4%B8%AD');
      expect(response.body.redirectUrl).toBe('http://lab.test.lan/start/%E4%B8%AD');
    });

    it.each(['9', 'abc'])('answers 400 SERVER_NOT_FOUND for id %p', async (id) => {
      const response = await request(app).get(`/wake/${id}`).expect(400);

      expect(response.body.error).toMatchObject({
        code: 'SERVER_NOT_FOUND',
        message: `Server ${id} not found`,
        statusCode: 400,
        path: `/wake/${id}`,
      });
      expect(mockedWake).not.toHaveBeenCalled();
    });

    it('answers 500 when the packet cannot be sent', async () => {
      mockedWake.mockImplementation((_mac, _options, callback) => callback?.(new Error('send EACCES')));

      const response = await request(app).get('/wake/0').expect(500);

      expect(response.body.error).toMatchObject({
        code: 'TRANSMISSION_FAILED',
        message: 'send EACCES',
      });
    });
  });

  describe('locked servers', () => {
    it('asks for a PIN, unlocks the session and then wakes', async () => {
      const agent = request.agent(app);

      const challenge = await agent.get('/wake/2').expect(200);
      expect(challenge.body).toEqual({
        server: { id: 2, name: 'Vault' },
        pinRequired: true,
        pinError: false,
      });

      const rejected = await agent.post('/wake/2').type('form').send({ pin: '0000' }).expect(401);
      expect(rejected.body).toEqual({
        server: { id: 2, name: 'Vault' },
        pinRequired: true,
        pinError: true,
        message: 'Incorrect PIN',
      });
      expect(mockedWake).not.toHaveBeenCalled();

      const unlocked = await agent.post('/wake/2').type('form').send({ pin: '4321' }).expect(303);
      expect(unlocked.headers.location).toBe('/');
      expect(mockedWake).not.toHaveBeenCalled();

      const woken = await agent.get('/wake/2').expect(200);
      expect(woken.body).toMatchObject({ sent: true, strategy: 'active-probe', statusUrl: '/ping_status/2' });
      expect(mockedWake).toHaveBeenCalledTimes(1);

      await agent.get('/ping_status/2').expect(200);
    });

    it('wakes a locked server with an empty PIN without a challenge', async () => {
      const response = await request(app).get('/wake/3').expect(200);

      expect(response.body).toMatchObject({ server: { id: 3, name: 'Lab' }, sent: true, strategy: 'fixed-delay' });
      expect(response.body.pinRequired).toBeUndefined();
      expect(mockedWake).toHaveBeenCalledTimes(1);
    });

    it('refuses status checks from sessions that have not unlocked the server', async () => {
      const response = await request(app).get('/ping_status/2').expect(403);

      expect(response.body.error).toMatchObject({
        code: 'SERVER_LOCKED',
        message: 'Server 2 is locked',
      });
      expect(probe).not.toHaveBeenCalled();
    });
  });

  describe('GET /ping_status/:id', () => {
    it('reports offline without recording a boot sample', async () => {
      const response = await request(app).get('/ping_status/1?elapsed=5').expect(200);

      expect(response.body).toEqual({ online: false, redirectUrl: 'http://media.test.lan:8096' });
      expect(probe).toHaveBeenCalledWith('10.0.0.20', 8096, 200);
      expect(registry.get(1)?.bootHistory).toEqual([40, 50]);
    });

    it('records the boot time once the server answers', async () => {
      probe.mockResolvedValue(true);

      const response = await request(app).get('/ping_status/1?elapsed=61').expect(200);

      expect(response.body).toEqual({ online: true, redirectUrl: 'http://media.test.lan:8096' });
      const saved = JSON.parse(readFileSync(registryPath, 'utf-8'));
      expect(saved.SERVERS[1].BOOT_HISTORY).toEqual([40, 50, 61]);

      const landing = await request(app).get('/').expect(200);
      expect(landing.body.servers[1]).toMatchObject({ id: 1, estimateSeconds: 50 });
    });

    it('answers 400 when the server has no monitor address', async () => {
      const response = await request(app).get('/ping_status/0').expect(400);

      expect(response.body.error).toMatchObject({
        code: 'PROBE_NOT_CONFIGURED',
        message: 'Server 0 has no monitor address configured',
      });
    });

    it('rejects a non-numeric elapsed value', async () => {
      const response = await request(app).get('/ping_status/1?elapsed=soon').expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(probe).not.toHaveBeenCalled();
    });

    it('answers 400 SERVER_NOT_FOUND for unknown ids', async () => {
      const response = await request(app).get('/ping_status/9').expect(400);

      expect(response.body.error.code).toBe('SERVER_NOT_FOUND');
    });
  });

  describe('GET /', () => {
    it('lists every server with its readiness strategy', async () => {
      const response = await request(app).get('/').expect(200);

      expect(response.body).toEqual({
        servers: [
          {
            id: 0,
            name: 'Game Panel',
            locked: false,
            unlocked: false,
            strategy: 'fixed-delay',
            estimateSeconds: null,
            wakeUrl: '/wake/0',
          },
          {
            id: 1,
            name: 'Media',
            locked: false,
            unlocked: false,
            strategy: 'active-probe',
            estimateSeconds: 45,
            wakeUrl: '/wake/1',
          },
          {
            id: 2,
            name: 'Vault',
            locked: true,
            unlocked: false,
            strategy: 'active-probe',
            estimateSeconds: null,
            wakeUrl: '/wake/2',
          },
          {
            id: 3,
            name: 'Lab',
            locked: false,
            unlocked: false,
            strategy: 'fixed-delay',
            estimateSeconds: null,
            wakeUrl: '/wake/3',
          },
        ],
      });
    });
  });

  describe('GET /health', () => {
    it('reports the number of managed servers', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body).toEqual({
        status: 'ok',
        servers: 4,
        uptime: expect.any(Number),
        timestamp: expect.any(String),
      });
    });
  });

  it('answers 403 ADMIN_DISABLED on admin routes while the panel is off', async () => {
    const response = await request(app).post('/admin/login').send({ username: 'admin', password: 'x' }).expect(403);

    expect(response.body.error.code).toBe('ADMIN_DISABLED');
  });

  it('answers 404 for unknown routes', async () => {
    const response = await request(app).get('/nowhere').expect(404);

    expect(response.body.error).toMatchObject({ code: 'NOT_FOUND', message: 'Route not found' });
  });
});
