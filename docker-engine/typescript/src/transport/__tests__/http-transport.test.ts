import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockAgent } from 'undici';
import { UndiciHttpTransport } from '../http-transport.js';
import { DEFAULT_USER_AGENT, EngineConfig } from '../../config.js';
import { EngineErrorKind } from '../../errors.js';
import type { Logger } from '../../observability/logging.js';

describe('UndiciHttpTransport', () => {
  let agent: MockAgent;
  let transport: UndiciHttpTransport;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    transport = new UndiciHttpTransport(EngineConfig.defaultConfig(), { dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  describe('post', () => {
    it('should send a JSON body under the versioned path', async () => {
      const spec = { Name: 'web', TaskTemplate: { ContainerSpec: { Image: 'nginx:1.25' } } };
      agent
        .get('http://localhost')
        .intercept({
          path: '/v1.41/services/create',
          method: 'POST',
          body: JSON.stringify(spec),
          headers: {
            'content-type': 'application/json',
            'user-agent': DEFAULT_USER_AGENT,
            version: '1.41',
          },
        })
        .reply(201, { ID: 'svc1' });

      const response = await transport.post('/services/create', spec, {
        headers: { version: '1.41' },
      });

      expect(response.statusCode).toBe(201);
      expect(await response.text()).toBe('{"ID":"svc1"}');
      await response.close();
    });
  });

  describe('get', () => {
    it('should append defined query parameters', async () => {
      agent
        .get('http://localhost')
        .intercept({ path: '/v1.41/services?status=true', method: 'GET' })
        .reply(200, []);

      const response = await transport.get('services', {
        query: { status: true, filters: undefined },
      });

      expect(await response.text()).toBe('[]');
      await response.close();
    });

    it('should send configured headers on every request', async () => {
      const configured = new UndiciHttpTransport(
        EngineConfig.builder().apiVersion('1.44').userAgent('deploy-bot/1.0').header('X-Trace', 'abc').build(),
        { dispatcher: agent }
      );
      agent
        .get('http://localhost')
        .intercept({
          path: '/v1.44/_ping',
          method: 'GET',
          headers: { 'user-agent': 'deploy-bot/1.0', 'x-trace': 'abc', accept: 'application/json' },
        })
        .reply(200, 'OK');

      const response = await configured.get('/_ping');

      expect(await response.text()).toBe('OK');
      await response.close();
    });

    it('should log requests and responses at debug', async () => {
      const logger: Logger = {
        trace: vi.fn(),
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const logged = new UndiciHttpTransport(EngineConfig.defaultConfig(), {
        dispatcher: agent,
        logger,
      });
      agent.get('http://localhost').intercept({ path: '/v1.41/_ping', method: 'GET' }).reply(200, 'OK');

      const response = await logged.get('/_ping');
      await response.close();

      expect(logger.debug).toHaveBeenCalledWith('Outgoing request', {
        method: 'GET',
        path: '/v1.41/_ping',
      });
      expect(logger.debug).toHaveBeenCalledWith(
        'Incoming response',
        expect.objectContaining({ method: 'GET', path: '/v1.41/_ping', status: 200 })
      );
    });
  });

  describe('errors', () => {
    it('should map an Engine error message by status', async () => {
      agent
        .get('http://localhost')
        .intercept({ path: '/v1.41/distribution/nginx:missing/json', method: 'GET' })
        .reply(404, { message: 'No such image: nginx:missing' });

      await expect(transport.get('/distribution/nginx:missing/json')).rejects.toMatchObject({
        kind: EngineErrorKind.NotFound,
        statusCode: 404,
        message: 'No such image: nginx:missing',
      });
    });

    it('should use a plain-text body as the message', async () => {
      agent
        .get('http://localhost')
        .intercept({ path: '/v1.41/services/create', method: 'POST' })
        .reply(500, 'rpc error: code = Unknown');

      await expect(transport.post('/services/create', {})).rejects.toMatchObject({
        kind: EngineErrorKind.InternalError,
        statusCode: 500,
        message: 'rpc error: code = Unknown',
      });
    });

    it('should fall back to the status when the body is empty', async () => {
      agent
        .get('http://localhost')
        .intercept({ path: '/v1.41/services/create', method: 'POST' })
        .reply(503, '');

      await expect(transport.post('/services/create', {})).rejects.toMatchObject({
        kind: EngineErrorKind.ServiceUnavailable,
        message: 'HTTP 503 error',
      });
    });

    it('should report connection failures with the host', async () => {
      agent
        .get('http://localhost')
        .intercept({ path: '/v1.41/_ping', method: 'GET' })
        .replyWithError(new Error('connect ECONNREFUSED'));

      await expect(transport.get('/_ping')).rejects.toMatchObject({
        kind: EngineErrorKind.ConnectionFailed,
        message: 'Cannot connect to the Docker daemon at unix:///var/run/docker.sock: connect ECONNREFUSED',
      });
    });

    it('should report aborted requests as cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      agent
        .get('http://localhost')
        .intercept({ path: '/v1.41/_ping', method: 'GET' })
        .replyWithError(new Error('aborted'));

      await expect(transport.get('/_ping', { signal: controller.signal })).rejects.toMatchObject({
        kind: EngineErrorKind.Cancelled,
        message: 'Request cancelled',
      });
    });
  });
});
