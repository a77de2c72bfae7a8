import { describe, it, expect, beforeEach } from 'vitest';
import { DistributionServiceImpl } from '../distribution.js';
import { EngineError, EngineErrorKind } from '../../errors.js';
import {
  createMockHttpTransport,
  createMockJsonResponse,
  createMockRawResponse,
  type MockHttpTransport,
} from '../../__mocks__/http-transport.mock.js';

const DIGEST = `sha256:${'ef'.repeat(32)}`;

describe('DistributionService', () => {
  let transport: MockHttpTransport;
  let service: DistributionServiceImpl;

  beforeEach(() => {
    transport = createMockHttpTransport();
    service = new DistributionServiceImpl(transport);
  });

  describe('inspect', () => {
    it('should return the descriptor and platforms', async () => {
      transport.get.mockResolvedValue(
        createMockJsonResponse({
          Descriptor: {
            mediaType: 'application/vnd.oci.image.index.v1+json',
            digest: DIGEST,
            size: 2048,
          },
          Platforms: [{ architecture: 'amd64', os: 'linux' }],
        })
      );

      const result = await service.inspect('nginx:1.25');

      expect(result).toEqual({
        Descriptor: {
          mediaType: 'application/vnd.oci.image.index.v1+json',
          digest: DIGEST,
          size: 2048,
        },
        Platforms: [{ architecture: 'amd64', os: 'linux' }],
      });
      expect(transport.get).toHaveBeenCalledWith('/distribution/nginx:1.25/json', {
        headers: {},
        signal: undefined,
      });
    });

    it('should send registry credentials and the signal', async () => {
      const signal = new AbortController().signal;
      transport.get.mockResolvedValue(
        createMockJsonResponse({
          Descriptor: { mediaType: 'application/vnd.docker.distribution.manifest.v2+json', digest: DIGEST, size: 10 },
          Platforms: null,
        })
      );

      const result = await service.inspect('ghcr.io/org/tool:v1', 'test-auth', { signal });

      expect(result.Platforms).toEqual([]);
      expect(transport.get).toHaveBeenCalledWith('/distribution/ghcr.io/org/tool:v1/json', {
        headers: { 'X-Registry-Auth': 'test-auth' },
        signal,
      });
    });

    it('should reject an empty image', async () => {
      await expect(service.inspect(' ')).rejects.toMatchObject({
        kind: EngineErrorKind.InvalidReference,
        message: 'Image reference cannot be empty',
      });
      expect(transport.get).not.toHaveBeenCalled();
    });

    it('should reject bodies that are not JSON', async () => {
      const response = createMockRawResponse('<html>');
      transport.get.mockResolvedValue(response);

      await expect(service.inspect('nginx')).rejects.toMatchObject({
        kind: EngineErrorKind.DeserializationError,
      });
      expect(response.close).toHaveBeenCalledTimes(1);
    });

    it('should accept a sparse descriptor', async () => {
      transport.get.mockResolvedValue(
        createMockJsonResponse({
          Descriptor: { digest: 'sha256:abc' },
          Platforms: [{ architecture: 'amd64', os: 'linux' }],
        })
      );

      const result = await service.inspect('nginx');

      expect(result).toEqual({
        Descriptor: { digest: 'sha256:abc', size: 0 },
        Platforms: [{ architecture: 'amd64', os: 'linux' }],
      });
    });

    it('should reject responses without a descriptor', async () => {
      transport.get.mockResolvedValue(createMockJsonResponse({ Platforms: [] }));

      await expect(service.inspect('nginx')).rejects.toThrow(/Invalid distribution response/);
    });

    it('should propagate transport errors', async () => {
      const error = EngineError.fromResponse(401, 'unauthorized');
      transport.get.mockRejectedValue(error);

      await expect(service.inspect('private/app')).rejects.toBe(error);
    });
  });
});
