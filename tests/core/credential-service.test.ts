import { describe, it, expect, beforeEach } from 'vitest';
import { CredentialService } from '../../src/core/credential-service.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { GradingClient } from '../../src/core/grading-client.js';
import { InMemoryCredentialStorage } from '../../src/storage/memory-storage.js';
import { BASE_URL, FakeGradingService, JOURNAL, TestClock, recordEvents } from '../helpers/fixtures.js';

describe('CredentialService', () => {
  let store: InMemoryCredentialStorage;
  let service: FakeGradingService;
  let recorder: ReturnType<typeof recordEvents>;
  let credentials: CredentialService;

  beforeEach(() => {
    store = new InMemoryCredentialStorage();
    service = new FakeGradingService();
    recorder = recordEvents();
    credentials = new CredentialService(store, new GradingClient({ baseUrl: BASE_URL, fetchFn: service.fetchFn }), {
      eventEmitter: recorder.emitter,
      now: new TestClock(new Date('2025-06-02T08:00:00.000Z')).now,
    });
  });

  describe('saveCredentials', () => {
    it('should store a confirmed key as validated', async () => {
      const { credential, check } = await credentials.saveCredentials(JOURNAL, '  test-secret  ');

      expect(check).toEqual({ ok: true });
      expect(credential).toEqual({
        journalId: JOURNAL,
        apiKey: 'test-secret',
        validated: true,
        validatedAt: '2025-06-02T08:00:00.000Z',
        updatedAt: '2025-06-02T08:00:00.000Z',
      });
      expect(await store.get(JOURNAL)).toEqual(credential);
      expect(recorder.ofType('credentials.saved')[0]?.payload).toEqual({ validated: true });
    });

    it('should store a refused key unvalidated', async () => {
      service.respondWith({ status: 200, body: { ok: false, error: 'unknown key' } });

      const { credential } = await credentials.saveCredentials(JOURNAL, 'test-secret');

      expect(credential.validated).toBe(false);
      expect(recorder.ofType('credentials.saved')[0]?.payload).toEqual({ validated: false, reason: 'unknown key' });
    });

    it('should reject an empty key', async () => {
      await expect(credentials.saveCredentials(JOURNAL, '   ')).rejects.toThrow('API key must not be empty');
      expect(service.calls).toHaveLength(0);
    });
  });

  describe('validateCredentials', () => {
    it('should throw when nothing is stored', async () => {
      await expect(credentials.validateCredentials(JOURNAL)).rejects.toThrow(ConfigurationError);
    });

    it('should keep the flag when the grading service is unreachable', async () => {
      await credentials.saveCredentials(JOURNAL, 'test-secret');
      service.respondWith({ status: 503 });

      expect(await credentials.validateCredentials(JOURNAL)).toMatchObject({ ok: false, retryable: true });
      expect((await store.get(JOURNAL))?.validated).toBe(true);
    });

    it('should invalidate a key the grading service refuses', async () => {
      await credentials.saveCredentials(JOURNAL, 'test-secret');
      service.respondWith({ status: 401 });

      expect(await credentials.validateCredentials(JOURNAL)).toEqual({
        ok: false,
        reason: 'HTTP 401: no details',
        retryable: false,
      });
      expect((await store.get(JOURNAL))?.validated).toBe(false);
      expect(recorder.ofType('credentials.invalidated')[0]?.payload).toEqual({ reason: 'HTTP 401: no details' });
    });
  });

  describe('requireUsable', () => {
    it('should distinguish missing from unvalidated credentials', async () => {
      await expect(credentials.requireUsable(JOURNAL)).rejects.toThrow(
        "No grading credentials stored for journal 'journal-1'"
      );

      service.respondWith({ status: 200, body: { ok: false } });
      await credentials.saveCredentials(JOURNAL, 'test-secret');

      await expect(credentials.requireUsable(JOURNAL)).rejects.toThrow(
        "Grading credentials of journal 'journal-1' are not validated"
      );
    });
  });

  describe('markInvalid', () => {
    it('should announce the invalidation only once', async () => {
      await credentials.saveCredentials(JOURNAL, 'test-secret');

      await credentials.markInvalid(JOURNAL, 'HTTP 401: no details');
      await credentials.markInvalid(JOURNAL, 'HTTP 401: no details');

      expect(recorder.ofType('credentials.invalidated')).toHaveLength(1);
    });
  });
});
