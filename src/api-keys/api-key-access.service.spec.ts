import { ApiKeyAccessService, isExpired, statusOf } from './api-key-access.service';
import {
  ExpiredKeyError,
  InvalidKeyError,
  KeyNotFoundError,
  MissingCredentialError,
  StoreUnavailableError,
} from './api-key.errors';
import { KeyStore } from './key-store';
import { ApiKeyRecord } from './types';

describe('ApiKeyAccessService', () => {
  let keyStore: {
    findActiveByKey: jest.Mock;
    updateActiveFlag: jest.Mock;
  };
  let service: ApiKeyAccessService;

  const buildRecord = (overrides: Partial<ApiKeyRecord> = {}): ApiKeyRecord => ({
    key: 'key-1',
    name: 'alice',
    createdAt: new Date(Date.now() - 1000).toISOString(),
    expiresAt: new Date(Date.now() + 60_000).toISOString(),
    active: true,
    usage: 3,
    ...overrides,
  });

  beforeEach(() => {
    keyStore = {
      findActiveByKey: jest.fn(),
      updateActiveFlag: jest.fn().mockResolvedValue(undefined),
    };
    service = new ApiKeyAccessService(keyStore as unknown as KeyStore);
  });

  it.each([undefined, null, '', '   '])('rejects a missing credential (%p)', async (value) => {
    await expect(service.authorize(value)).rejects.toBeInstanceOf(MissingCredentialError);
    expect(keyStore.findActiveByKey).not.toHaveBeenCalled();
  });

  it('rejects keys without an active record', async () => {
    keyStore.findActiveByKey.mockResolvedValue(null);

    await expect(service.authorize('unknown')).rejects.toBeInstanceOf(InvalidKeyError);
    expect(keyStore.updateActiveFlag).not.toHaveBeenCalled();
  });

  it('admits active keys before their expiry', async () => {
    const record = buildRecord();
    keyStore.findActiveByKey.mockResolvedValue(record);

    await expect(service.authorize('key-1')).resolves.toBe(record);
    expect(keyStore.findActiveByKey).toHaveBeenCalledWith('key-1');
    expect(keyStore.updateActiveFlag).not.toHaveBeenCalled();
  });

  it('looks the key up exactly as presented', async () => {
    keyStore.findActiveByKey.mockResolvedValue(null);

    await expect(service.authorize(' key-1 ')).rejects.toBeInstanceOf(InvalidKeyError);
    expect(keyStore.findActiveByKey).toHaveBeenCalledWith(' key-1 ');
  });

  it('still reports expiry when the key was deleted before deactivation', async () => {
    keyStore.findActiveByKey.mockResolvedValue(
      buildRecord({ expiresAt: new Date(Date.now() - 1000).toISOString() }),
    );
    keyStore.updateActiveFlag.mockRejectedValue(new KeyNotFoundError());

    await expect(service.authorize('key-1')).rejects.toBeInstanceOf(ExpiredKeyError);
  });

  it('deactivates expired keys before rejecting them', async () => {
    keyStore.findActiveByKey.mockResolvedValue(
      buildRecord({ expiresAt: new Date(Date.now() - 1000).toISOString() }),
    );

    await expect(service.authorize('key-1')).rejects.toBeInstanceOf(ExpiredKeyError);
    expect(keyStore.updateActiveFlag).toHaveBeenCalledWith('key-1', false);
  });

  it('treats an unparsable expiry as expired', async () => {
    keyStore.findActiveByKey.mockResolvedValue(buildRecord({ expiresAt: 'not-a-date' }));

    await expect(service.authorize('key-1')).rejects.toBeInstanceOf(ExpiredKeyError);
    expect(keyStore.updateActiveFlag).toHaveBeenCalledWith('key-1', false);
  });

  it('surfaces store failures from the lazy deactivation', async () => {
    keyStore.findActiveByKey.mockResolvedValue(
      buildRecord({ expiresAt: new Date(Date.now() - 1000).toISOString() }),
    );
    keyStore.updateActiveFlag.mockRejectedValue(new StoreUnavailableError());

    await expect(service.authorize('key-1')).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});

describe('isExpired', () => {
  const expiresAt = '2026-05-01T00:00:00.000Z';
  const expiry = Date.parse(expiresAt);

  it('is false strictly before the expiry instant', () => {
    expect(isExpired(expiresAt, expiry - 1)).toBe(false);
  });

  it('is true at and after the expiry instant', () => {
    expect(isExpired(expiresAt, expiry)).toBe(true);
    expect(isExpired(expiresAt, expiry + 1)).toBe(true);
  });
});

describe('statusOf', () => {
  const record: ApiKeyRecord = {
    key: 'key-1',
    name: 'alice',
    createdAt: '2026-04-01T00:00:00.000Z',
    expiresAt: '2026-05-01T00:00:00.000Z',
    active: true,
    usage: 0,
  };
  const before = Date.parse('2026-04-15T00:00:00.000Z');
  const after = Date.parse('2026-05-02T00:00:00.000Z');

  it('reports active, revoked and expired records', () => {
    expect(statusOf(record, before)).toBe('active');
    expect(statusOf({ ...record, active: false }, before)).toBe('revoked');
    expect(statusOf(record, after)).toBe('expired');
    expect(statusOf({ ...record, active: false }, after)).toBe('expired');
  });
});
