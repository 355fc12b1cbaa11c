import { jest } from '@jest/globals';
import { createLwaCredentialProvider, staticCredentialProvider } from '../../src/lib/sp-api-auth.js';
import { ConfigurationError, FailureKind, FailureReason } from '../../src/lib/errors.js';
import type { FetchLike, FetchResponse } from '../../src/lib/sp-api-client.js';
import { jsonResponse } from '../helpers/fixtures.js';

const creds = {
  refreshToken: 'test-refresh-token',
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  tokenUrl: 'https://lwa.test/auth/o2/token',
};

describe('createLwaCredentialProvider', () => {
  let fetchMock: jest.Mock<FetchLike>;
  let clock: number;

  beforeEach(() => {
    fetchMock = jest.fn<FetchLike>();
    clock = 1_000_000;
  });

  const provider = (overrides: Partial<typeof creds> = {}, timeoutMs?: number) =>
    createLwaCredentialProvider({ ...creds, ...overrides }, { fetch: fetchMock, now: () => clock, timeoutMs });

  it('should exchange the refresh token for an access token', async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, { access_token: 'test-access-token', token_type: 'bearer', expires_in: 3600 }));

    await expect(provider().getAccessToken()).resolves.toBe('test-access-token');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://lwa.test/auth/o2/token');
    expect(init.method).toBe('POST');
    expect(init.body).toBe(
      'grant_type=refresh_token&refresh_token=test-refresh-token&client_id=test-client-id&client_secret=test-secret'
    );
  });

  it('should cache the token until a minute before expiry', async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, { access_token: 'test-access-token', expires_in: 3600 }));
    const lwa = provider();

    await lwa.getAccessToken();
    clock += 3_539_999;
    await lwa.getAccessToken();
    expect(fetchMock).toHaveBeenCalledTimes(1);

    clock += 1;
    await lwa.getAccessToken();
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should share one exchange between concurrent callers', async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, { access_token: 'test-access-token', expires_in: 3600 }));
    const lwa = provider();

    const tokens = await Promise.all([lwa.getAccessToken(), lwa.getAccessToken(), lwa.getAccessToken()]);

    expect(tokens).toEqual(['test-access-token', 'test-access-token', 'test-access-token']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should still hand the token to other callers when one of them aborts', async () => {
    let respond: (res: FetchResponse) => void = () => undefined;
    fetchMock.mockImplementation(
      () =>
        new Promise<FetchResponse>((resolve) => {
          respond = resolve;
        })
    );
    const lwa = provider();
    const controller = new AbortController();

    const aborted = lwa.getAccessToken(controller.signal);
    const waiting = lwa.getAccessToken();
    controller.abort();

    await expect(aborted).rejects.toMatchObject({ kind: FailureKind.CANCELLED });
    respond(jsonResponse(200, { access_token: 'test-access-token', expires_in: 3600 }));
    await expect(waiting).resolves.toBe('test-access-token');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should not start an exchange for an already aborted caller', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(provider().getAccessToken(controller.signal)).rejects.toMatchObject({ kind: FailureKind.CANCELLED });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should time out a token request that never answers', async () => {
    fetchMock.mockImplementation(() => new Promise<FetchResponse>(() => undefined));

    await expect(provider({}, 20).getAccessToken()).rejects.toMatchObject({
      kind: FailureKind.TRANSIENT,
      reason: FailureReason.TIMEOUT,
      message: 'LWA token request timed out after 20ms',
    });
  });

  it('should time out a token response body that never arrives', async () => {
    fetchMock.mockResolvedValue({ ok: true, status: 200, text: () => new Promise<string>(() => undefined) });
    const lwa = provider({}, 20);

    await expect(lwa.getAccessToken()).rejects.toMatchObject({ reason: FailureReason.TIMEOUT });

    // The timed-out exchange is not reused
    fetchMock.mockResolvedValue(jsonResponse(200, { access_token: 'test-access-token', expires_in: 3600 }));
    await expect(lwa.getAccessToken()).resolves.toBe('test-access-token');
  });

  it('should treat a rejected refresh token as permanent', async () => {
    fetchMock.mockResolvedValue(jsonResponse(401, { error: 'invalid_grant' }));

    await expect(provider().getAccessToken()).rejects.toMatchObject({
      kind: FailureKind.PERMANENT,
      reason: FailureReason.UNAUTHORIZED,
      status: 401,
    });
  });

  it('should treat an LWA outage as transient', async () => {
    fetchMock.mockResolvedValue(jsonResponse(503, 'unavailable'));

    await expect(provider().getAccessToken()).rejects.toMatchObject({
      kind: FailureKind.TRANSIENT,
      reason: FailureReason.SERVER_ERROR,
      status: 503,
    });
  });

  it('should treat a network error as transient', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNRESET'));

    await expect(provider().getAccessToken()).rejects.toMatchObject({
      kind: FailureKind.TRANSIENT,
      reason: FailureReason.NETWORK,
      message: 'LWA token request failed: ECONNRESET',
    });
  });

  it('should reject a token response without access_token', async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, { expires_in: 3600 }));

    await expect(provider().getAccessToken()).rejects.toMatchObject({
      kind: FailureKind.PERMANENT,
      message: 'LWA token response missing access_token',
    });
  });

  it('should retry the exchange after a failed one', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(500, 'oops'))
      .mockResolvedValueOnce(jsonResponse(200, { access_token: 'test-access-token', expires_in: 3600 }));
    const lwa = provider();

    await expect(lwa.getAccessToken()).rejects.toMatchObject({ kind: FailureKind.TRANSIENT });
    await expect(lwa.getAccessToken()).resolves.toBe('test-access-token');
  });

  it('should name the missing settings', () => {
    expect(() => provider({ clientSecret: '' }).assertCredentials()).toThrow(
      new ConfigurationError('SP-API credentials not configured (missing SP_API_CLIENT_SECRET)')
    );
  });

  it('should fail fast without calling LWA when credentials are missing', async () => {
    await expect(provider({ refreshToken: ' ' }).getAccessToken()).rejects.toMatchObject({
      kind: FailureKind.PERMANENT,
      reason: FailureReason.UNAUTHORIZED,
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('staticCredentialProvider', () => {
  it('should return the given token', async () => {
    await expect(staticCredentialProvider('test-access-token').getAccessToken()).resolves.toBe('test-access-token');
  });

  it('should reject an empty token up front', () => {
    expect(() => staticCredentialProvider('').assertCredentials()).toThrow(ConfigurationError);
  });
});
