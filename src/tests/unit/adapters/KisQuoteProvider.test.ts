import { KisQuoteProvider } from '@/adapters/kis/KisQuoteProvider';
import { AuthError, FetchError } from '@/errors';
import { KisCredentials } from '@/models';
import {
  buildQuotePayload,
  createMockHttpClient,
  createMockTokenSource,
} from '@/tests/utils/mockProviders';

const CREDENTIALS: KisCredentials = { appKey: 'test-key', appSecret: 'test-secret' };

describe('KisQuoteProvider', () => {
  let http: ReturnType<typeof createMockHttpClient>;
  let tokenSource: ReturnType<typeof createMockTokenSource>;
  let provider: KisQuoteProvider;

  beforeEach(() => {
    http = createMockHttpClient();
    tokenSource = createMockTokenSource();
    tokenSource.obtain.mockResolvedValue('test-token');
    provider = new KisQuoteProvider(http, tokenSource);
  });

  describe('fetchQuote', () => {
    it('should parse a well-formed quote into a snapshot', async () => {
      http.get.mockResolvedValue({ status: 200, data: buildQuotePayload() });

      const result = await provider.fetchQuote('005930', CREDENTIALS);

      expect(result).toEqual({
        ok: true,
        snapshot: {
          code: '005930',
          name: '테스트전자',
          price: 71000,
          changePercent: 2.5,
          volume: 15000000,
          marketCap: 42300,
        },
      });
    });

    it('should send the token, app credentials and instrument code', async () => {
      http.get.mockResolvedValue({ status: 200, data: buildQuotePayload() });

      await provider.fetchQuote('000660', CREDENTIALS);

      expect(tokenSource.obtain).toHaveBeenCalledWith('test-key', 'test-secret');
      expect(http.get).toHaveBeenCalledWith('/uapi/domestic-stock/v1/quotations/inquire-price', {
        headers: {
          'content-type': 'application/json',
          authorization: 'Bearer test-token',
          appkey: 'test-key',
          appsecret: 'test-secret',
          tr_id: 'FHKST01010100',
        },
        params: {
          fid_cond_mrkt_div_code: 'J',
          fid_input_iscd: '000660',
        },
      });
    });

    it('should floor market cap to units of 100 million won', async () => {
      http.get.mockResolvedValue({
        status: 200,
        data: buildQuotePayload({ hts_avls: '199999999' }),
      });

      const snapshot = await provider.fetchSnapshot('005930', CREDENTIALS);

      expect(snapshot?.marketCap).toBe(1);
    });

    it('should default a missing market cap to zero', async () => {
      http.get.mockResolvedValue({
        status: 200,
        data: buildQuotePayload({ hts_avls: undefined }),
      });

      const snapshot = await provider.fetchSnapshot('005930', CREDENTIALS);

      expect(snapshot?.marketCap).toBe(0);
    });

    it('should keep a negative change percent', async () => {
      http.get.mockResolvedValue({
        status: 200,
        data: buildQuotePayload({ prdy_ctrt: '-1.50' }),
      });

      const snapshot = await provider.fetchSnapshot('035720', CREDENTIALS);

      expect(snapshot?.changePercent).toBe(-1.5);
    });

    it('should report a malformed payload when a required field is missing', async () => {
      http.get.mockResolvedValue({
        status: 200,
        data: buildQuotePayload({ stck_prpr: undefined }),
      });

      const result = await provider.fetchQuote('005930', CREDENTIALS);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(FetchError);
      expect(result.error.message).toBe('Malformed quote payload (output.stck_prpr)');
    });

    it.each([
      ['blank price', { stck_prpr: '' }],
      ['non-numeric volume', { acml_vol: 'n/a' }],
      ['zero price', { stck_prpr: '0' }],
    ])('should reject a %s', async (_label, overrides) => {
      http.get.mockResolvedValue({ status: 200, data: buildQuotePayload(overrides) });

      expect(await provider.fetchSnapshot('005930', CREDENTIALS)).toBeNull();
    });

    it('should reject a body without an output object', async () => {
      http.get.mockResolvedValue({ status: 200, data: { rt_cd: '1', msg1: 'error' } });

      expect(await provider.fetchSnapshot('005930', CREDENTIALS)).toBeNull();
    });

    it('should report a non-200 status', async () => {
      http.get.mockResolvedValue({ status: 500, data: {} });

      const result = await provider.fetchQuote('005930', CREDENTIALS);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(FetchError);
      expect(result.error.message).toBe('Quote request returned status 500');
    });

    it('should report a transport failure without throwing', async () => {
      http.get.mockRejectedValue(new Error('timeout of 10000ms exceeded'));

      const result = await provider.fetchQuote('005930', CREDENTIALS);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(FetchError);
      expect(result.error.message).toBe('Quote request failed: timeout of 10000ms exceeded');
    });

    it('should report a token failure and skip the quote request', async () => {
      tokenSource.obtain.mockRejectedValue(new AuthError('Token request rejected with status 401', 401));

      const result = await provider.fetchQuote('005930', CREDENTIALS);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(AuthError);
      expect(http.get).not.toHaveBeenCalled();
    });
  });

  describe('fetchSnapshot', () => {
    it('should return null for any failure', async () => {
      http.get.mockResolvedValue({ status: 404, data: {} });

      expect(await provider.fetchSnapshot('999999', CREDENTIALS)).toBeNull();
    });
  });
});
