import { z } from 'zod';
import { KIS_API } from '@/constants/instruments';
import { MARKET_DATA } from '@/config/businessRules';
import { AuthError, FetchError } from '@/errors';
import { HttpResponse, IHttpClient } from '@/interfaces/IHttpClient';
import { IAuthTokenSource, IQuoteProvider, QuoteResult } from '@/interfaces/IQuoteProvider';
import { KisCredentials, MarketSnapshot } from '@/models';

/**
 * KIS returns every numeric field as a string. Blank strings must fail
 * rather than coerce to 0.
 */
const numericString = z.string().trim().min(1).pipe(z.coerce.number().finite());

const integerString = numericString.pipe(z.number().int());

/**
 * inquire-price `output` object; only the fields the screener reads
 */
const quoteOutputSchema = z.object({
  hts_kor_isnm: z.string().trim().min(1), // 종목명
  stck_prpr: integerString.pipe(z.number().positive()), // 현재가
  prdy_ctrt: numericString, // 전일 대비율 (%)
  acml_vol: integerString.pipe(z.number().nonnegative()), // 누적 거래량
  hts_avls: integerString.pipe(z.number().nonnegative()).optional(), // 시가총액
});

const quoteResponseSchema = z.object({
  output: quoteOutputSchema,
});

type QuoteOutput = z.infer<typeof quoteOutputSchema>;

function toSnapshot(code: string, output: QuoteOutput): MarketSnapshot {
  return {
    code,
    name: output.hts_kor_isnm,
    price: output.stck_prpr,
    changePercent: output.prdy_ctrt,
    volume: output.acml_vol,
    marketCap: Math.floor((output.hts_avls ?? 0) / MARKET_DATA.MARKET_CAP_UNIT),
  };
}

/**
 * KIS domestic stock quote provider
 *
 * Requests a fresh token for every quote. Every failure (token, status,
 * payload, transport) becomes a failed QuoteResult; nothing is thrown.
 */
export class KisQuoteProvider implements IQuoteProvider {
  constructor(
    private readonly http: IHttpClient,
    private readonly tokenSource: IAuthTokenSource
  ) {}

  async fetchQuote(code: string, credentials: KisCredentials): Promise<QuoteResult> {
    let token: string;
    try {
      token = await this.tokenSource.obtain(credentials.appKey, credentials.appSecret);
    } catch (error) {
      if (error instanceof AuthError) {
        return { ok: false, error };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: new AuthError(message) };
    }

    let response: HttpResponse;
    try {
      response = await this.http.get(KIS_API.QUOTE_PATH, {
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${token}`,
          appkey: credentials.appKey,
          appsecret: credentials.appSecret,
          tr_id: KIS_API.QUOTE_TR_ID,
        },
        params: {
          fid_cond_mrkt_div_code: KIS_API.MARKET_DIVISION,
          fid_input_iscd: code,
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: new FetchError(`Quote request failed: ${message}`, 'network', code) };
    }

    if (response.status !== 200) {
      return {
        ok: false,
        error: new FetchError(`Quote request returned status ${response.status}`, 'http_status', code),
      };
    }

    const parsed = quoteResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
      return {
        ok: false,
        error: new FetchError(`Malformed quote payload (${fields})`, 'malformed_payload', code),
      };
    }

    return { ok: true, snapshot: toSnapshot(code, parsed.data.output) };
  }

  async fetchSnapshot(code: string, credentials: KisCredentials): Promise<MarketSnapshot | null> {
    const result = await this.fetchQuote(code, credentials);
    return result.ok ? result.snapshot : null;
  }
}
